import httpStatus from "./http-status.json";
import type { ToolResult } from "./generators";

type PatternEntry = {
  name: string;
  keywords: string[];
  pattern: string;
};

// Checked in order; zip codes come before IP so "zip" is never read as "ip".
const PATTERNS: readonly PatternEntry[] = [
  { name: "email", keywords: ["email", "e-mail"], pattern: "^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$" },
  { name: "phone", keywords: ["phone", "telephone"], pattern: "^\\+?[\\d\\s\\-\\(\\)]{10,}$" },
  {
    name: "url",
    keywords: ["url", "link", "website"],
    pattern: "^https?:\\/\\/(www\\.)?[-a-zA-Z0-9@:%._\\+~#=]{1,256}\\.[a-zA-Z0-9()]{1,6}\\b([-a-zA-Z0-9()@:%_\\+.~#?&//=]*)$"
  },
  { name: "zip code", keywords: ["zip", "zip code", "postal code"], pattern: "^\\d{5}(-\\d{4})?$" },
  {
    name: "ip",
    keywords: ["ip", "ipv4", "ip address"],
    pattern: "^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$"
  },
  { name: "date", keywords: ["date"], pattern: "^\\d{4}-\\d{2}-\\d{2}$" },
  { name: "time", keywords: ["time"], pattern: "^([01]?[0-9]|2[0-3]):[0-5][0-9]$" },
  {
    name: "password",
    keywords: ["password"],
    pattern: "^(?=.*[a-z])(?=.*[A-Z])(?=.*\\d)(?=.*[@$!%*?&])[A-Za-z\\d@$!%*?&]{8,}$"
  },
  { name: "username", keywords: ["username", "user name"], pattern: "^[a-zA-Z0-9_]{3,20}$" },
  { name: "credit card", keywords: ["credit card", "card number"], pattern: "^\\d{4}[\\s\\-]?\\d{4}[\\s\\-]?\\d{4}[\\s\\-]?\\d{4}$" }
];

const GENERIC_PATTERNS: ReadonlyArray<{ keyword: string; pattern: string }> = [
  { keyword: "number", pattern: "\\d+" },
  { keyword: "word", pattern: "\\w+" },
  { keyword: "letter", pattern: "[a-zA-Z]+" }
];

const STATUS_NAMES = new Map<string, string>(Object.entries(httpStatus.statusCodes));

function mentions(text: string, keyword: string): boolean {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replace(/ /g, "\\s+");
  return new RegExp(`\\b${escaped}s?\\b`, "i").test(text);
}

/** Picks a ready-made pattern for a described input; ".*" when nothing matches. */
export function generateRegex(description: string): ToolResult {
  const text = description.trim();
  if (!text) {
    return { ok: false, error: "Describe what the pattern should match." };
  }
  const known = PATTERNS.find((entry) => entry.keywords.some((keyword) => mentions(text, keyword)));
  if (known) {
    return { ok: true, value: known.pattern };
  }
  const generic = GENERIC_PATTERNS.find((entry) => mentions(text, entry.keyword));
  return { ok: true, value: generic?.pattern ?? ".*" };
}

export function lookupHttpStatus(code: string): ToolResult {
  const value = code.trim();
  const name = STATUS_NAMES.get(value);
  if (!name) {
    return { ok: false, error: `Unknown HTTP status code: ${value}` };
  }
  return { ok: true, value: `${value}: ${name}` };
}
