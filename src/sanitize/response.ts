import vocabulary from "./vocabulary.json";
import { ArtifactKind } from "../providers/types";

const COMMAND_PROGRAMS = new Set(vocabulary.commandPrograms);
const COMMAND_LEAD_INS = byLengthDesc(vocabulary.commandLeadIns);
const SQL_LEAD_INS = byLengthDesc(vocabulary.sqlLeadIns);
const COMMAND_MARKERS = vocabulary.commandContinuationMarkers.map(phrasePattern);
const SQL_MARKERS = vocabulary.sqlContinuationMarkers.map(phrasePattern);
const NO_RESULT_PHRASES = vocabulary.noResultPhrases;
const SQL_KEYWORDS = vocabulary.sqlKeywords.map((keyword) => new RegExp(`\\b${keyword.replace(/ /g, "\\s+")}\\b`));
const SQL_STATEMENT_START = new RegExp(`^\\(?\\s*(${vocabulary.sqlStatementKeywords.join("|")})\\b`, "i");
const SQL_COMMENT_PREFIXES = ["--", "/*", "*/", "#"];

const FENCED_BLOCK = /```[^\n`]*\r?\n([\s\S]*?)```/;
const INLINE_FENCE = /^```([^`]*)```$/;
const INLINE_CODE = /^`([^`]+)`$/;
const TRAILING_NOISE = /[\s.,!?]+$/;
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=\S*/;
const SUDO_PREFIX = /^sudo(\s|$)/;

function byLengthDesc(values: string[]): string[] {
  return [...values].sort((a, b) => b.length - a.length);
}

function phrasePattern(phrase: string): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![a-z])${escaped}(?![a-z])`);
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function stripFences(text: string): string {
  const trimmed = text.trim();
  const block = FENCED_BLOCK.exec(trimmed);
  if (block) {
    return block[1].trim();
  }
  const inline = INLINE_FENCE.exec(trimmed) ?? INLINE_CODE.exec(trimmed);
  if (inline) {
    return inline[1].trim();
  }
  return trimmed;
}

export function stripLeadIns(text: string, leadIns: readonly string[]): string {
  let out = text.trim();
  let changed = true;
  while (changed && out.length > 0) {
    changed = false;
    const lower = out.toLowerCase();
    for (const leadIn of leadIns) {
      if (lower.startsWith(leadIn.toLowerCase())) {
        out = out.slice(leadIn.length).trim();
        changed = true;
        break;
      }
    }
  }
  return out;
}

function stripTrailingNoise(text: string): string {
  return text.replace(TRAILING_NOISE, "");
}

function hasMarker(line: string, markers: readonly RegExp[]): boolean {
  const lower = line.toLowerCase();
  return markers.some((marker) => marker.test(lower));
}

function hasNoResultPhrase(text: string): boolean {
  const lower = text.toLowerCase();
  return NO_RESULT_PHRASES.some((phrase) => lower.includes(phrase));
}

export function isValidCommand(text: string): boolean {
  const command = text.trim();
  if (command.length < 2 || hasNoResultPhrase(command)) {
    return false;
  }
  if (SUDO_PREFIX.test(command) || ENV_ASSIGNMENT.test(command)) {
    return true;
  }
  const firstToken = command.split(/\s+/)[0];
  return COMMAND_PROGRAMS.has(firstToken);
}

export function isValidSql(text: string): boolean {
  const query = text.trim().toUpperCase();
  if (query.length < 3 || hasNoResultPhrase(query)) {
    return false;
  }
  return SQL_KEYWORDS.some((keyword) => keyword.test(query));
}

/** Reduces raw model output to a single command line, or "" when nothing usable remains. */
export function sanitizeCommand(raw: string): string {
  if (!raw) {
    return "";
  }
  const body = stripLeadIns(stripFences(raw), COMMAND_LEAD_INS);
  const lines = splitLines(body);
  const kept: string[] = [];
  for (const line of lines) {
    if (hasMarker(line, COMMAND_MARKERS)) {
      break;
    }
    kept.push(line);
  }
  const joined = stripTrailingNoise(kept.join(" "));
  if (isValidCommand(joined)) {
    return joined;
  }
  // Fall back to the first line that stands on its own as a command.
  for (const line of lines) {
    const candidate = stripTrailingNoise(stripLeadIns(line, COMMAND_LEAD_INS));
    if (isValidCommand(candidate)) {
      return candidate;
    }
  }
  return "";
}

/** Reduces raw model output to the SQL statement lines, or "" when no query is present. */
export function sanitizeSql(raw: string): string {
  if (!raw) {
    return "";
  }
  const body = stripLeadIns(stripFences(raw), SQL_LEAD_INS);
  const kept: string[] = [];
  let started = false;
  for (const line of splitLines(body)) {
    if (!started) {
      if (!SQL_STATEMENT_START.test(line)) {
        continue;
      }
      started = true;
      kept.push(line);
      continue;
    }
    if (line.startsWith("```") || hasMarker(line, SQL_MARKERS)) {
      break;
    }
    if (SQL_COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      continue;
    }
    kept.push(line);
  }
  const query = stripTrailingNoise(kept.join("\n"));
  return isValidSql(query) ? query : "";
}

export function sanitize(raw: string, kind: ArtifactKind): string {
  return kind === "sql" ? sanitizeSql(raw) : sanitizeCommand(raw);
}
