import { describeError } from "../errors";
import { conformsTo, validateJson } from "../validation/validate";
import { ProviderFailure, ProviderResult } from "./types";

export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;
export const PROBE_TIMEOUT_MS = 5_000;

export type HttpCall = {
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
};

export type HttpOutcome = { ok: true; status: number; data: unknown } | { ok: false; failure: ProviderFailure };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hintForStatus(provider: string, status: number): string {
  if (status === 401 || status === 403) {
    return `Check the API key with: shellscribe key set ${provider.toLowerCase()}`;
  }
  if (status === 404) {
    return "Check the model name with: shellscribe models list";
  }
  if (status === 429) {
    return "Rate limited or quota exhausted. Wait a moment and try again.";
  }
  if (status >= 500) {
    return "The provider is having problems. Try again later.";
  }
  return "Check the request settings and try again.";
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractErrorMessage(text: string): string {
  const parsed = tryParseJson(text);
  if (isRecord(parsed)) {
    const nested = parsed.error;
    if (isRecord(nested) && typeof nested.message === "string") {
      return nested.message;
    }
    if (typeof nested === "string") {
      return nested;
    }
    if (typeof parsed.message === "string") {
      return parsed.message;
    }
  }
  const flat = text.trim().replace(/\s+/g, " ");
  return flat.length > 200 ? `${flat.slice(0, 200)}...` : flat;
}

export async function requestJson(provider: string, call: HttpCall): Promise<HttpOutcome> {
  const abort = new AbortController();
  const timer = setTimeout(() => abort.abort(), call.timeoutMs);
  let res: Response;
  try {
    res = await fetch(call.url, {
      method: call.method ?? "POST",
      headers: { "Content-Type": "application/json", ...(call.headers ?? {}) },
      body: call.body === undefined ? undefined : JSON.stringify(call.body),
      signal: abort.signal
    });
  } catch (error) {
    const timedOut = abort.signal.aborted;
    return {
      ok: false,
      failure: {
        provider,
        message: timedOut ? `request timed out after ${call.timeoutMs}ms` : `network error: ${describeError(error)}`,
        hint: timedOut
          ? "Check your connection or raise network.timeout_ms in the config."
          : "Check your network connection and the provider URL."
      }
    };
  } finally {
    clearTimeout(timer);
  }

  let text: string;
  try {
    text = await res.text();
  } catch (error) {
    return {
      ok: false,
      failure: { provider, code: res.status, message: `could not read response: ${describeError(error)}`, hint: "Try again." }
    };
  }

  if (!res.ok) {
    const detail = extractErrorMessage(text);
    return {
      ok: false,
      failure: {
        provider,
        code: res.status,
        message: detail ? `HTTP ${res.status}: ${detail}` : `HTTP ${res.status}`,
        hint: hintForStatus(provider, res.status)
      }
    };
  }

  try {
    return { ok: true, status: res.status, data: JSON.parse(text) };
  } catch {
    return {
      ok: false,
      failure: { provider, code: res.status, message: "malformed JSON in response", hint: "Try again; the provider returned an unexpected body." }
    };
  }
}

/**
 * Validates the provider envelope and pulls the generated text out of it.
 * Anything that does not fit the schema, or yields blank text, is a failure.
 */
export function unwrapText<T>(
  provider: string,
  data: unknown,
  schemaFile: string,
  extract: (envelope: T) => string | null | undefined
): ProviderResult {
  if (!conformsTo<T>(schemaFile, data)) {
    const { errors } = validateJson(schemaFile, data);
    return {
      ok: false,
      error: {
        provider,
        message: `unexpected response shape${errors.length ? ` (${errors[0]})` : ""}`,
        hint: "Try again; the provider returned an unexpected body."
      }
    };
  }
  const text = extract(data)?.trim() ?? "";
  if (!text) {
    return {
      ok: false,
      error: { provider, message: "empty response", hint: "Try rephrasing the prompt or pick another model." }
    };
  }
  return { ok: true, output: text };
}

export async function callProvider<T>(
  provider: string,
  call: HttpCall,
  schemaFile: string,
  extract: (envelope: T) => string | null | undefined
): Promise<ProviderResult> {
  const outcome = await requestJson(provider, call);
  if (!outcome.ok) {
    return { ok: false, error: outcome.failure };
  }
  return unwrapText<T>(provider, outcome.data, schemaFile, extract);
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function timeoutFromEnv(fallback = DEFAULT_HTTP_TIMEOUT_MS): number {
  const raw = Number.parseInt(process.env.SHELLSCRIBE_HTTP_TIMEOUT_MS ?? "", 10);
  if (!Number.isFinite(raw) || raw <= 0) {
    return fallback;
  }
  return raw;
}
