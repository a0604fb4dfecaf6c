import { ERROR_CODES, ErrorCode } from "../errors";

export const EXIT_WORD = "exit";
export const MIN_PROMPT_WORDS = 3;

const ALLOWED_PROMPT = /^[\p{L}\p{N}\s_\-@$.,'"?!:/*=()%#+&]+$/u;

export type PromptCheck =
  | { ok: true; prompt: string }
  | { ok: false; reason: "empty" }
  | { ok: false; reason: "exit" }
  | { ok: false; reason: "invalid"; code: ErrorCode; message: string };

export function clearInput(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function validatePrompt(raw: string): PromptCheck {
  const prompt = clearInput(raw);
  if (!prompt) {
    return { ok: false, reason: "empty" };
  }
  if (prompt.toLowerCase() === EXIT_WORD) {
    return { ok: false, reason: "exit" };
  }
  if (!ALLOWED_PROMPT.test(prompt)) {
    return {
      ok: false,
      reason: "invalid",
      code: ERROR_CODES.promptCharacters,
      message: "Prompt contains characters that are not allowed. Use letters, digits and common punctuation."
    };
  }
  if (prompt.split(" ").length < MIN_PROMPT_WORDS) {
    return {
      ok: false,
      reason: "invalid",
      code: ERROR_CODES.promptTooShort,
      message: `Describe the request in at least ${MIN_PROMPT_WORDS} words.`
    };
  }
  return { ok: true, prompt };
}
