import { describe, expect, it } from "vitest";
import { clearInput, validatePrompt } from "../../src/lookup/prompt-input";

describe("validatePrompt", () => {
  it("accepts three or more words of ordinary text", () => {
    expect(validatePrompt("  find   large files  ")).toEqual({ ok: true, prompt: "find large files" });
    expect(validatePrompt("count rows where price > 10% off?")).toEqual({
      ok: false,
      reason: "invalid",
      code: "SHS-1102",
      message: "Prompt contains characters that are not allowed. Use letters, digits and common punctuation."
    });
    expect(validatePrompt("count rows where price = 10% (off)?")).toEqual({
      ok: true,
      prompt: "count rows where price = 10% (off)?"
    });
  });

  it("accepts non-ASCII letters", () => {
    expect(validatePrompt("liste les fichiers cachés").ok).toBe(true);
  });

  it("flags empty input and the exit word", () => {
    expect(validatePrompt("   ")).toEqual({ ok: false, reason: "empty" });
    expect(validatePrompt(" EXIT ")).toEqual({ ok: false, reason: "exit" });
  });

  it("rejects short prompts", () => {
    expect(validatePrompt("list files")).toEqual({
      ok: false,
      reason: "invalid",
      code: "SHS-1101",
      message: "Describe the request in at least 3 words."
    });
  });

  it("rejects shell metacharacters", () => {
    expect(validatePrompt("list files; rm everything").ok).toBe(false);
    expect(validatePrompt("show `whoami` output now").ok).toBe(false);
  });
});

describe("clearInput", () => {
  it("collapses whitespace", () => {
    expect(clearInput("\tlist \n files\n")).toBe("list files");
  });
});
