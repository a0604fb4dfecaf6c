import { describe, expect, it } from "vitest";
import { ERROR_CODES, describeError, errorKind, formatError } from "../src/errors";

describe("errors", () => {
  it("formats codes in brackets", () => {
    expect(formatError(ERROR_CODES.blocked, "Command chaining is not allowed.")).toBe(
      "[SHS-1402] Command chaining is not allowed."
    );
  });

  it("maps codes to their kind", () => {
    expect(errorKind(ERROR_CODES.promptTooShort)).toBe("input_validation");
    expect(errorKind(ERROR_CODES.unknownModel)).toBe("configuration");
    expect(errorKind(ERROR_CODES.providerFailure)).toBe("transient_provider");
    expect(errorKind(ERROR_CODES.noResult)).toBe("content_rejection");
    expect(errorKind(ERROR_CODES.clipboard)).toBe("storage");
  });

  it("describes thrown values", () => {
    expect(describeError(new Error("disk full"))).toBe("disk full");
    expect(describeError("timeout")).toBe("timeout");
  });
});
