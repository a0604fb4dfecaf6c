import { describe, expect, it } from "vitest";
import { createProviderFactory, credentialFingerprint, normalizeProviderId } from "../../src/providers";

const openai = { providerId: "openai" as const, secret: "sk-test-secret-0000000000" };

describe("createProviderFactory", () => {
  it("builds the adapter matching the model's provider", () => {
    const factory = createProviderFactory();

    expect(factory.create("gpt-4", openai)?.id).toBe("openai");
    expect(factory.create("claude-3-opus", { providerId: "anthropic", secret: "sk-ant-test-secret-000000" })?.id).toBe(
      "anthropic"
    );
    expect(factory.create("gemini-pro", { providerId: "google", secret: "test-secret" })?.id).toBe("google");
    expect(factory.create("command-light", { providerId: "cohere", secret: "test-secret" })?.id).toBe("cohere");
    expect(factory.create("codellama", { providerId: "ollama", secret: "" })?.id).toBe("ollama");
  });

  it("reuses adapters for the same model, credential and options", () => {
    const factory = createProviderFactory();

    const first = factory.create("gpt-4", openai);
    const again = factory.create("GPT-4", { ...openai });
    const aliased = factory.create("gpt4", openai);

    expect(again).toBe(first);
    expect(aliased).toBe(first);
    expect(factory.size()).toBe(1);
  });

  it("keeps separate adapters per secret and per options", () => {
    const factory = createProviderFactory();

    const first = factory.create("gpt-4", openai);
    const otherKey = factory.create("gpt-4", { ...openai, secret: "sk-test-secret-1111111111" });
    const otherTimeout = factory.create("gpt-4", openai, { timeoutMs: 1000 });

    expect(otherKey).not.toBe(first);
    expect(otherTimeout).not.toBe(first);
    expect(factory.size()).toBe(3);
    factory.clear();
    expect(factory.size()).toBe(0);
  });

  it("returns undefined for unknown models and provider mismatches", () => {
    const factory = createProviderFactory();

    expect(factory.create("gpt-9000", openai)).toBeUndefined();
    expect(factory.create("claude-3-opus", openai)).toBeUndefined();
    expect(factory.size()).toBe(0);
  });
});

describe("credentialFingerprint", () => {
  it("never contains the secret itself", () => {
    const fingerprint = credentialFingerprint(openai);

    expect(fingerprint).toMatch(/^openai:[0-9a-f]{12}:$/);
    expect(fingerprint.includes(openai.secret)).toBe(false);
  });
});

describe("normalizeProviderId", () => {
  it("accepts known ids in any case", () => {
    expect(normalizeProviderId(" OpenAI ")).toBe("openai");
    expect(normalizeProviderId("mistral")).toBeNull();
    expect(normalizeProviderId(undefined)).toBeNull();
  });
});
