import crypto from "crypto";
import { createAnthropicAdapter } from "./anthropic";
import { createCohereAdapter } from "./cohere";
import { createGoogleAdapter } from "./google";
import { createOllamaAdapter } from "./ollama";
import { createOpenAIAdapter } from "./openai";
import { resolveModel } from "./registry";
import { AdapterOptions, ModelDescriptor, ProviderAdapter, ProviderCredential, ProviderId, isProviderId } from "./types";

export const PROVIDER_LABELS: Record<ProviderId, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  google: "Google",
  cohere: "Cohere",
  ollama: "Ollama"
};

export function normalizeProviderId(input?: string): ProviderId | null {
  const raw = (input ?? "").trim().toLowerCase();
  if (!raw) {
    return null;
  }
  return isProviderId(raw) ? raw : null;
}

export function credentialFingerprint(credential: ProviderCredential): string {
  const digest = crypto.createHash("sha256").update(credential.secret).digest("hex").slice(0, 12);
  return `${credential.providerId}:${digest}:${credential.baseUrl ?? ""}`;
}

function buildAdapter(model: ModelDescriptor, credential: ProviderCredential, options: AdapterOptions): ProviderAdapter {
  const providerId: ProviderId = model.providerId;
  switch (providerId) {
    case "openai":
      return createOpenAIAdapter(model, credential, options);
    case "anthropic":
      return createAnthropicAdapter(model, credential, options);
    case "google":
      return createGoogleAdapter(model, credential, options);
    case "cohere":
      return createCohereAdapter(model, credential, options);
    case "ollama":
      return createOllamaAdapter(model, credential, options);
    default: {
      const unsupported: never = providerId;
      throw new Error(`Unsupported provider: ${String(unsupported)}`);
    }
  }
}

export type ProviderFactory = {
  create: (modelName: string, credential: ProviderCredential, options?: AdapterOptions) => ProviderAdapter | undefined;
  clear: () => void;
  size: () => number;
};

/**
 * Builds adapters for registry models and keeps one instance per
 * (model, credential, options) for the life of the process.
 */
export function createProviderFactory(): ProviderFactory {
  const cache = new Map<string, ProviderAdapter>();

  const create = (
    modelName: string,
    credential: ProviderCredential,
    options: AdapterOptions = {}
  ): ProviderAdapter | undefined => {
    const model = resolveModel(modelName);
    if (!model || model.providerId !== credential.providerId) {
      return undefined;
    }
    const key = [model.canonicalName, credentialFingerprint(credential), JSON.stringify(options)].join("|");
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }
    const adapter = buildAdapter(model, credential, options);
    cache.set(key, adapter);
    return adapter;
  };

  return {
    create,
    clear: () => cache.clear(),
    size: () => cache.size
  };
}
