export type ProviderId = "openai" | "anthropic" | "google" | "cohere" | "ollama";

export const PROVIDER_IDS: readonly ProviderId[] = ["openai", "anthropic", "google", "cohere", "ollama"];

export const LOCAL_PROVIDERS: ReadonlySet<ProviderId> = new Set<ProviderId>(["ollama"]);

export type GenerationKind = "command" | "sql" | "answer";

/** Kinds whose output is sanitized and passed through the safety gate. */
export type ArtifactKind = Exclude<GenerationKind, "answer">;

export type ModelDescriptor = {
  canonicalName: string;
  /** Identifier sent to the provider when it differs from the canonical name. */
  apiModel: string;
  displayName: string;
  providerId: ProviderId;
  maxTokens: number;
  temperature: number;
  description: string;
};

export type ProviderCredential = {
  providerId: ProviderId;
  secret: string;
  baseUrl?: string;
};

export type ProviderFailure = {
  provider: string;
  code?: number;
  message: string;
  hint: string;
};

export type ProviderResult = { ok: true; output: string } | { ok: false; error: ProviderFailure };

export type CredentialCheck = { ok: true } | { ok: false; reason: string };

export type AdapterOptions = {
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
  baseUrl?: string;
};

export type UsageRecord = {
  providerId: ProviderId;
  modelName: string;
  responseTime: number;
  success: boolean;
  at: string;
};

type AdapterCapabilities = {
  label: string;
  model: ModelDescriptor;
  generateCommand: (prompt: string) => Promise<ProviderResult>;
  generateSqlQuery: (prompt: string) => Promise<ProviderResult>;
  answerQuestion: (question: string) => Promise<ProviderResult>;
  validateCredential: () => Promise<CredentialCheck>;
};

export type OpenAIAdapter = AdapterCapabilities & { id: "openai"; endpoint: string };
export type AnthropicAdapter = AdapterCapabilities & { id: "anthropic"; endpoint: string; apiVersion: string };
export type GoogleAdapter = AdapterCapabilities & { id: "google"; endpoint: string };
export type CohereAdapter = AdapterCapabilities & { id: "cohere"; endpoint: string };
export type OllamaAdapter = AdapterCapabilities & {
  id: "ollama";
  baseUrl: string;
  listLocalModels: () => Promise<string[]>;
};

export type ProviderAdapter = OpenAIAdapter | AnthropicAdapter | GoogleAdapter | CohereAdapter | OllamaAdapter;

export function isProviderId(value: string): value is ProviderId {
  return (PROVIDER_IDS as readonly string[]).includes(value);
}
