import { buildPrompt } from "./registry";
import { PROBE_TIMEOUT_MS, callProvider, requestJson, timeoutFromEnv, trimTrailingSlash } from "./http";
import { conformsTo } from "../validation/validate";
import {
  AdapterOptions,
  CredentialCheck,
  GenerationKind,
  ModelDescriptor,
  OllamaAdapter,
  ProviderCredential,
  ProviderResult
} from "./types";

export const OLLAMA_DEFAULT_URL = "http://localhost:11434";

type GenerateResponse = {
  response: string;
};

type TagsResponse = {
  models: Array<{ name: string }>;
};

export function createOllamaAdapter(
  model: ModelDescriptor,
  credential: ProviderCredential,
  options: AdapterOptions = {}
): OllamaAdapter {
  const baseUrl = trimTrailingSlash(options.baseUrl ?? credential.baseUrl ?? OLLAMA_DEFAULT_URL);
  const timeoutMs = options.timeoutMs ?? timeoutFromEnv();

  const generate = (kind: GenerationKind, prompt: string): Promise<ProviderResult> => {
    const built = buildPrompt(model, kind, prompt);
    return callProvider<GenerateResponse>(
      "Ollama",
      {
        url: `${baseUrl}/api/generate`,
        body: {
          model: model.apiModel,
          prompt: `${built.system}\n\n${built.user}`,
          stream: false,
          options: {
            temperature: options.temperature ?? model.temperature,
            num_predict: options.maxTokens ?? built.maxTokens
          }
        },
        timeoutMs
      },
      "ollama-response.schema.json",
      (envelope) => envelope.response
    );
  };

  const fetchTags = async (): Promise<{ ok: true; names: string[] } | { ok: false; reason: string }> => {
    const outcome = await requestJson("Ollama", {
      url: `${baseUrl}/api/tags`,
      method: "GET",
      timeoutMs: Math.min(timeoutMs, PROBE_TIMEOUT_MS)
    });
    if (!outcome.ok) {
      return { ok: false, reason: outcome.failure.message };
    }
    if (!conformsTo<TagsResponse>("ollama-tags.schema.json", outcome.data)) {
      return { ok: false, reason: "unexpected model listing from the local server" };
    }
    return { ok: true, names: outcome.data.models.map((entry) => entry.name) };
  };

  // No key to check: the local server being reachable is what matters.
  const validateCredential = async (): Promise<CredentialCheck> => {
    const tags = await fetchTags();
    if (!tags.ok) {
      return { ok: false, reason: `Ollama is not reachable at ${baseUrl} (${tags.reason}). Start it with: ollama serve` };
    }
    return { ok: true };
  };

  return {
    id: "ollama",
    label: "Ollama",
    model,
    baseUrl,
    generateCommand: (prompt) => generate("command", prompt),
    generateSqlQuery: (prompt) => generate("sql", prompt),
    answerQuestion: (question) => generate("answer", question),
    validateCredential,
    listLocalModels: async () => {
      const tags = await fetchTags();
      return tags.ok ? tags.names : [];
    }
  };
}
