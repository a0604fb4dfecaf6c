// The messages API takes the system instruction as a top-level field and
// returns a list of content blocks; only the first text block is used.
import { buildPrompt } from "./registry";
import { callProvider, timeoutFromEnv, trimTrailingSlash } from "./http";
import { checkKeyFormat } from "./credentials";
import {
  AdapterOptions,
  AnthropicAdapter,
  GenerationKind,
  ModelDescriptor,
  ProviderCredential,
  ProviderResult
} from "./types";

const ANTHROPIC_BASE_URL = "https://api.anthropic.com/v1";
const ANTHROPIC_VERSION = "2023-06-01";

type MessagesResponse = {
  content: Array<{ type: string; text?: string }>;
};

export function createAnthropicAdapter(
  model: ModelDescriptor,
  credential: ProviderCredential,
  options: AdapterOptions = {}
): AnthropicAdapter {
  const endpoint = `${trimTrailingSlash(options.baseUrl ?? credential.baseUrl ?? ANTHROPIC_BASE_URL)}/messages`;
  const timeoutMs = options.timeoutMs ?? timeoutFromEnv();

  const generate = (kind: GenerationKind, prompt: string): Promise<ProviderResult> => {
    const built = buildPrompt(model, kind, prompt);
    return callProvider<MessagesResponse>(
      "Anthropic",
      {
        url: endpoint,
        headers: {
          "x-api-key": credential.secret,
          "anthropic-version": ANTHROPIC_VERSION
        },
        body: {
          model: model.apiModel,
          max_tokens: options.maxTokens ?? built.maxTokens,
          temperature: options.temperature ?? model.temperature,
          system: built.system,
          messages: [{ role: "user", content: built.user }]
        },
        timeoutMs
      },
      "anthropic-response.schema.json",
      (envelope) => envelope.content.find((block) => block.type === "text")?.text
    );
  };

  return {
    id: "anthropic",
    label: "Anthropic",
    model,
    endpoint,
    apiVersion: ANTHROPIC_VERSION,
    generateCommand: (prompt) => generate("command", prompt),
    generateSqlQuery: (prompt) => generate("sql", prompt),
    answerQuestion: (question) => generate("answer", question),
    validateCredential: async () => checkKeyFormat("anthropic", credential.secret)
  };
}
