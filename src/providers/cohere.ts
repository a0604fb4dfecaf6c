import { buildPrompt } from "./registry";
import { callProvider, timeoutFromEnv, trimTrailingSlash } from "./http";
import { checkKeyFormat } from "./credentials";
import { AdapterOptions, CohereAdapter, GenerationKind, ModelDescriptor, ProviderCredential, ProviderResult } from "./types";

const COHERE_BASE_URL = "https://api.cohere.ai/v1";

type GenerateResponse = {
  generations: Array<{ text: string }>;
};

export function createCohereAdapter(
  model: ModelDescriptor,
  credential: ProviderCredential,
  options: AdapterOptions = {}
): CohereAdapter {
  const endpoint = `${trimTrailingSlash(options.baseUrl ?? credential.baseUrl ?? COHERE_BASE_URL)}/generate`;
  const timeoutMs = options.timeoutMs ?? timeoutFromEnv();

  const generate = (kind: GenerationKind, prompt: string): Promise<ProviderResult> => {
    const built = buildPrompt(model, kind, prompt);
    return callProvider<GenerateResponse>(
      "Cohere",
      {
        url: endpoint,
        headers: { Authorization: `Bearer ${credential.secret}` },
        body: {
          model: model.apiModel,
          prompt: `${built.system}\n\n${built.user}`,
          max_tokens: options.maxTokens ?? built.maxTokens,
          temperature: options.temperature ?? model.temperature,
          num_generations: 1,
          ...(kind === "sql" ? { stop_sequences: ["\n\n", "Explanation:", "Note:"] } : {})
        },
        timeoutMs
      },
      "cohere-response.schema.json",
      (envelope) => envelope.generations[0]?.text
    );
  };

  return {
    id: "cohere",
    label: "Cohere",
    model,
    endpoint,
    generateCommand: (prompt) => generate("command", prompt),
    generateSqlQuery: (prompt) => generate("sql", prompt),
    answerQuestion: (question) => generate("answer", question),
    validateCredential: async () => checkKeyFormat("cohere", credential.secret)
  };
}
