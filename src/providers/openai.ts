import { buildPrompt } from "./registry";
import { callProvider, timeoutFromEnv, trimTrailingSlash } from "./http";
import { checkKeyFormat } from "./credentials";
import { AdapterOptions, GenerationKind, ModelDescriptor, OpenAIAdapter, ProviderCredential, ProviderResult } from "./types";

const OPENAI_BASE_URL = "https://api.openai.com/v1";

type ChatCompletionResponse = {
  choices: Array<{ message: { content?: string | null } }>;
};

export function createOpenAIAdapter(
  model: ModelDescriptor,
  credential: ProviderCredential,
  options: AdapterOptions = {}
): OpenAIAdapter {
  const endpoint = `${trimTrailingSlash(options.baseUrl ?? credential.baseUrl ?? OPENAI_BASE_URL)}/chat/completions`;
  const timeoutMs = options.timeoutMs ?? timeoutFromEnv();

  const generate = (kind: GenerationKind, prompt: string): Promise<ProviderResult> => {
    const built = buildPrompt(model, kind, prompt);
    return callProvider<ChatCompletionResponse>(
      "OpenAI",
      {
        url: endpoint,
        headers: { Authorization: `Bearer ${credential.secret}` },
        body: {
          model: model.apiModel,
          messages: [
            { role: "system", content: built.system },
            { role: "user", content: built.user }
          ],
          max_tokens: options.maxTokens ?? built.maxTokens,
          temperature: options.temperature ?? model.temperature,
          n: 1
        },
        timeoutMs
      },
      "openai-response.schema.json",
      (envelope) => envelope.choices[0]?.message.content
    );
  };

  return {
    id: "openai",
    label: "OpenAI",
    model,
    endpoint,
    generateCommand: (prompt) => generate("command", prompt),
    generateSqlQuery: (prompt) => generate("sql", prompt),
    answerQuestion: (question) => generate("answer", question),
    validateCredential: async () => checkKeyFormat("openai", credential.secret)
  };
}
