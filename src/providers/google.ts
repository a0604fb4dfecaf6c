import { buildPrompt } from "./registry";
import { callProvider, timeoutFromEnv, trimTrailingSlash } from "./http";
import { checkKeyFormat } from "./credentials";
import { AdapterOptions, GenerationKind, GoogleAdapter, ModelDescriptor, ProviderCredential, ProviderResult } from "./types";

const GOOGLE_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

type GenerateContentResponse = {
  candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
};

export function createGoogleAdapter(
  model: ModelDescriptor,
  credential: ProviderCredential,
  options: AdapterOptions = {}
): GoogleAdapter {
  const base = trimTrailingSlash(options.baseUrl ?? credential.baseUrl ?? GOOGLE_BASE_URL);
  const endpoint = `${base}/models/${encodeURIComponent(model.apiModel)}:generateContent`;
  const timeoutMs = options.timeoutMs ?? timeoutFromEnv();

  const generate = (kind: GenerationKind, prompt: string): Promise<ProviderResult> => {
    const built = buildPrompt(model, kind, prompt);
    return callProvider<GenerateContentResponse>(
      "Google",
      {
        url: endpoint,
        headers: { "x-goog-api-key": credential.secret },
        body: {
          contents: [{ role: "user", parts: [{ text: `${built.system}\n\n${built.user}` }] }],
          generationConfig: {
            maxOutputTokens: options.maxTokens ?? built.maxTokens,
            temperature: options.temperature ?? model.temperature
          }
        },
        timeoutMs
      },
      "google-response.schema.json",
      (envelope) =>
        envelope.candidates?.[0]?.content?.parts
          ?.map((part) => part.text ?? "")
          .join("")
    );
  };

  return {
    id: "google",
    label: "Google",
    model,
    endpoint,
    generateCommand: (prompt) => generate("command", prompt),
    generateSqlQuery: (prompt) => generate("sql", prompt),
    answerQuestion: (question) => generate("answer", question),
    validateCredential: async () => checkKeyFormat("google", credential.secret)
  };
}
