import { distance as levenshteinDistance } from "fastest-levenshtein";
import { GenerationKind, ModelDescriptor, ProviderId } from "./types";

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_PROVIDER: ProviderId = "openai";
export const COMMAND_MAX_TOKENS = 100;
export const SQL_MAX_TOKENS = 200;
export const ANSWER_MAX_TOKENS = 60;
export const DEFAULT_TEMPERATURE = 0.7;

const SUGGESTION_CUTOFF = 0.6;

function model(
  canonicalName: string,
  displayName: string,
  providerId: ProviderId,
  description: string,
  apiModel = canonicalName
): ModelDescriptor {
  return Object.freeze({
    canonicalName,
    apiModel,
    displayName,
    providerId,
    maxTokens: COMMAND_MAX_TOKENS,
    temperature: DEFAULT_TEMPERATURE,
    description
  });
}

const MODELS: readonly ModelDescriptor[] = [
  model("gpt-3.5-turbo", "GPT-3.5 Turbo", "openai", "Fast and efficient for CLI commands"),
  model("gpt-4", "GPT-4", "openai", "Most capable model for complex commands"),
  model("gpt-4-turbo", "GPT-4 Turbo", "openai", "Latest GPT-4 with improved performance"),
  model("claude-3-haiku", "Claude 3 Haiku", "anthropic", "Fast and efficient Claude model", "claude-3-haiku-20240307"),
  model("claude-3-sonnet", "Claude 3 Sonnet", "anthropic", "Balanced Claude model for most tasks", "claude-3-sonnet-20240229"),
  model("claude-3-opus", "Claude 3 Opus", "anthropic", "Most capable Claude model", "claude-3-opus-20240229"),
  model("gemini-pro", "Gemini Pro", "google", "Google's advanced language model"),
  model("command", "Cohere Command", "cohere", "Cohere's instruction-following model"),
  model("command-light", "Cohere Command Light", "cohere", "Faster Cohere model for simple tasks"),
  model("llama2", "Llama 2 (Local)", "ollama", "Local Llama 2 model via Ollama"),
  model("codellama", "Code Llama (Local)", "ollama", "Local Code Llama model for coding tasks"),
  model("mistral", "Mistral (Local)", "ollama", "Local Mistral model via Ollama"),
  model("llama3.2:3b", "Llama 3.2 3B (Local)", "ollama", "Local Llama 3.2 3B model via Ollama")
];

const ALIASES: Readonly<Record<string, string>> = {
  gpt4: "gpt-4",
  "gpt-4o": "gpt-4",
  "gpt3.5": "gpt-3.5-turbo",
  "gpt-3.5": "gpt-3.5-turbo",
  "claude-haiku": "claude-3-haiku",
  "claude-sonnet": "claude-3-sonnet",
  "claude-opus": "claude-3-opus",
  "claude-3-haiku-20240307": "claude-3-haiku",
  "claude-3-sonnet-20240229": "claude-3-sonnet",
  "claude-3-opus-20240229": "claude-3-opus",
  gemini: "gemini-pro",
  "command-lightnight": "command-light",
  "llama-3.2-3b": "llama3.2:3b",
  llama3_2_3b: "llama3.2:3b",
  "llama32-3b": "llama3.2:3b",
  "llama3.2-3b": "llama3.2:3b"
};

const BY_NAME = new Map(MODELS.map((entry) => [entry.canonicalName.toLowerCase(), entry]));

const COMMAND_TEMPLATES: Record<ProviderId, string> = {
  openai: "Show me the CLI command for: {prompt}. Return only the command.",
  anthropic: "What CLI command would I use to: {prompt}? Provide only the command.",
  google: "CLI command for: {prompt}. Command only.",
  cohere: "Generate a command line command for: {prompt}. Return just the command.",
  ollama: "Command: {prompt}"
};

const SQL_TEMPLATE = "Write a SQL query that {prompt}. Return only the SQL query.";
const ANSWER_TEMPLATE = "What is {prompt}?";

export function resolveModel(nameOrAlias: string): ModelDescriptor | undefined {
  const key = nameOrAlias.trim().toLowerCase();
  if (!key) {
    return undefined;
  }
  const exact = BY_NAME.get(key);
  if (exact) {
    return exact;
  }
  const alias = ALIASES[key];
  return alias ? BY_NAME.get(alias) : undefined;
}

/** Closest canonical model for a name that did not resolve; shown as a hint, never applied. */
export function suggestModel(name: string): string | undefined {
  const key = name.trim().toLowerCase();
  if (!key) {
    return undefined;
  }
  const choices = [...BY_NAME.keys(), ...Object.keys(ALIASES)];
  let best: { choice: string; ratio: number } | undefined;
  for (const choice of choices) {
    const maxLength = Math.max(key.length, choice.length, 1);
    const ratio = 1 - levenshteinDistance(key, choice) / maxLength;
    if (ratio >= SUGGESTION_CUTOFF && (!best || ratio > best.ratio)) {
      best = { choice, ratio };
    }
  }
  if (!best) {
    return undefined;
  }
  return resolveModel(best.choice)?.canonicalName;
}

export function listModels(): ModelDescriptor[] {
  return [...MODELS];
}

export function listByProvider(providerId: ProviderId): ModelDescriptor[] {
  return MODELS.filter((entry) => entry.providerId === providerId);
}

export function listProviderIds(): ProviderId[] {
  return [...new Set(MODELS.map((entry) => entry.providerId))];
}

export function promptTemplate(descriptor: ModelDescriptor, kind: GenerationKind): string {
  if (kind === "sql") {
    return SQL_TEMPLATE;
  }
  if (kind === "answer") {
    return ANSWER_TEMPLATE;
  }
  return COMMAND_TEMPLATES[descriptor.providerId];
}

export function renderPrompt(template: string, prompt: string): string {
  return template.replace("{prompt}", () => prompt);
}

export function tokenBudget(kind: GenerationKind): number {
  if (kind === "answer") {
    return ANSWER_MAX_TOKENS;
  }
  return kind === "sql" ? SQL_MAX_TOKENS : COMMAND_MAX_TOKENS;
}

export const SYSTEM_INSTRUCTIONS: Record<GenerationKind, string> = {
  command: "You are a CLI command expert. Return only the command, no explanations, no markdown, no code blocks.",
  sql: "You are a database engineer. Return only the SQL query, no explanations, no markdown, no code blocks.",
  answer: "Answer with a single short line. No explanations, no markdown."
};

export type BuiltPrompt = {
  system: string;
  user: string;
  maxTokens: number;
};

export function buildPrompt(descriptor: ModelDescriptor, kind: GenerationKind, prompt: string): BuiltPrompt {
  return {
    system: SYSTEM_INSTRUCTIONS[kind],
    user: renderPrompt(promptTemplate(descriptor, kind), prompt),
    maxTokens: tokenBudget(kind)
  };
}
