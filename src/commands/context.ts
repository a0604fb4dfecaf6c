import { createConfigStore, loadConfig } from "../config";
import { createCredentialStore } from "../config/credentials";
import { createHistoryStore } from "../history/store";
import { DEFAULT_MAX_PROMPT_ATTEMPTS, LookupOrchestrator } from "../lookup/orchestrator";
import { CredentialStore, HistoryStore, OutputSink, PromptReader } from "../lookup/types";
import { createSystemClipboard } from "../platform/clipboard";
import { createProviderFactory } from "../providers";
import { createUsageStore } from "../telemetry/usage";
import { createConsoleOutput } from "../ui/output";
import { createPromptReader, readsQueuedAnswers } from "../ui/prompt";

export type AppContext = {
  orchestrator: LookupOrchestrator;
  credentials: CredentialStore;
  history: HistoryStore;
  prompt: PromptReader;
  output: OutputSink;
};

export function createAppContext(): AppContext {
  const output = createConsoleOutput();
  const prompt = createPromptReader();
  const history = createHistoryStore();
  const credentials = createCredentialStore({ localBaseUrl: () => loadConfig().ollama.base_url });
  const orchestrator = new LookupOrchestrator({
    config: createConfigStore(),
    credentials,
    history,
    usage: createUsageStore(),
    clipboard: createSystemClipboard(),
    prompt,
    factory: createProviderFactory(),
    output,
    // Interactive sessions keep asking until a usable prompt or "exit".
    maxPromptAttempts: readsQueuedAnswers() ? DEFAULT_MAX_PROMPT_ATTEMPTS : undefined
  });
  return { orchestrator, credentials, history, prompt, output };
}
