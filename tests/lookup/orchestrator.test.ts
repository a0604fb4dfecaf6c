import { describe, expect, it, vi } from "vitest";
import {
  GENERATION_FAILED_MESSAGE,
  GOODBYE_MESSAGE,
  LookupOrchestrator,
  NO_RESULT_MESSAGE
} from "../../src/lookup/orchestrator";
import { createProviderFactory } from "../../src/providers";
import { ActiveModel } from "../../src/lookup/types";
import { ProviderId } from "../../src/providers/types";
import {
  MemoryClipboard,
  MemoryConfig,
  MemoryCredentials,
  MemoryHistory,
  MemoryUsage,
  RecordingOutput,
  ScriptedPrompt,
  jsonResponse,
  requestBody,
  stubFetch
} from "../helpers/fakes";

const OPENAI_KEY = "sk-test-secret-0000000000";
const START = Date.parse("2024-05-01T00:00:00.000Z");

type SetupOptions = {
  answers?: string[];
  keys?: Partial<Record<ProviderId, string>>;
  active?: ActiveModel;
  maxPromptAttempts?: number;
};

function setup(options: SetupOptions = {}) {
  const config = new MemoryConfig(options.active);
  const credentials = new MemoryCredentials(options.keys ?? { openai: OPENAI_KEY });
  const history = new MemoryHistory();
  const usage = new MemoryUsage();
  const clipboard = new MemoryClipboard();
  const prompt = new ScriptedPrompt(options.answers ?? ["show the repository status please"]);
  const output = new RecordingOutput();
  const factory = createProviderFactory();
  const create = vi.spyOn(factory, "create");
  let tick = 0;
  // Each reading of the clock advances it by 1.5 s.
  const clock = () => new Date(START + 1500 * tick++);
  const orchestrator = new LookupOrchestrator({
    config,
    credentials,
    history,
    usage,
    clipboard,
    prompt,
    factory,
    output,
    clock,
    maxPromptAttempts: options.maxPromptAttempts
  });
  return { orchestrator, config, credentials, history, usage, clipboard, prompt, output, create };
}

function chatReply(content: string) {
  return jsonResponse({ choices: [{ message: { content } }] });
}

describe("LookupOrchestrator.lookupCommand", () => {
  it("accepts a fenced command, copies it and records history and usage", async () => {
    const fetchMock = stubFetch(chatReply("```bash\ngit status\n```"));
    const { orchestrator, history, usage, clipboard, output } = setup();

    const outcome = await orchestrator.lookupCommand();

    expect(outcome).toEqual({
      state: "accepted",
      result: "git status",
      message: "git status",
      phases: ["idle", "provider_resolved", "awaiting_prompt", "generating", "sanitizing", "safety_checked", "accepted"]
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(clipboard.copied).toEqual(["git status"]);
    expect(history.entries).toEqual([
      {
        id: 1,
        prompt: "show the repository status please",
        result: "git status",
        modelName: "gpt-3.5-turbo",
        providerId: "openai",
        createdAt: "2024-01-01T00:00:00.000Z"
      }
    ]);
    expect(usage.records).toEqual([
      {
        providerId: "openai",
        modelName: "gpt-3.5-turbo",
        responseTime: 1.5,
        success: true,
        at: "2024-05-01T00:00:03.000Z"
      }
    ]);
    expect(output.at("success")).toEqual(["git status"]);
  });

  it("rejects a command the safety gate blocks", async () => {
    stubFetch(chatReply("Here is the command: rm -rf / ; echo done"));
    const { orchestrator, history, usage, clipboard, output } = setup();

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("rejected");
    expect(outcome.code).toBe("SHS-1402");
    expect(outcome.message).toBe("Potentially dangerous command detected: command separator (;).");
    expect(outcome.result).toBeUndefined();
    expect(history.entries).toEqual([]);
    expect(clipboard.copied).toEqual([]);
    expect(usage.records.map((record) => record.success)).toEqual([true]);
    expect(output.at("success")).toEqual([]);
  });

  it("rejects a reply with no command in it", async () => {
    stubFetch(chatReply("I cannot help with that"));
    const { orchestrator, usage, output } = setup();

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("rejected");
    expect(outcome.code).toBe("SHS-1401");
    expect(outcome.message).toBe(NO_RESULT_MESSAGE);
    expect(output.at("error")).toEqual([NO_RESULT_MESSAGE]);
    expect(usage.records.map((record) => record.success)).toEqual([true]);
  });

  it("fails with diagnostics when the provider errors", async () => {
    stubFetch(jsonResponse({ error: { message: "overloaded" } }, 500));
    const { orchestrator, usage, output, history } = setup();

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("failed");
    expect(outcome.message).toBe(GENERATION_FAILED_MESSAGE);
    expect(outcome.code).toBe("SHS-1301");
    expect(output.at("info")).toContain(
      "OpenAI (HTTP 500): HTTP 500: overloaded. The provider is having problems. Try again later."
    );
    expect(usage.records.map((record) => record.success)).toEqual([false]);
    expect(history.entries).toEqual([]);
  });

  it("re-prompts on a short prompt and records nothing when the user exits", async () => {
    const fetchMock = stubFetch();
    const { orchestrator, usage, output, prompt } = setup({ answers: ["ls", "exit"] });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("cancelled");
    expect(outcome.message).toBe(GOODBYE_MESSAGE);
    expect(prompt.questions).toHaveLength(2);
    expect(output.lines.filter((line) => line.level === "error").map((line) => line.code)).toEqual(["SHS-1101"]);
    expect(usage.records).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("re-prompts on disallowed characters and silently on blank input", async () => {
    stubFetch(chatReply("ls -la"));
    const { orchestrator, output } = setup({
      answers: ["", "   ", "list files; remove everything", "list all files here"]
    });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("accepted");
    expect(output.lines.filter((line) => line.level === "error").map((line) => line.code)).toEqual(["SHS-1102"]);
  });

  it("does not count blank input towards the attempt limit", async () => {
    stubFetch(chatReply("ls -la"));
    const { orchestrator } = setup({ answers: ["", "", "", "", "", "list all files here"], maxPromptAttempts: 5 });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("accepted");
    expect(outcome.result).toBe("ls -la");
  });

  it("keeps asking without a limit when none is configured", async () => {
    stubFetch(chatReply("ls -la"));
    const { orchestrator, prompt } = setup({
      answers: ["ls", "ls", "ls", "ls", "ls", "ls", "list all files here"]
    });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("accepted");
    expect(prompt.questions).toHaveLength(7);
  });

  it("gives up after the maximum number of prompt attempts", async () => {
    const { orchestrator, usage } = setup({ answers: ["ls", "ls"], maxPromptAttempts: 2 });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("failed");
    expect(outcome.code).toBe("SHS-1101");
    expect(outcome.message).toBe("No usable prompt after 2 attempts.");
    expect(usage.records).toEqual([]);
  });

  it("fails before building an adapter when the provider has no key", async () => {
    const { orchestrator, create, prompt } = setup({ keys: {} });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome).toEqual({
      state: "failed",
      message: "No API key configured for OpenAI. Run: shellscribe key set openai",
      code: "SHS-1201",
      phases: ["idle", "failed"]
    });
    expect(create).not.toHaveBeenCalled();
    expect(prompt.questions).toEqual([]);
  });

  it("fails on a malformed key without calling the provider", async () => {
    const fetchMock = stubFetch();
    const { orchestrator } = setup({ keys: { openai: "bad-key" } });

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.code).toBe("SHS-1202");
    expect(outcome.message).toBe("openai API keys start with 'sk-'. Run: shellscribe key set openai");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("suggests a model when the override is unknown", async () => {
    const { orchestrator } = setup();

    const outcome = await orchestrator.lookupCommand({ model: "gpt-5" });

    expect(outcome.code).toBe("SHS-1203");
    expect(outcome.message).toBe("Unknown model 'gpt-5'. Did you mean gpt-4?");
  });

  it("uses the override model and its provider", async () => {
    const fetchMock = stubFetch(jsonResponse({ content: [{ type: "text", text: "git log -n 5" }] }));
    const { orchestrator, history } = setup({
      keys: { anthropic: "sk-ant-test-secret-000000" },
      answers: ["show the last five commits"]
    });

    const outcome = await orchestrator.lookupCommand({ model: "Claude-Haiku", noCopy: true });

    expect(outcome.result).toBe("git log -n 5");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.anthropic.com/v1/messages");
    expect(history.entries[0]?.modelName).toBe("claude-3-haiku");
    expect(history.entries[0]?.providerId).toBe("anthropic");
  });

  it("runs a local model after probing the server", async () => {
    const fetchMock = stubFetch(
      jsonResponse({ models: [{ name: "mistral:latest" }] }),
      jsonResponse({ response: "df -h", done: true })
    );
    const { orchestrator } = setup({ keys: {}, active: { modelName: "mistral", providerId: "ollama" } });

    const outcome = await orchestrator.lookupCommand({ noCopy: true });

    expect(outcome.result).toBe("df -h");
    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "http://localhost:11434/api/tags",
      "http://localhost:11434/api/generate"
    ]);
  });

  it("does not copy when asked not to or when the clipboard is disabled", async () => {
    stubFetch(chatReply("pwd"), chatReply("pwd"));
    const first = setup({ answers: ["print working directory path"] });
    const second = setup({ answers: ["print working directory path"] });
    second.config.clipboard = false;

    await first.orchestrator.lookupCommand({ noCopy: true });
    await second.orchestrator.lookupCommand();

    expect(first.clipboard.copied).toEqual([]);
    expect(second.clipboard.copied).toEqual([]);
  });

  it("warns but still prints the result when side effects fail", async () => {
    stubFetch(chatReply("uptime"));
    const { orchestrator, clipboard, history, usage, output } = setup({ answers: ["how long running so far"] });
    clipboard.fail = true;
    history.failAppend = true;
    usage.failRecord = true;

    const outcome = await orchestrator.lookupCommand();

    expect(outcome.state).toBe("accepted");
    expect(output.at("warn")).toEqual([
      "[SHS-1503] Could not record usage: disk full",
      "[SHS-1502] Clipboard unavailable (no clipboard tool succeeded); copy manually.",
      "[SHS-1501] Could not save this result to history."
    ]);
    expect(output.at("success")).toEqual(["uptime"]);
  });
});

describe("LookupOrchestrator.lookupSqlQuery", () => {
  it("accepts a read-only query", async () => {
    const fetchMock = stubFetch(chatReply("```sql\nSELECT name FROM users WHERE active = 1;\n```"));
    const { orchestrator, prompt } = setup({ answers: ["lists the active users"] });

    const outcome = await orchestrator.lookupSqlQuery({ noCopy: true });

    expect(outcome.result).toBe("SELECT name FROM users WHERE active = 1;");
    expect(prompt.questions).toEqual(["Describe the SQL query you need (or 'exit'): "]);
    expect(requestBody(fetchMock).max_tokens).toBe(200);
  });

  it("rejects a destructive statement stacked after a SELECT", async () => {
    stubFetch(chatReply("SELECT * FROM users; DROP TABLE users"));
    const { orchestrator, history } = setup({ answers: ["lists every user row"] });

    const outcome = await orchestrator.lookupSqlQuery();

    expect(outcome.state).toBe("rejected");
    expect(outcome.message).toBe(
      "Destructive SQL is blocked (DROP). Ask explicitly for a read-only query or write it by hand."
    );
    expect(history.entries).toEqual([]);
  });

  it("rejects a stacked statement hidden after a quote inside a comment", async () => {
    stubFetch(chatReply("SELECT id FROM users /* user's id */; DROP TABLE users"));
    const { orchestrator, history, clipboard } = setup({ answers: ["lists every user id"] });

    const outcome = await orchestrator.lookupSqlQuery();

    expect(outcome.state).toBe("rejected");
    expect(outcome.code).toBe("SHS-1402");
    expect(history.entries).toEqual([]);
    expect(clipboard.copied).toEqual([]);
  });
});

describe("LookupOrchestrator model management", () => {
  it("sets a model only when its provider is usable", () => {
    const { orchestrator, config, output } = setup();

    expect(orchestrator.setModel("gpt-9000")).toBe(false);
    expect(orchestrator.setModel("claude-3-opus")).toBe(false);
    expect(orchestrator.setModel("GPT4")).toBe(true);
    expect(config.active).toEqual({ modelName: "gpt-4", providerId: "openai" });
    expect(orchestrator.setModel("mistral")).toBe(true);
    expect(orchestrator.currentModel()).toEqual({ modelName: "mistral", providerId: "ollama" });
    expect(output.lines.filter((line) => line.level === "error").map((line) => line.code)).toEqual([
      "SHS-1203",
      "SHS-1201"
    ]);
  });

  it("lists the registry", () => {
    const { orchestrator } = setup();

    expect(orchestrator.listModels().map((model) => model.canonicalName)).toContain("llama3.2:3b");
  });

  it("summarises usage", () => {
    const { orchestrator, usage } = setup();
    usage.records = [
      { providerId: "openai", modelName: "gpt-4", responseTime: 1.25, success: true, at: "2024-05-01T00:00:00.000Z" },
      { providerId: "openai", modelName: "gpt-4", responseTime: 0.5, success: false, at: "2024-05-01T00:01:00.000Z" },
      { providerId: "ollama", modelName: "mistral", responseTime: 2, success: true, at: "2024-05-01T00:02:00.000Z" }
    ];

    expect(orchestrator.getPerformanceStats(7)).toEqual({
      totalRequests: 3,
      successCount: 2,
      failureCount: 1,
      avgResponseTime: 1.25,
      modelsUsed: ["ollama/mistral", "openai/gpt-4"]
    });
  });
});

describe("LookupOrchestrator quick answers", () => {
  it("extracts a hex color code", async () => {
    const fetchMock = stubFetch(chatReply("The color is #ff5733."));
    const { orchestrator, output } = setup();

    const outcome = await orchestrator.lookupColorCode("tomato red");

    expect(outcome.result).toBe("#FF5733");
    expect(output.at("success")).toEqual(["#FF5733"]);
    const messages = requestBody(fetchMock).messages;
    expect(messages).toEqual([
      { role: "system", content: "Answer with a single short line. No explanations, no markdown." },
      { role: "user", content: "What is the hex color code for tomato red, printed as #RRGGBB?" }
    ]);
  });

  it("rejects a color reply without a hex code", async () => {
    stubFetch(chatReply("It is a warm red."));
    const { orchestrator } = setup();

    const outcome = await orchestrator.lookupColorCode("tomato red");

    expect(outcome.state).toBe("rejected");
    expect(outcome.code).toBe("SHS-1401");
  });

  it("keeps the first line of a port answer", async () => {
    stubFetch(chatReply("SSH (Secure Shell)\nUsed for remote login."));
    const { orchestrator } = setup();

    const outcome = await orchestrator.lookupPort(22);

    expect(outcome.result).toBe("SSH (Secure Shell)");
  });

  it("validates the port before calling the provider", async () => {
    const fetchMock = stubFetch();
    const { orchestrator } = setup();

    const outcome = await orchestrator.lookupPort(70000);

    expect(outcome.state).toBe("failed");
    expect(outcome.code).toBe("SHS-1205");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
