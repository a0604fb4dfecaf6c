import fs from "fs";
import os from "os";
import path from "path";
import { type Mock, vi } from "vitest";
import {
  ActiveModel,
  Clipboard,
  ConfigStore,
  CredentialStore,
  HistoryEntry,
  HistoryStore,
  OutputSink,
  PromptReader,
  UsageStore
} from "../../src/lookup/types";
import { resolveModel } from "../../src/providers/registry";
import { ModelDescriptor, PROVIDER_IDS, ProviderCredential, ProviderId, UsageRecord } from "../../src/providers/types";

export type FetchMock = Mock<(input: string, init?: RequestInit) => Promise<Response>>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export function stubFetch(...responses: Response[]): FetchMock {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function requestBody(fetchMock: FetchMock, call = 0): Record<string, unknown> {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body ?? "{}"));
}

export function requestHeader(fetchMock: FetchMock, name: string, call = 0): string | null {
  return new Headers(fetchMock.mock.calls[call]?.[1]?.headers).get(name);
}

export function makeTempDir(prefix = "shellscribe-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export class MemoryConfig implements ConfigStore {
  active: ActiveModel;
  clipboard = true;
  timeoutMs = 15000;

  constructor(active: ActiveModel = { modelName: "gpt-3.5-turbo", providerId: "openai" }) {
    this.active = active;
  }

  getActiveModel(): ActiveModel {
    return { ...this.active };
  }

  setActiveModel(modelName: string, providerId: ProviderId): boolean {
    this.active = { modelName, providerId };
    return true;
  }

  httpTimeoutMs(): number {
    return this.timeoutMs;
  }

  clipboardEnabled(): boolean {
    return this.clipboard;
  }
}

export class MemoryCredentials implements CredentialStore {
  private readonly secrets = new Map<ProviderId, ProviderCredential>();

  constructor(initial: Partial<Record<ProviderId, string>> = {}) {
    for (const providerId of PROVIDER_IDS) {
      const secret = initial[providerId];
      if (secret !== undefined) {
        this.secrets.set(providerId, { providerId, secret });
      }
    }
  }

  getCredential(providerId: ProviderId): ProviderCredential | undefined {
    if (providerId === "ollama") {
      return this.secrets.get(providerId) ?? { providerId, secret: "", baseUrl: "http://localhost:11434" };
    }
    return this.secrets.get(providerId);
  }

  setCredential(providerId: ProviderId, secret: string, baseUrl?: string): boolean {
    this.secrets.set(providerId, { providerId, secret, baseUrl });
    return true;
  }

  listConfigured(): ProviderId[] {
    return [...this.secrets.keys()];
  }
}

export class MemoryHistory implements HistoryStore {
  entries: HistoryEntry[] = [];
  failAppend = false;
  private nextId = 1;

  append(prompt: string, result: string, modelName: string, providerId: ProviderId): boolean {
    if (this.failAppend) {
      return false;
    }
    this.entries.push({ id: this.nextId, prompt, result, modelName, providerId, createdAt: "2024-01-01T00:00:00.000Z" });
    this.nextId += 1;
    return true;
  }

  list(limit = 20): HistoryEntry[] {
    return this.entries.slice(Math.max(0, this.entries.length - limit)).reverse();
  }

  last(): HistoryEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  remove(id: number): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.id !== id);
    return this.entries.length !== before;
  }

  removeLast(): boolean {
    const last = this.last();
    return last ? this.remove(last.id) : false;
  }

  clear(): number {
    const removed = this.entries.length;
    this.entries = [];
    return removed;
  }

  count(): number {
    return this.entries.length;
  }
}

export class MemoryUsage implements UsageStore {
  records: UsageRecord[] = [];
  failRecord = false;

  record(record: UsageRecord): void {
    if (this.failRecord) {
      throw new Error("disk full");
    }
    this.records.push(record);
  }

  since(): UsageRecord[] {
    return [...this.records];
  }
}

export class MemoryClipboard implements Clipboard {
  copied: string[] = [];
  fail = false;

  copy(text: string): void {
    if (this.fail) {
      throw new Error("no clipboard tool succeeded");
    }
    this.copied.push(text);
  }
}

export class ScriptedPrompt implements PromptReader {
  questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? "exit";
  }
}

export type OutputLine = { level: "info" | "success" | "warn" | "error"; line: string; code?: string };

export class RecordingOutput implements OutputSink {
  lines: OutputLine[] = [];

  info(line: string): void {
    this.lines.push({ level: "info", line });
  }

  success(line: string): void {
    this.lines.push({ level: "success", line });
  }

  warn(line: string): void {
    this.lines.push({ level: "warn", line });
  }

  error(code: string, line: string): void {
    this.lines.push({ level: "error", line, code });
  }

  at(level: OutputLine["level"]): string[] {
    return this.lines.filter((entry) => entry.level === level).map((entry) => entry.line);
  }
}

export function modelNamed(name: string): ModelDescriptor {
  const model = resolveModel(name);
  if (!model) {
    throw new Error(`${name} missing from registry`);
  }
  return model;
}
