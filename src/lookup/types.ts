import type { ProviderCredential, ProviderId, UsageRecord } from "../providers/types";

export type ActiveModel = {
  modelName: string;
  providerId: ProviderId;
};

export type ConfigStore = {
  getActiveModel: () => ActiveModel;
  setActiveModel: (modelName: string, providerId: ProviderId) => boolean;
  httpTimeoutMs: () => number;
  clipboardEnabled: () => boolean;
};

export type CredentialStore = {
  getCredential: (providerId: ProviderId) => ProviderCredential | undefined;
  setCredential: (providerId: ProviderId, secret: string, baseUrl?: string) => boolean;
  listConfigured: () => ProviderId[];
};

export type HistoryEntry = {
  id: number;
  prompt: string;
  result: string;
  modelName: string;
  providerId: ProviderId;
  createdAt: string;
};

export type HistoryStore = {
  append: (prompt: string, result: string, modelName: string, providerId: ProviderId) => boolean;
  list: (limit?: number) => HistoryEntry[];
  last: () => HistoryEntry | undefined;
  remove: (id: number) => boolean;
  removeLast: () => boolean;
  clear: () => number;
  count: () => number;
};

export type UsageStore = {
  record: (record: UsageRecord) => void;
  since: (days: number) => UsageRecord[];
};

export type Clipboard = {
  copy: (text: string) => void;
};

export type PromptReader = {
  ask: (question: string) => Promise<string>;
};

export type OutputSink = {
  info: (line: string) => void;
  success: (line: string) => void;
  warn: (line: string) => void;
  error: (code: string, line: string) => void;
};

export type PerformanceStats = {
  totalRequests: number;
  successCount: number;
  failureCount: number;
  avgResponseTime: number;
  modelsUsed: string[];
};
