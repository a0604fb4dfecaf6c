import fs from "fs";
import os from "os";
import path from "path";
import { DEFAULT_HTTP_TIMEOUT_MS, timeoutFromEnv } from "../providers/http";
import { OLLAMA_DEFAULT_URL } from "../providers/ollama";
import { DEFAULT_MODEL, DEFAULT_PROVIDER, resolveModel } from "../providers/registry";
import { ProviderId } from "../providers/types";
import { normalizeProviderId } from "../providers";
import { ConfigStore } from "../lookup/types";

export type ShellscribeConfig = {
  ai: {
    model: string;
    provider: ProviderId;
  };
  ollama: {
    base_url: string;
  };
  network: {
    timeout_ms: number;
  };
  clipboard: {
    enabled: boolean;
  };
};

export const CONFIG_KEYS = ["ai.model", "ollama.base_url", "network.timeout_ms", "clipboard.enabled"] as const;

export function configPath(): string {
  const override = process.env.SHELLSCRIBE_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  const root = process.env.APPDATA
    ? path.join(process.env.APPDATA, "shellscribe")
    : path.join(os.homedir(), ".config", "shellscribe");
  return path.join(root, "config.yml");
}

export function defaultConfig(): ShellscribeConfig {
  return {
    ai: {
      model: DEFAULT_MODEL,
      provider: DEFAULT_PROVIDER
    },
    ollama: {
      base_url: OLLAMA_DEFAULT_URL
    },
    network: {
      timeout_ms: DEFAULT_HTTP_TIMEOUT_MS
    },
    clipboard: {
      enabled: true
    }
  };
}

function normalizeTimeout(value: string): number | null {
  const parsed = Number.parseInt(value.trim(), 10);
  if (!Number.isFinite(parsed) || parsed < 500 || parsed > 120_000) {
    return null;
  }
  return parsed;
}

function normalizeUrl(value: string): string | null {
  const clean = value.trim().replace(/\/+$/, "");
  return /^https?:\/\/[^\s]+$/i.test(clean) ? clean : null;
}

type PartialConfig = {
  model?: string;
  provider?: ProviderId;
  baseUrl?: string;
  timeoutMs?: number;
  clipboard?: boolean;
};

export function parseSimpleYaml(raw: string): PartialConfig {
  const result: PartialConfig = {};
  let section = "";
  const lines = raw.split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.+)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const key = valueMatch[1];
    const value = valueMatch[2].replace(/^["']|["']$/g, "");
    if (section === "ai" && key === "model") {
      result.model = value.trim();
    } else if (section === "ai" && key === "provider") {
      result.provider = normalizeProviderId(value) ?? undefined;
    } else if (section === "ollama" && key === "base_url") {
      result.baseUrl = normalizeUrl(value) ?? undefined;
    } else if (section === "network" && key === "timeout_ms") {
      result.timeoutMs = normalizeTimeout(value) ?? undefined;
    } else if (section === "clipboard" && key === "enabled") {
      result.clipboard = value.trim().toLowerCase() === "true";
    }
  }
  return result;
}

export function renderYaml(config: ShellscribeConfig): string {
  return [
    "# shellscribe configuration",
    "# ai.provider follows ai.model; change the model with: shellscribe models set <name>",
    "ai:",
    `  model: ${config.ai.model}`,
    `  provider: ${config.ai.provider}`,
    "ollama:",
    `  base_url: ${config.ollama.base_url}`,
    "network:",
    `  timeout_ms: ${config.network.timeout_ms}`,
    "clipboard:",
    `  enabled: ${config.clipboard.enabled ? "true" : "false"}`,
    ""
  ].join("\n");
}

export function mergeConfig(base: ShellscribeConfig, input: PartialConfig): ShellscribeConfig {
  const model = input.model ? resolveModel(input.model) : undefined;
  return {
    ai: {
      model: model?.canonicalName ?? base.ai.model,
      provider: model?.providerId ?? input.provider ?? base.ai.provider
    },
    ollama: {
      base_url: input.baseUrl ?? base.ollama.base_url
    },
    network: {
      timeout_ms: input.timeoutMs ?? base.network.timeout_ms
    },
    clipboard: {
      enabled: typeof input.clipboard === "boolean" ? input.clipboard : base.clipboard.enabled
    }
  };
}

export function loadConfig(): ShellscribeConfig {
  const defaults = defaultConfig();
  const file = configPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }
  try {
    const raw = fs.readFileSync(file, "utf-8");
    return mergeConfig(defaults, parseSimpleYaml(raw));
  } catch {
    return defaults;
  }
}

export function saveConfig(config: ShellscribeConfig): string {
  const file = configPath();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(): ShellscribeConfig {
  const existing = loadConfig();
  const file = configPath();
  if (!fs.existsSync(file)) {
    saveConfig(existing);
  }
  return existing;
}

export function updateConfigValue(key: string, value: string): ShellscribeConfig | null {
  const current = ensureConfig();
  const next: ShellscribeConfig = {
    ai: { ...current.ai },
    ollama: { ...current.ollama },
    network: { ...current.network },
    clipboard: { ...current.clipboard }
  };
  const normalized = key.trim().toLowerCase();
  if (normalized === "ai.model") {
    const model = resolveModel(value);
    if (!model) {
      return null;
    }
    next.ai.model = model.canonicalName;
    next.ai.provider = model.providerId;
  } else if (normalized === "ollama.base_url") {
    const url = normalizeUrl(value);
    if (!url) {
      return null;
    }
    next.ollama.base_url = url;
  } else if (normalized === "network.timeout_ms") {
    const timeout = normalizeTimeout(value);
    if (timeout === null) {
      return null;
    }
    next.network.timeout_ms = timeout;
  } else if (normalized === "clipboard.enabled") {
    next.clipboard.enabled = value.trim().toLowerCase() === "true";
  } else {
    return null;
  }
  saveConfig(next);
  return next;
}

export function createConfigStore(): ConfigStore {
  return {
    getActiveModel: () => {
      const config = loadConfig();
      return { modelName: config.ai.model, providerId: config.ai.provider };
    },
    setActiveModel: (modelName, providerId) => {
      try {
        const current = ensureConfig();
        saveConfig({ ...current, ai: { model: modelName, provider: providerId } });
        return true;
      } catch {
        return false;
      }
    },
    httpTimeoutMs: () => timeoutFromEnv(loadConfig().network.timeout_ms),
    clipboardEnabled: () => loadConfig().clipboard.enabled
  };
}
