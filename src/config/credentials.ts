import { readStateJson, writeStateJson } from "../platform/persistence";
import { PROVIDER_IDS, ProviderCredential, ProviderId } from "../providers/types";
import { CredentialStore } from "../lookup/types";

type CredentialEntry = {
  secret: string;
  baseUrl?: string;
  updatedAt: string;
};

type CredentialState = {
  version: number;
  providers: Partial<Record<ProviderId, CredentialEntry>>;
};

const CREDENTIALS_FILE = "state/credentials.json";
const CREDENTIALS_VERSION = 1;
const OWNER_ONLY = 0o600;

const ENV_KEYS: Record<ProviderId, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_API_KEY",
  cohere: "COHERE_API_KEY",
  ollama: "OLLAMA_HOST"
};

function emptyState(): CredentialState {
  return { version: CREDENTIALS_VERSION, providers: {} };
}

function loadState(): CredentialState {
  return readStateJson<CredentialState>(CREDENTIALS_FILE, emptyState(), "credentials.schema.json");
}

export type CredentialStoreOptions = {
  /** Base URL used for the local provider when none is stored. */
  localBaseUrl: () => string;
  env?: NodeJS.ProcessEnv;
};

export function createCredentialStore(options: CredentialStoreOptions): CredentialStore {
  const env = options.env ?? process.env;

  const getCredential = (providerId: ProviderId): ProviderCredential | undefined => {
    const entry = loadState().providers[providerId];
    if (providerId === "ollama") {
      const fromEnv = env[ENV_KEYS.ollama]?.trim();
      return {
        providerId,
        secret: "",
        baseUrl: entry?.baseUrl ?? (fromEnv || options.localBaseUrl())
      };
    }
    const secret = entry?.secret.trim() || env[ENV_KEYS[providerId]]?.trim();
    if (!secret) {
      return undefined;
    }
    return { providerId, secret, baseUrl: entry?.baseUrl };
  };

  const setCredential = (providerId: ProviderId, secret: string, baseUrl?: string): boolean => {
    try {
      const state = loadState();
      state.providers[providerId] = {
        secret: secret.trim(),
        ...(baseUrl ? { baseUrl } : {}),
        updatedAt: new Date().toISOString()
      };
      writeStateJson(CREDENTIALS_FILE, state, { mode: OWNER_ONLY });
      return true;
    } catch {
      return false;
    }
  };

  return {
    getCredential,
    setCredential,
    listConfigured: () => PROVIDER_IDS.filter((id) => getCredential(id) !== undefined)
  };
}
