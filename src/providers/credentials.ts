import { CredentialCheck, ProviderId } from "./types";

type KeyFormat = {
  prefix?: string;
  minLength: number;
  charset: RegExp;
};

// Format checks only; a bad key that passes here surfaces as a 401 on first use.
const KEY_FORMATS: Record<Exclude<ProviderId, "ollama">, KeyFormat> = {
  openai: { prefix: "sk-", minLength: 20, charset: /^[A-Za-z0-9_-]+$/ },
  anthropic: { prefix: "sk-ant-", minLength: 21, charset: /^[A-Za-z0-9_-]+$/ },
  google: { minLength: 30, charset: /^[A-Za-z0-9_-]+$/ },
  cohere: { minLength: 20, charset: /^[A-Za-z0-9]+$/ }
};

export function checkKeyFormat(providerId: Exclude<ProviderId, "ollama">, secret: string): CredentialCheck {
  const format = KEY_FORMATS[providerId];
  const key = secret.trim();
  if (!key) {
    return { ok: false, reason: `No API key set for ${providerId}.` };
  }
  if (format.prefix && !key.startsWith(format.prefix)) {
    return { ok: false, reason: `${providerId} API keys start with '${format.prefix}'.` };
  }
  if (key.length < format.minLength) {
    return { ok: false, reason: `${providerId} API key is too short.` };
  }
  if (!format.charset.test(key)) {
    return { ok: false, reason: `${providerId} API key contains unexpected characters.` };
  }
  return { ok: true };
}

export function maskSecret(secret: string): string {
  if (secret.length > 12) {
    return `${secret.slice(0, 4)}...${secret.slice(-4)}`;
  }
  return "***masked***";
}
