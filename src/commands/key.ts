import { ERROR_CODES, printError } from "../errors";
import { CredentialStore, PromptReader } from "../lookup/types";
import { PROVIDER_LABELS, normalizeProviderId } from "../providers";
import { checkKeyFormat, maskSecret } from "../providers/credentials";
import { PROVIDER_IDS, ProviderId } from "../providers/types";

function parseProvider(input: string): ProviderId | null {
  const providerId = normalizeProviderId(input);
  if (!providerId) {
    printError(ERROR_CODES.invalidArgument, `Unknown provider '${input}'. Use one of: ${PROVIDER_IDS.join(", ")}.`);
    process.exitCode = 1;
  }
  return providerId;
}

export async function runKeySet(
  credentials: CredentialStore,
  prompt: PromptReader,
  providerInput: string,
  secretInput?: string
): Promise<void> {
  const providerId = parseProvider(providerInput);
  if (!providerId) {
    return;
  }
  const label = PROVIDER_LABELS[providerId];
  if (providerId === "ollama") {
    const baseUrl = (secretInput ?? (await prompt.ask(`${label} base URL: `))).trim();
    if (!/^https?:\/\//i.test(baseUrl)) {
      printError(ERROR_CODES.invalidArgument, "Ollama base URL must start with http:// or https://.");
      process.exitCode = 1;
      return;
    }
    if (!credentials.setCredential(providerId, "", baseUrl)) {
      printError(ERROR_CODES.invalidArgument, "Could not save the Ollama base URL.");
      process.exitCode = 1;
      return;
    }
    console.log(`${label} base URL saved: ${baseUrl}`);
    return;
  }
  const secret = (secretInput ?? (await prompt.ask(`${label} API key: `))).trim();
  const check = checkKeyFormat(providerId, secret);
  if (!check.ok) {
    printError(ERROR_CODES.credentialInvalid, check.reason);
    process.exitCode = 1;
    return;
  }
  if (!credentials.setCredential(providerId, secret)) {
    printError(ERROR_CODES.invalidArgument, `Could not save the ${label} API key.`);
    process.exitCode = 1;
    return;
  }
  console.log(`${label} API key saved (${maskSecret(secret)}).`);
}

export function runKeyGet(credentials: CredentialStore, providerInput: string): void {
  const providerId = parseProvider(providerInput);
  if (!providerId) {
    return;
  }
  const credential = credentials.getCredential(providerId);
  if (providerId === "ollama") {
    console.log(`Ollama base URL: ${credential?.baseUrl ?? "(default)"}`);
    return;
  }
  if (!credential) {
    printError(
      ERROR_CODES.providerUnconfigured,
      `No API key configured for ${PROVIDER_LABELS[providerId]}. Run: shellscribe key set ${providerId}`
    );
    process.exitCode = 1;
    return;
  }
  console.log(`${PROVIDER_LABELS[providerId]} API key: ${maskSecret(credential.secret)}`);
}
