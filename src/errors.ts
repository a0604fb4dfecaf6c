export type ErrorKind = "configuration" | "transient_provider" | "content_rejection" | "input_validation" | "storage";

export const ERROR_CODES = {
  promptTooShort: "SHS-1101",
  promptCharacters: "SHS-1102",
  providerUnconfigured: "SHS-1201",
  credentialInvalid: "SHS-1202",
  unknownModel: "SHS-1203",
  adapterUnavailable: "SHS-1204",
  invalidArgument: "SHS-1205",
  providerFailure: "SHS-1301",
  noResult: "SHS-1401",
  blocked: "SHS-1402",
  historyWrite: "SHS-1501",
  clipboard: "SHS-1502",
  usageWrite: "SHS-1503"
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

const KIND_BY_PREFIX: Record<string, ErrorKind> = {
  "SHS-11": "input_validation",
  "SHS-12": "configuration",
  "SHS-13": "transient_provider",
  "SHS-14": "content_rejection",
  "SHS-15": "storage"
};

export function errorKind(code: ErrorCode): ErrorKind {
  return KIND_BY_PREFIX[code.slice(0, 6)] ?? "configuration";
}

export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function printError(code: string, message: string): void {
  console.log(formatError(code, message));
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
