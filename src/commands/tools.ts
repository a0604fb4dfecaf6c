import { ERROR_CODES, printError } from "../errors";
import {
  DEFAULT_PASSWORD_LENGTH,
  ToolResult,
  convertTimestamp,
  decodeBase64,
  encodeBase64,
  generatePassword,
  generateUuid,
  hashText,
  isUuidVersion
} from "../tools/generators";
import { generateRegex, lookupHttpStatus } from "../tools/reference";

function emit(result: ToolResult): void {
  if (!result.ok) {
    printError(ERROR_CODES.invalidArgument, result.error);
    process.exitCode = 1;
    return;
  }
  console.log(result.value);
}

export function runUuid(rawVersion = "4", name?: string): void {
  const version = Number.parseInt(rawVersion, 10);
  if (!isUuidVersion(version)) {
    emit({ ok: false, error: "UUID version must be 1, 3, 4 or 5." });
    return;
  }
  emit({ ok: true, value: generateUuid(version, name) });
}

export function runPassword(rawLength?: string): void {
  const length = rawLength === undefined ? DEFAULT_PASSWORD_LENGTH : Number.parseInt(rawLength, 10);
  emit(generatePassword(length));
}

export function runHash(algorithm: string, text: string): void {
  emit(hashText(algorithm, text));
}

export function runBase64(mode: string, text: string): void {
  if (mode === "encode") {
    emit({ ok: true, value: encodeBase64(text) });
    return;
  }
  if (mode === "decode") {
    emit(decodeBase64(text));
    return;
  }
  emit({ ok: false, error: "Mode must be encode or decode." });
}

export function runTimestamp(value: string): void {
  emit(convertTimestamp(value));
}

export function runRegex(description: string): void {
  emit(generateRegex(description));
}

export function runHttpCode(code: string): void {
  emit(lookupHttpStatus(code));
}
