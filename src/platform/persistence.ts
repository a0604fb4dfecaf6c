import fs from "fs";
import os from "os";
import path from "path";
import { describeError } from "../errors";
import { validateJson } from "../validation/validate";

type JsonObject = Record<string, unknown>;

export const APP_NAME = "shellscribe";

function resolveBaseDir(appName: string): string {
  const override = process.env.SHELLSCRIBE_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  if (process.platform === "win32") {
    const appData = process.env.APPDATA || path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appData, appName);
  }
  if (process.platform === "darwin") {
    return path.join(os.homedir(), "Library", "Application Support", appName);
  }
  const xdg = process.env.XDG_STATE_HOME;
  if (xdg && xdg.trim().length > 0) {
    return path.join(xdg.trim(), appName);
  }
  return path.join(os.homedir(), ".local", "state", appName);
}

function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function resolveStateFile(relativePath: string, appName = APP_NAME): string {
  const normalized = relativePath.replace(/^[/\\]+/, "");
  return path.join(resolveBaseDir(appName), normalized);
}

// The unreadable file is kept beside the fresh one so a later write cannot lose it.
function setAside<T>(file: string, fallback: T, problem: string): T {
  const backup = `${file}.corrupt-${Date.now()}`;
  try {
    fs.renameSync(file, backup);
    console.log(`Warning: ${file} ${problem}; moved it to ${backup}.`);
  } catch (error) {
    console.log(`Warning: ${file} ${problem} and could not be moved aside (${describeError(error)}).`);
  }
  return fallback;
}

/**
 * Reads a JSON state file. A missing file yields the fallback; an unreadable or
 * schema-invalid one is moved aside first.
 */
export function readStateJson<T extends JsonObject>(relativePath: string, fallback: T, schemaFile?: string): T {
  const file = resolveStateFile(relativePath);
  if (!fs.existsSync(file)) {
    return fallback;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    return setAside(file, fallback, `could not be read (${describeError(error)})`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return setAside(file, fallback, "is not a JSON object");
  }
  if (schemaFile) {
    const outcome = validateJson(schemaFile, parsed);
    if (!outcome.valid) {
      return setAside(file, fallback, `does not match ${schemaFile} (${outcome.errors.join("; ")})`);
    }
  }
  return parsed as T;
}

export type WriteOptions = {
  /** File mode for files holding secrets. */
  mode?: number;
};

export function writeStateJson(relativePath: string, value: JsonObject, options: WriteOptions = {}): string {
  const file = resolveStateFile(relativePath);
  ensureDir(path.dirname(file));
  fs.writeFileSync(file, JSON.stringify(value, null, 2), { encoding: "utf-8", mode: options.mode });
  if (options.mode !== undefined && process.platform !== "win32") {
    fs.chmodSync(file, options.mode);
  }
  return file;
}
