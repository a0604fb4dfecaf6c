import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, spawnSync } from "child_process";

type RunSyncArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  timeout?: number;
  encoding?: BufferEncoding;
  input?: string;
};

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    cwd: options.cwd,
    env: options.env,
    shell,
    timeout: options.timeout,
    encoding: options.encoding ?? "utf-8",
    input: options.input,
    windowsHide: process.platform === "win32"
  };
  return spawnSync(command, args, spawnOptions);
}

export function describeFailure(result: SpawnSyncReturns<string>, fallback: string): string {
  const chunks = [result.error?.message || "", result.stderr || ""]
    .map((part) => String(part || "").trim())
    .filter(Boolean);
  return chunks.length > 0 ? chunks.join("\n") : fallback;
}
