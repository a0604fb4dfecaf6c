import { Clipboard } from "../lookup/types";
import { describeFailure, runCommandSync } from "./process-exec";

type ClipboardTool = {
  command: string;
  args: string[];
};

const COPY_TIMEOUT_MS = 3000;

export function clipboardTools(platform: NodeJS.Platform = process.platform, env = process.env): ClipboardTool[] {
  if (platform === "darwin") {
    return [{ command: "pbcopy", args: [] }];
  }
  if (platform === "win32") {
    return [{ command: "clip", args: [] }];
  }
  const x11: ClipboardTool[] = [
    { command: "xclip", args: ["-selection", "clipboard"] },
    { command: "xsel", args: ["--clipboard", "--input"] }
  ];
  if (env.WAYLAND_DISPLAY) {
    return [{ command: "wl-copy", args: [] }, ...x11];
  }
  return x11;
}

export function createSystemClipboard(tools: ClipboardTool[] = clipboardTools()): Clipboard {
  return {
    copy: (text) => {
      const failures: string[] = [];
      for (const tool of tools) {
        const result = runCommandSync(tool.command, tool.args, { input: text, timeout: COPY_TIMEOUT_MS });
        if (result.status === 0) {
          return;
        }
        failures.push(`${tool.command}: ${describeFailure(result, "exited with an error")}`);
      }
      throw new Error(`no clipboard tool succeeded (${failures.join("; ")})`);
    }
  };
}
