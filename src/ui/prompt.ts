import fs from "fs";
import readline from "readline";
import { getFlags } from "../context/flags";
import { PromptReader } from "../lookup/types";

let queuedAnswers: string[] | null = null;
let rl: readline.Interface | null = null;

export function readsQueuedAnswers(): boolean {
  if (getFlags().nonInteractive) {
    return true;
  }
  if (process.env.SHELLSCRIBE_STDIN === "1") {
    return true;
  }
  return !process.stdin.isTTY;
}

function getQueuedAnswers(): string[] {
  if (queuedAnswers) {
    return queuedAnswers;
  }
  try {
    const raw = fs.readFileSync(0, "utf-8");
    queuedAnswers = raw.split(/\r?\n/).filter((line) => line.length > 0);
  } catch {
    queuedAnswers = [];
  }
  return queuedAnswers;
}

function getInterface(): readline.Interface {
  if (rl) {
    return rl;
  }
  rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
  return rl;
}

export function closePrompt(): void {
  if (!rl) {
    return;
  }
  rl.close();
  rl = null;
}

process.on("exit", () => closePrompt());

export function ask(question: string): Promise<string> {
  if (readsQueuedAnswers()) {
    // Piped input ends the session once drained.
    const answer = getQueuedAnswers().shift() ?? "exit";
    return Promise.resolve(answer.trim());
  }
  return new Promise((resolve) => {
    const prompt = getInterface();
    prompt.question(question, (answer) => {
      resolve(answer.trim());
    });
  });
}

export function createPromptReader(): PromptReader {
  return { ask };
}
