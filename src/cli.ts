#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { AppContext, createAppContext } from "./commands/context";
import { runHistoryClear, runHistoryDelete, runHistoryDeleteLast, runHistoryLast, runHistoryList, runHistoryTotal } from "./commands/history";
import { runKeyGet, runKeySet } from "./commands/key";
import { runColor, runLookup, runPort } from "./commands/lookup";
import { runModelsCurrent, runModelsInfo, runModelsList, runModelsSet } from "./commands/models";
import { runStats } from "./commands/stats";
import { runBase64, runHash, runHttpCode, runPassword, runRegex, runTimestamp, runUuid } from "./commands/tools";
import { CONFIG_KEYS, configPath, ensureConfig, updateConfigValue } from "./config";
import { setFlags } from "./context/flags";
import { ERROR_CODES, describeError, printError } from "./errors";
import { getRepoRoot } from "./paths";
import { closePrompt } from "./ui/prompt";

const program = new Command();

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg = JSON.parse(fs.readFileSync(pkgPath, "utf-8")) as { version?: string };
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

let context: AppContext | null = null;

function app(): AppContext {
  if (!context) {
    context = createAppContext();
  }
  return context;
}

type LookupFlags = {
  copy: boolean;
  model?: string;
};

program
  .name("shellscribe")
  .description("Turn plain-language requests into shell commands and SQL queries")
  .version(getVersion())
  .option("--quiet", "Only print results and errors")
  .option("--non-interactive", "Read prompts from piped stdin instead of the terminal");

program.hook("preAction", (_command, actionCommand) => {
  const opts = actionCommand.optsWithGlobals();
  setFlags({
    quiet: Boolean(opts.quiet),
    nonInteractive: Boolean(opts.nonInteractive)
  });
});

program.hook("postAction", () => {
  closePrompt();
});

program
  .command("cmd", { isDefault: true })
  .description("Generate a shell command from a description")
  .option("--no-copy", "Do not copy the result to the clipboard")
  .option("--model <name>", "Use this model for one request")
  .action(async (options: LookupFlags) => {
    await runLookup(app().orchestrator, "cmd", { noCopy: !options.copy, model: options.model });
  });

program
  .command("sql")
  .description("Generate a SQL query from a description")
  .option("--no-copy", "Do not copy the result to the clipboard")
  .option("--model <name>", "Use this model for one request")
  .action(async (options: LookupFlags) => {
    await runLookup(app().orchestrator, "sql", { noCopy: !options.copy, model: options.model });
  });

program
  .command("color")
  .description("Look up the hex code of a color")
  .argument("<description...>", "Color name or description")
  .option("--model <name>", "Use this model for one request")
  .action(async (description: string[], options: { model?: string }) => {
    await runColor(app().orchestrator, description.join(" "), options.model);
  });

program
  .command("port")
  .description("Look up the service that usually listens on a port")
  .argument("<port>", "Port number (1-65535)")
  .option("--model <name>", "Use this model for one request")
  .action(async (port: string, options: { model?: string }) => {
    await runPort(app().orchestrator, port, options.model);
  });

const models = program.command("models").description("Model selection commands");
models
  .command("list")
  .description("List supported models grouped by provider")
  .action(() => runModelsList(app().orchestrator, app().credentials));
models
  .command("current")
  .description("Show the active model")
  .action(() => runModelsCurrent(app().orchestrator));
models
  .command("info")
  .description("Show details for a model")
  .argument("<name>", "Model name or alias")
  .action((name: string) => runModelsInfo(name));
models
  .command("set")
  .description("Make a model the default")
  .argument("<name>", "Model name or alias")
  .action((name: string) => runModelsSet(app().orchestrator, name));

const key = program.command("key").description("Provider credential commands");
key
  .command("set")
  .description("Store an API key (or the Ollama base URL)")
  .argument("<provider>", "openai | anthropic | google | cohere | ollama")
  .argument("[secret]", "Key or URL; asked for when omitted")
  .action(async (provider: string, secret?: string) => {
    await runKeySet(app().credentials, app().prompt, provider, secret);
  });
key
  .command("get")
  .description("Show a stored API key, masked")
  .argument("<provider>", "openai | anthropic | google | cohere | ollama")
  .action((provider: string) => runKeyGet(app().credentials, provider));

program
  .command("stats")
  .description("Show request statistics")
  .option("--days <n>", "Window in days", "7")
  .action((options: { days: string }) => runStats(app().orchestrator, options.days));

const history = program.command("history").description("Saved results");
history
  .command("list")
  .description("List recent results, newest first")
  .option("--limit <n>", "Number of entries", "20")
  .action((options: { limit: string }) => runHistoryList(app().history, options.limit));
history
  .command("last")
  .description("Show the latest result")
  .action(() => runHistoryLast(app().history));
history
  .command("delete")
  .description("Delete a result by id")
  .argument("<id>", "History entry id")
  .action((id: string) => runHistoryDelete(app().history, id));
history
  .command("delete-last")
  .description("Delete the latest result")
  .action(() => runHistoryDeleteLast(app().history));
history
  .command("total")
  .description("Count saved results")
  .action(() => runHistoryTotal(app().history));
history
  .command("clear")
  .description("Delete every saved result")
  .action(() => runHistoryClear(app().history));

const tools = program.command("tools").description("Offline helpers");
tools
  .command("uuid")
  .description("Generate a UUID")
  .option("--v <version>", "UUID version: 1 | 3 | 4 | 5", "4")
  .option("--name <name>", "Name for v3/v5 (DNS namespace)")
  .action((options: { v: string; name?: string }) => runUuid(options.v, options.name));
tools
  .command("password")
  .description("Generate a random password")
  .option("--length <n>", "Length (8-1000)", "18")
  .action((options: { length: string }) => runPassword(options.length));
tools
  .command("hash")
  .description("Hash text")
  .argument("<algorithm>", "md5 | sha1 | sha256 | sha512")
  .argument("<text...>", "Text to hash")
  .action((algorithm: string, text: string[]) => runHash(algorithm, text.join(" ")));
tools
  .command("base64")
  .description("Encode or decode base64")
  .argument("<mode>", "encode | decode")
  .argument("<text...>", "Text to convert")
  .action((mode: string, text: string[]) => runBase64(mode, text.join(" ")));
tools
  .command("timestamp")
  .description("Convert between unix seconds and ISO 8601")
  .argument("<value>", "Unix seconds or a date")
  .action((value: string) => runTimestamp(value));
tools
  .command("regex")
  .description("Suggest a regular expression for common inputs")
  .argument("<description...>", "What the pattern should match")
  .action((description: string[]) => runRegex(description.join(" ")));
tools
  .command("http-code")
  .description("Look up the name of an HTTP status code")
  .argument("<code>", "Status code, e.g. 404")
  .action((code: string) => runHttpCode(code));

const configCmd = program.command("config").description("Configuration commands");
configCmd
  .command("show")
  .description("Show effective config and config file path")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config file: ${configPath()}`);
    console.log(JSON.stringify(config, null, 2));
  });

configCmd
  .command("init")
  .description("Create config file with defaults if missing")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config ready: ${configPath()}`);
    console.log(`Active model: ${config.ai.model} (${config.ai.provider})`);
  });

configCmd
  .command("set")
  .description("Set config value by key")
  .argument("<key>", `Key: ${CONFIG_KEYS.join(" | ")}`)
  .argument("<value>", "Value for key")
  .action((configKey: string, value: string) => {
    const updated = updateConfigValue(configKey, value);
    if (!updated) {
      printError(ERROR_CODES.invalidArgument, `Invalid config key or value. Keys: ${CONFIG_KEYS.join(", ")}.`);
      process.exitCode = 1;
      return;
    }
    console.log(`Config updated: ${configPath()}`);
    console.log(JSON.stringify(updated, null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  printError(ERROR_CODES.invalidArgument, describeError(error));
  process.exitCode = 1;
});
