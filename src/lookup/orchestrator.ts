import { ERROR_CODES, ErrorCode, describeError } from "../errors";
import { PROVIDER_LABELS, ProviderFactory } from "../providers";
import { listModels, resolveModel, suggestModel } from "../providers/registry";
import {
  ArtifactKind,
  LOCAL_PROVIDERS,
  ModelDescriptor,
  ProviderAdapter,
  ProviderCredential,
  ProviderFailure,
  ProviderResult
} from "../providers/types";
import { sanitize } from "../sanitize/response";
import { checkCommand, checkSql } from "../validation/safety-gate";
import { computePerformanceStats } from "../telemetry/usage";
import { validatePrompt } from "./prompt-input";
import {
  ActiveModel,
  Clipboard,
  ConfigStore,
  CredentialStore,
  HistoryStore,
  OutputSink,
  PerformanceStats,
  PromptReader,
  UsageStore
} from "./types";

export type LookupPhase =
  | "idle"
  | "provider_resolved"
  | "awaiting_prompt"
  | "generating"
  | "sanitizing"
  | "safety_checked"
  | "accepted"
  | "rejected"
  | "failed"
  | "cancelled";

export type LookupState = Extract<LookupPhase, "accepted" | "rejected" | "failed" | "cancelled">;

export type LookupOutcome = {
  state: LookupState;
  result?: string;
  message: string;
  code?: ErrorCode;
  phases: LookupPhase[];
};

export type LookupOptions = {
  noCopy?: boolean;
  model?: string;
};

export type LookupDependencies = {
  config: ConfigStore;
  credentials: CredentialStore;
  history: HistoryStore;
  usage: UsageStore;
  clipboard: Clipboard;
  prompt: PromptReader;
  factory: ProviderFactory;
  output: OutputSink;
  clock?: () => Date;
  /** Invalid prompts tolerated before giving up; unbounded when omitted. */
  maxPromptAttempts?: number;
};

export const NO_RESULT_MESSAGE = "No command found for this request!";
export const GENERATION_FAILED_MESSAGE = "Could not generate command. Please try again.";
export const GOODBYE_MESSAGE = "bye...";
export const DEFAULT_MAX_PROMPT_ATTEMPTS = 5;

const QUESTIONS: Record<ArtifactKind, string> = {
  command: "Describe the command you need (or 'exit'): ",
  sql: "Describe the SQL query you need (or 'exit'): "
};

const HEX_COLOR = /#[0-9A-Fa-f]{6}\b/;
const MAX_PORT_ANSWER = 200;

type Resolution =
  | { ok: true; model: ModelDescriptor; adapter: ProviderAdapter }
  | { ok: false; code: ErrorCode; message: string };

type Run = {
  phases: LookupPhase[];
  move: (phase: LookupPhase) => void;
};

function startRun(): Run {
  const phases: LookupPhase[] = ["idle"];
  return { phases, move: (phase) => phases.push(phase) };
}

function describeFailure(failure: ProviderFailure): string {
  const status = failure.code !== undefined ? ` (HTTP ${failure.code})` : "";
  const hint = failure.hint ? ` ${failure.hint}` : "";
  return `${failure.provider}${status}: ${failure.message}.${hint}`;
}

export class LookupOrchestrator {
  private readonly deps: LookupDependencies;
  private readonly now: () => Date;
  private readonly maxPromptAttempts: number;

  constructor(deps: LookupDependencies) {
    this.deps = deps;
    this.now = deps.clock ?? (() => new Date());
    this.maxPromptAttempts =
      deps.maxPromptAttempts === undefined ? Number.POSITIVE_INFINITY : Math.max(1, deps.maxPromptAttempts);
  }

  lookupCommand(options: LookupOptions = {}): Promise<LookupOutcome> {
    return this.lookup("command", options);
  }

  lookupSqlQuery(options: LookupOptions = {}): Promise<LookupOutcome> {
    return this.lookup("sql", options);
  }

  listModels(): ModelDescriptor[] {
    return listModels();
  }

  currentModel(): ActiveModel {
    return this.deps.config.getActiveModel();
  }

  setModel(name: string): boolean {
    const { output } = this.deps;
    const model = resolveModel(name);
    if (!model) {
      output.error(ERROR_CODES.unknownModel, this.unknownModelMessage(name));
      return false;
    }
    if (!LOCAL_PROVIDERS.has(model.providerId) && !this.storedCredential(model)) {
      output.error(ERROR_CODES.providerUnconfigured, this.missingKeyMessage(model));
      return false;
    }
    if (!this.deps.config.setActiveModel(model.canonicalName, model.providerId)) {
      output.error(ERROR_CODES.invalidArgument, "Could not save the active model to config.");
      return false;
    }
    output.success(`Active model: ${model.canonicalName} (${PROVIDER_LABELS[model.providerId]})`);
    return true;
  }

  getPerformanceStats(days: number): PerformanceStats {
    return computePerformanceStats(this.deps.usage.since(days));
  }

  async lookupColorCode(description: string, options: Pick<LookupOptions, "model"> = {}): Promise<LookupOutcome> {
    const question = `the hex color code for ${description.trim()}, printed as #RRGGBB`;
    return this.quickAnswer(question, options, (raw) => raw.match(HEX_COLOR)?.[0]?.toUpperCase() ?? "");
  }

  async lookupPort(port: number, options: Pick<LookupOptions, "model"> = {}): Promise<LookupOutcome> {
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      const run = startRun();
      run.move("failed");
      return this.fail(run, ERROR_CODES.invalidArgument, "Port must be an integer between 1 and 65535.");
    }
    const question = `the service or protocol that usually listens on TCP/UDP port ${port}, one short line`;
    return this.quickAnswer(question, options, (raw) => {
      const line = (raw.trim().split(/\r?\n/)[0] ?? "").trim();
      return line.length <= MAX_PORT_ANSWER ? line : "";
    });
  }

  private async lookup(kind: ArtifactKind, options: LookupOptions): Promise<LookupOutcome> {
    const run = startRun();
    const resolution = await this.resolve(options.model);
    if (!resolution.ok) {
      run.move("failed");
      return this.fail(run, resolution.code, resolution.message);
    }
    const { model, adapter } = resolution;
    run.move("provider_resolved");
    this.deps.output.info(`Using ${model.displayName} (${PROVIDER_LABELS[model.providerId]})`);

    run.move("awaiting_prompt");
    const entered = await this.readPrompt(kind);
    if (entered.state === "cancelled") {
      run.move("cancelled");
      this.deps.output.info(GOODBYE_MESSAGE);
      return { state: "cancelled", message: GOODBYE_MESSAGE, phases: run.phases };
    }
    if (entered.state === "exhausted") {
      run.move("failed");
      return this.fail(run, entered.code, `No usable prompt after ${this.maxPromptAttempts} attempts.`);
    }

    run.move("generating");
    const generated = await this.generate(model, () =>
      kind === "sql" ? adapter.generateSqlQuery(entered.prompt) : adapter.generateCommand(entered.prompt)
    );
    if (!generated.ok) {
      run.move("failed");
      this.deps.output.error(ERROR_CODES.providerFailure, GENERATION_FAILED_MESSAGE);
      this.deps.output.info(describeFailure(generated.error));
      return { state: "failed", message: GENERATION_FAILED_MESSAGE, code: ERROR_CODES.providerFailure, phases: run.phases };
    }

    run.move("sanitizing");
    const cleaned = sanitize(generated.output, kind);
    if (!cleaned) {
      run.move("rejected");
      this.deps.output.error(ERROR_CODES.noResult, NO_RESULT_MESSAGE);
      return { state: "rejected", message: NO_RESULT_MESSAGE, code: ERROR_CODES.noResult, phases: run.phases };
    }

    run.move("safety_checked");
    const decision = kind === "sql" ? checkSql(cleaned) : checkCommand(cleaned);
    if (!decision.accepted) {
      run.move("rejected");
      this.deps.output.error(ERROR_CODES.blocked, decision.reason);
      return { state: "rejected", message: decision.reason, code: ERROR_CODES.blocked, phases: run.phases };
    }

    run.move("accepted");
    this.deliver(entered.prompt, cleaned, model, options.noCopy === true);
    return { state: "accepted", result: cleaned, message: cleaned, phases: run.phases };
  }

  private async quickAnswer(
    question: string,
    options: Pick<LookupOptions, "model">,
    extract: (raw: string) => string
  ): Promise<LookupOutcome> {
    const run = startRun();
    const resolution = await this.resolve(options.model);
    if (!resolution.ok) {
      run.move("failed");
      return this.fail(run, resolution.code, resolution.message);
    }
    run.move("provider_resolved");
    run.move("generating");
    const generated = await this.generate(resolution.model, () => resolution.adapter.answerQuestion(question));
    if (!generated.ok) {
      run.move("failed");
      this.deps.output.info(describeFailure(generated.error));
      return this.fail(run, ERROR_CODES.providerFailure, "Could not get an answer. Please try again.");
    }
    run.move("sanitizing");
    const answer = extract(generated.output);
    if (!answer) {
      run.move("rejected");
      this.deps.output.error(ERROR_CODES.noResult, "No answer found for this request!");
      return { state: "rejected", message: "No answer found for this request!", code: ERROR_CODES.noResult, phases: run.phases };
    }
    run.move("accepted");
    this.deps.output.success(answer);
    return { state: "accepted", result: answer, message: answer, phases: run.phases };
  }

  private async resolve(override?: string): Promise<Resolution> {
    const requested = override?.trim() || this.deps.config.getActiveModel().modelName;
    const model = resolveModel(requested);
    if (!model) {
      return { ok: false, code: ERROR_CODES.unknownModel, message: this.unknownModelMessage(requested) };
    }
    const local = LOCAL_PROVIDERS.has(model.providerId);
    const credential = local
      ? this.deps.credentials.getCredential(model.providerId) ?? { providerId: model.providerId, secret: "" }
      : this.storedCredential(model);
    if (!credential) {
      return { ok: false, code: ERROR_CODES.providerUnconfigured, message: this.missingKeyMessage(model) };
    }
    const adapter = this.deps.factory.create(model.canonicalName, credential, {
      timeoutMs: this.deps.config.httpTimeoutMs()
    });
    if (!adapter) {
      return {
        ok: false,
        code: ERROR_CODES.adapterUnavailable,
        message: `No adapter available for ${model.canonicalName}.`
      };
    }
    const check = await adapter.validateCredential();
    if (!check.ok) {
      const remediation = local ? "" : ` Run: shellscribe key set ${model.providerId}`;
      return { ok: false, code: ERROR_CODES.credentialInvalid, message: `${check.reason}${remediation}` };
    }
    return { ok: true, model, adapter };
  }

  private storedCredential(model: ModelDescriptor): ProviderCredential | undefined {
    const credential = this.deps.credentials.getCredential(model.providerId);
    return credential && credential.secret.trim() ? credential : undefined;
  }

  private async readPrompt(
    kind: ArtifactKind
  ): Promise<{ state: "ready"; prompt: string } | { state: "cancelled" } | { state: "exhausted"; code: ErrorCode }> {
    let lastCode: ErrorCode = ERROR_CODES.promptTooShort;
    let attempts = 0;
    // Blank input re-prompts without counting as an attempt.
    while (attempts < this.maxPromptAttempts) {
      const check = validatePrompt(await this.deps.prompt.ask(QUESTIONS[kind]));
      if (check.ok) {
        return { state: "ready", prompt: check.prompt };
      }
      if (check.reason === "exit") {
        return { state: "cancelled" };
      }
      if (check.reason === "invalid") {
        attempts += 1;
        lastCode = check.code;
        this.deps.output.error(check.code, check.message);
      }
    }
    return { state: "exhausted", code: lastCode };
  }

  private async generate(model: ModelDescriptor, call: () => Promise<ProviderResult>): Promise<ProviderResult> {
    const started = this.now().getTime();
    const result = await call();
    const seconds = Math.max(0, this.now().getTime() - started) / 1000;
    this.recordUsage(model, seconds, result.ok);
    return result;
  }

  private recordUsage(model: ModelDescriptor, responseTime: number, success: boolean): void {
    try {
      this.deps.usage.record({
        providerId: model.providerId,
        modelName: model.canonicalName,
        responseTime,
        success,
        at: this.now().toISOString()
      });
    } catch (error) {
      this.deps.output.warn(`[${ERROR_CODES.usageWrite}] Could not record usage: ${describeError(error)}`);
    }
  }

  private deliver(prompt: string, result: string, model: ModelDescriptor, noCopy: boolean): void {
    const { output } = this.deps;
    if (!noCopy && this.deps.config.clipboardEnabled()) {
      try {
        this.deps.clipboard.copy(result);
        output.info("Copied to clipboard.");
      } catch (error) {
        output.warn(`[${ERROR_CODES.clipboard}] Clipboard unavailable (${describeError(error)}); copy manually.`);
      }
    }
    if (!this.deps.history.append(prompt, result, model.canonicalName, model.providerId)) {
      output.warn(`[${ERROR_CODES.historyWrite}] Could not save this result to history.`);
    }
    output.success(result);
  }

  private unknownModelMessage(name: string): string {
    const suggestion = suggestModel(name);
    const hint = suggestion ? ` Did you mean ${suggestion}?` : " Run: shellscribe models list";
    return `Unknown model '${name.trim()}'.${hint}`;
  }

  private missingKeyMessage(model: ModelDescriptor): string {
    return `No API key configured for ${PROVIDER_LABELS[model.providerId]}. Run: shellscribe key set ${model.providerId}`;
  }

  private fail(run: Run, code: ErrorCode, message: string): LookupOutcome {
    this.deps.output.error(code, message);
    return { state: "failed", message, code, phases: run.phases };
  }
}
