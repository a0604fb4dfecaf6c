import { LookupOptions, LookupOrchestrator, LookupOutcome } from "../lookup/orchestrator";

export type LookupKind = "cmd" | "sql";

export function exitCodeFor(outcome: LookupOutcome): number {
  return outcome.state === "failed" || outcome.state === "rejected" ? 1 : 0;
}

export async function runLookup(
  orchestrator: LookupOrchestrator,
  kind: LookupKind,
  options: LookupOptions
): Promise<LookupOutcome> {
  const outcome =
    kind === "sql" ? await orchestrator.lookupSqlQuery(options) : await orchestrator.lookupCommand(options);
  process.exitCode = exitCodeFor(outcome);
  return outcome;
}

export async function runColor(
  orchestrator: LookupOrchestrator,
  description: string,
  model?: string
): Promise<LookupOutcome> {
  const outcome = await orchestrator.lookupColorCode(description, { model });
  process.exitCode = exitCodeFor(outcome);
  return outcome;
}

export async function runPort(orchestrator: LookupOrchestrator, rawPort: string, model?: string): Promise<LookupOutcome> {
  const port = /^\d+$/.test(rawPort.trim()) ? Number.parseInt(rawPort, 10) : Number.NaN;
  const outcome = await orchestrator.lookupPort(port, { model });
  process.exitCode = exitCodeFor(outcome);
  return outcome;
}
