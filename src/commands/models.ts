import { ERROR_CODES, printError } from "../errors";
import { LookupOrchestrator } from "../lookup/orchestrator";
import { CredentialStore } from "../lookup/types";
import { PROVIDER_LABELS } from "../providers";
import { resolveModel, suggestModel } from "../providers/registry";
import { LOCAL_PROVIDERS, ModelDescriptor, ProviderId } from "../providers/types";

function groupByProvider(models: ModelDescriptor[]): Map<ProviderId, ModelDescriptor[]> {
  const groups = new Map<ProviderId, ModelDescriptor[]>();
  for (const model of models) {
    const group = groups.get(model.providerId) ?? [];
    group.push(model);
    groups.set(model.providerId, group);
  }
  return groups;
}

export function renderModelList(
  models: ModelDescriptor[],
  activeModel: string,
  configured: ReadonlySet<ProviderId>
): string[] {
  const lines: string[] = [];
  for (const [providerId, group] of groupByProvider(models)) {
    const ready = LOCAL_PROVIDERS.has(providerId) || configured.has(providerId);
    lines.push(`${PROVIDER_LABELS[providerId]} (${ready ? "configured" : "no API key"})`);
    for (const model of group) {
      const marker = model.canonicalName === activeModel ? "*" : " ";
      lines.push(` ${marker} ${model.canonicalName.padEnd(28)} ${model.description}`);
    }
  }
  return lines;
}

export function runModelsList(orchestrator: LookupOrchestrator, credentials: CredentialStore): void {
  const configured = new Set(credentials.listConfigured());
  const active = orchestrator.currentModel().modelName;
  for (const line of renderModelList(orchestrator.listModels(), active, configured)) {
    console.log(line);
  }
}

export function runModelsCurrent(orchestrator: LookupOrchestrator): void {
  const active = orchestrator.currentModel();
  console.log(`${active.modelName} (${PROVIDER_LABELS[active.providerId]})`);
}

export function describeModel(model: ModelDescriptor): string[] {
  return [
    `Name: ${model.canonicalName}`,
    `Display name: ${model.displayName}`,
    `Provider: ${PROVIDER_LABELS[model.providerId]}`,
    `API model: ${model.apiModel}`,
    `Max tokens: ${model.maxTokens}`,
    `Temperature: ${model.temperature}`,
    `Description: ${model.description}`
  ];
}

export function runModelsInfo(name: string): void {
  const model = resolveModel(name);
  if (!model) {
    const suggestion = suggestModel(name);
    printError(
      ERROR_CODES.unknownModel,
      `Unknown model '${name}'.${suggestion ? ` Did you mean ${suggestion}?` : " Run: shellscribe models list"}`
    );
    process.exitCode = 1;
    return;
  }
  for (const line of describeModel(model)) {
    console.log(line);
  }
}

export function runModelsSet(orchestrator: LookupOrchestrator, name: string): void {
  if (!orchestrator.setModel(name)) {
    process.exitCode = 1;
  }
}
