import { ERROR_CODES, printError } from "../errors";
import { LookupOrchestrator } from "../lookup/orchestrator";
import { PerformanceStats } from "../lookup/types";

export const DEFAULT_STATS_DAYS = 7;

export function renderStats(stats: PerformanceStats, days: number): string[] {
  if (stats.totalRequests === 0) {
    return [`No requests in the last ${days} day(s).`];
  }
  const rate = Math.round((stats.successCount / stats.totalRequests) * 1000) / 10;
  return [
    `Requests (last ${days} day(s)): ${stats.totalRequests}`,
    `Successful: ${stats.successCount} (${rate}%)`,
    `Failed: ${stats.failureCount}`,
    `Average response time: ${stats.avgResponseTime.toFixed(2)}s`,
    `Models used: ${stats.modelsUsed.join(", ")}`
  ];
}

export function runStats(orchestrator: LookupOrchestrator, rawDays?: string): void {
  const days = rawDays === undefined ? DEFAULT_STATS_DAYS : Number.parseInt(rawDays, 10);
  if (!Number.isInteger(days) || days < 1) {
    printError(ERROR_CODES.invalidArgument, "--days must be a positive integer.");
    process.exitCode = 1;
    return;
  }
  for (const line of renderStats(orchestrator.getPerformanceStats(days), days)) {
    console.log(line);
  }
}
