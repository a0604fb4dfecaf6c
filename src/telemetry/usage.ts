import { readStateJson, writeStateJson } from "../platform/persistence";
import { UsageRecord } from "../providers/types";
import { PerformanceStats, UsageStore } from "../lookup/types";

type UsageSnapshot = {
  version: number;
  records: UsageRecord[];
};

const USAGE_FILE = "state/usage.json";
const USAGE_VERSION = 1;
export const MAX_USAGE_RECORDS = 5000;
const DAY_MS = 24 * 60 * 60 * 1000;

function emptySnapshot(): UsageSnapshot {
  return { version: USAGE_VERSION, records: [] };
}

function loadSnapshot(): UsageSnapshot {
  return readStateJson<UsageSnapshot>(USAGE_FILE, emptySnapshot(), "usage.schema.json");
}

export function recordsSince(records: UsageRecord[], days: number, nowMs = Date.now()): UsageRecord[] {
  const cutoff = nowMs - Math.max(0, days) * DAY_MS;
  return records.filter((record) => {
    const at = Date.parse(record.at);
    return Number.isFinite(at) && at >= cutoff;
  });
}

export function computePerformanceStats(records: UsageRecord[]): PerformanceStats {
  if (records.length === 0) {
    return { totalRequests: 0, successCount: 0, failureCount: 0, avgResponseTime: 0, modelsUsed: [] };
  }
  const successCount = records.filter((record) => record.success).length;
  const average = records.reduce((sum, record) => sum + record.responseTime, 0) / records.length;
  const modelsUsed = [...new Set(records.map((record) => `${record.providerId}/${record.modelName}`))].sort();
  return {
    totalRequests: records.length,
    successCount,
    failureCount: records.length - successCount,
    avgResponseTime: Math.round(average * 100) / 100,
    modelsUsed
  };
}

export function createUsageStore(): UsageStore {
  return {
    record: (record) => {
      const snapshot = loadSnapshot();
      snapshot.records.push(record);
      if (snapshot.records.length > MAX_USAGE_RECORDS) {
        snapshot.records = snapshot.records.slice(snapshot.records.length - MAX_USAGE_RECORDS);
      }
      writeStateJson(USAGE_FILE, snapshot);
    },
    since: (days) => recordsSince(loadSnapshot().records, days)
  };
}
