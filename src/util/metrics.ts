/**
 * In-process counters for session operations, served as JSON at /metrics.
 * Labels stay low-cardinality: operation name and outcome only.
 */

export type OpOutcome = 'ok' | 'not_found' | 'invalid' | 'error';

const ops: Record<string, Record<OpOutcome, number>> = {};
const storeFailures: Record<string, number> = {};
let evictions = 0;
let corruptRecords = 0;
const startedAt = Date.now();

const emptyOutcomes = (): Record<OpOutcome, number> => ({ ok: 0, not_found: 0, invalid: 0, error: 0 });

export function incOp(op: string, outcome: OpOutcome): void {
  const entry = (ops[op] ??= emptyOutcomes());
  entry[outcome] += 1;
}

export function incStoreFailure(operation: string): void {
  storeFailures[operation] = (storeFailures[operation] ?? 0) + 1;
}

export function incEvictions(n = 1): void {
  evictions += n;
}

export function incCorruptRecords(): void {
  corruptRecords += 1;
}

export interface MetricsSnapshot {
  uptime_sec: number;
  operations: Record<string, Record<OpOutcome, number>>;
  store_failures: Record<string, number>;
  evictions: number;
  corrupt_records: number;
}

export function snapshot(): MetricsSnapshot {
  const operations: Record<string, Record<OpOutcome, number>> = {};
  for (const [op, outcomes] of Object.entries(ops)) {
    operations[op] = { ...outcomes };
  }
  return {
    uptime_sec: Math.floor((Date.now() - startedAt) / 1000),
    operations,
    store_failures: { ...storeFailures },
    evictions,
    corrupt_records: corruptRecords,
  };
}

export function resetMetrics(): void {
  for (const key of Object.keys(ops)) delete ops[key];
  for (const key of Object.keys(storeFailures)) delete storeFailures[key];
  evictions = 0;
  corruptRecords = 0;
}
