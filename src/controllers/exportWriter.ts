import { errorMessage } from '../utils/errors';

import type { MetricStore } from '../storage';
import type { Export, RecordCategory, StorageErrorPolicy, StoreResult } from '../types';
import type { Logger } from '../utils/logger';

export interface WriteOptions {
  log: Logger;
  policy: StorageErrorPolicy;
  signal?: AbortSignal;
}

export interface WriteFailure {
  error: Error;
  step: 'optimize' | RecordCategory;
}

export interface WriteReport {
  /** True when OPTIMIZE ran to completion. */
  compacted: boolean;
  failures: WriteFailure[];
  results: StoreResult[];
}

interface WriteStep {
  category: RecordCategory;
  count: number;
  run: () => Promise<StoreResult>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Persist a decoded export: metrics, ECG, workouts, state of mind, then
 * compaction. Never throws; failures are logged and returned in the report.
 *
 * Under the `abort` policy the first failure ends the write and compaction
 * is skipped. Under `continue` the remaining steps still run. An aborted
 * signal always ends the write.
 */
export async function writeExport(
  store: MetricStore,
  data: Export,
  options: WriteOptions,
): Promise<WriteReport> {
  const { log, policy, signal } = options;
  const timer = log.startTimer('writeExport');
  const report: WriteReport = { compacted: false, failures: [], results: [] };

  const populated = data.metrics.filter((metric) => metric.samples.length > 0);
  const steps: WriteStep[] = [
    {
      category: 'metrics',
      count: populated.length,
      run: () => store.storeMetrics(populated, signal),
    },
    { category: 'ecg', count: data.ecg.length, run: () => store.storeEcg(data.ecg, signal) },
    {
      category: 'workouts',
      count: data.workouts.length,
      run: () => store.storeWorkouts(data.workouts, signal),
    },
    {
      category: 'stateOfMind',
      count: data.stateOfMind.length,
      run: () => store.storeStateOfMind(data.stateOfMind, signal),
    },
  ];

  const shouldStop = () =>
    signal?.aborted === true || (policy === 'abort' && report.failures.length > 0);

  for (const step of steps) {
    if (step.count === 0) continue;
    if (shouldStop()) break;

    try {
      const result = await step.run();
      report.results.push(result);
      for (const skipped of result.skipped) {
        log.warn('Skipped record', { ...skipped });
      }
      log.debug('Stored category', { category: step.category, written: result.written });
    } catch (error) {
      const failure = { error: toError(error), step: step.category };
      report.failures.push(failure);
      log.error(`Failed to store ${step.category}`, failure.error);
    }
  }

  if (!shouldStop()) {
    try {
      await store.optimizeTables(signal);
      report.compacted = true;
    } catch (error) {
      const failure: WriteFailure = { error: toError(error), step: 'optimize' };
      report.failures.push(failure);
      log.error('Failed to optimize tables', failure.error);
    }
  }

  const written = report.results.reduce((total, result) => total + result.written, 0);
  const skipped = report.results.reduce((total, result) => total + result.skipped.length, 0);
  timer.end(report.failures.length > 0 ? 'error' : 'info', 'Export write finished', {
    compacted: report.compacted,
    failures: report.failures.length,
    skipped,
    written,
  });

  return report;
}
