import { Defaults } from '../../config/constants';
import { toEcgRows, toMetricRows, toStateOfMindRows, toWorkoutRows } from '../../mappers';
import { TABLE_KEYS } from '../../types';
import { StorageError } from '../../utils/errors';
import { logger as defaultLogger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';
import {
  createDatabaseStatement,
  createTableStatement,
  optimizeTableStatement,
  tableDefinitions,
} from './schema';

import type { ClickHouseConfig } from '../../config';
import type {
  Ecg,
  Metric,
  RowRecord,
  StateOfMind,
  StoreResult,
  TableKey,
  Workout,
} from '../../types';
import type { Logger } from '../../utils/logger';
import type { ColumnStoreClient, MetricStore } from '../types';

export interface ClickHouseMetricStoreOptions {
  client: ColumnStoreClient;
  config: ClickHouseConfig;
  log?: Logger;
  /** Clock for samples that arrive without a date. */
  now?: () => Date;
  retry?: { baseDelayMs: number; maxRetries: number };
}

/**
 * MetricStore backed by ClickHouse.
 *
 * Rows go out in batches of `insertBatchSize`. The first failing batch stops
 * the operation with a StorageError naming the table; batches already sent
 * stay written.
 */
export class ClickHouseMetricStore implements MetricStore {
  private readonly client: ColumnStoreClient;
  private readonly config: ClickHouseConfig;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly retry: { baseDelayMs: number; maxRetries: number };

  constructor(options: ClickHouseMetricStoreOptions) {
    this.client = options.client;
    this.config = options.config;
    this.log = options.log ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.retry = options.retry ?? {
      baseDelayMs: Defaults.connectRetryBaseDelayMs,
      maxRetries: Defaults.connectRetries,
    };
  }

  async init(signal?: AbortSignal): Promise<void> {
    await withRetry(() => this.client.ping(), {
      ...this.retry,
      log: this.log,
      operationName: 'ClickHouse ping',
    });

    if (!this.config.createTables) {
      this.log.info('Table creation disabled, assuming schema exists');
      return;
    }

    const definitions = tableDefinitions(this.config.schemaLayout);
    await this.client.command(createDatabaseStatement(this.config.database), signal);
    for (const key of TABLE_KEYS) {
      await this.client.command(createTableStatement(this.tableName(key), definitions[key]), signal);
    }
    this.log.info('ClickHouse schema ready', {
      database: this.config.database,
      layout: this.config.schemaLayout,
      tables: TABLE_KEYS.length,
    });
  }

  async storeMetrics(metrics: Metric[], signal?: AbortSignal): Promise<StoreResult> {
    const rows = toMetricRows(metrics, this.now);
    const written = await this.insertRows('metrics', rows, signal);
    return { category: 'metrics', skipped: [], written };
  }

  async storeWorkouts(workouts: Workout[], signal?: AbortSignal): Promise<StoreResult> {
    const mapped = toWorkoutRows(workouts, this.config.schemaLayout);

    // Workout rows, then the six child tables
    let written = await this.insertRows('workouts', mapped.workouts, signal);
    written += await this.insertRows('workout_routes', mapped.routes, signal);
    written += await this.insertRows('workout_heart_rate_data', mapped.heartRateData, signal);
    written += await this.insertRows('workout_heart_rate_recovery', mapped.heartRateRecovery, signal);
    written += await this.insertRows('workout_step_count_log', mapped.stepCount, signal);
    written += await this.insertRows(
      'workout_walking_running_distance',
      mapped.walkingRunningDistance,
      signal,
    );
    written += await this.insertRows('workout_active_energy', mapped.activeEnergy, signal);

    return { category: 'workouts', skipped: mapped.skipped, written };
  }

  async storeStateOfMind(entries: StateOfMind[], signal?: AbortSignal): Promise<StoreResult> {
    const mapped = toStateOfMindRows(entries);
    const written = await this.insertRows('state_of_mind', mapped.rows, signal);
    return { category: 'stateOfMind', skipped: mapped.skipped, written };
  }

  async storeEcg(entries: Ecg[], signal?: AbortSignal): Promise<StoreResult> {
    const mapped = toEcgRows(entries);
    let written = await this.insertRows('ecg', mapped.ecg, signal);
    written += await this.insertRows('ecg_voltage', mapped.voltages, signal);
    return { category: 'ecg', skipped: mapped.skipped, written };
  }

  async optimizeTables(signal?: AbortSignal): Promise<void> {
    for (const key of TABLE_KEYS) {
      const table = this.tableName(key);
      try {
        await this.client.command(optimizeTableStatement(table), signal);
      } catch (error) {
        throw new StorageError(table, error);
      }
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private tableName(key: TableKey): string {
    return `${this.config.database}.${this.config.tables[key]}`;
  }

  private async insertRows(key: TableKey, rows: RowRecord[], signal?: AbortSignal): Promise<number> {
    if (rows.length === 0) return 0;

    const table = this.tableName(key);
    const batchSize = this.config.insertBatchSize;
    for (let offset = 0; offset < rows.length; offset += batchSize) {
      const batch = rows.slice(offset, offset + batchSize);
      try {
        await this.client.insert(table, batch, signal);
      } catch (error) {
        throw new StorageError(table, error);
      }
      this.log.debug('Inserted batch', { rows: batch.length, table });
    }
    return rows.length;
  }
}
