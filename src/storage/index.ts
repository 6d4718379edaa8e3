export { ClickHouseMetricStore } from './clickhouse/ClickHouseMetricStore';
export type { ClickHouseMetricStoreOptions } from './clickhouse/ClickHouseMetricStore';
export { createClickHouseClient } from './clickhouse/client';
export {
  createDatabaseStatement,
  createTableStatement,
  optimizeTableStatement,
  tableDefinitions,
} from './clickhouse/schema';
export type { ColumnDefinition, TableDefinition } from './clickhouse/schema';
export type { ColumnStoreClient, MetricStore } from './types';
