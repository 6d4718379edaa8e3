/**
 * ClickHouse table layout.
 *
 * Every table is a ReplacingMergeTree: rows sharing a primary key collapse
 * to the latest insert on merge, so re-uploading an export is idempotent
 * once `OPTIMIZE ... FINAL` has run.
 */

import type { SchemaLayout, TableKey } from '../../types';

export interface ColumnDefinition {
  name: string;
  type: string;
}

export interface TableDefinition {
  columns: ColumnDefinition[];
  primaryKey: string[];
}

const column = (name: string, type: string): ColumnDefinition => ({ name, type });

const quantityColumns = (prefix: string): ColumnDefinition[] => [
  column(`${prefix}_qty`, 'Float64'),
  column(`${prefix}_units`, 'String'),
];

function workoutKeyColumns(layout: SchemaLayout): ColumnDefinition[] {
  return layout === 'uuid'
    ? [column('workout_id', 'UUID')]
    : [column('workout_name', 'String'), column('workout_start', 'DateTime')];
}

function childTable(layout: SchemaLayout, columns: ColumnDefinition[]): TableDefinition {
  const keyColumns = workoutKeyColumns(layout);
  return {
    columns: [...keyColumns, column('timestamp', 'DateTime'), ...columns],
    primaryKey: [...keyColumns.map((keyColumn) => keyColumn.name), 'timestamp'],
  };
}

const heartRateColumns = [
  column('qty', 'Float64'),
  column('min', 'Float64'),
  column('max', 'Float64'),
  column('avg', 'Float64'),
  column('units', 'String'),
  column('source', 'String'),
];

const timeseriesColumns = [
  column('qty', 'Float64'),
  column('units', 'String'),
  column('source', 'String'),
];

export function tableDefinitions(layout: SchemaLayout): Record<TableKey, TableDefinition> {
  return {
    ecg: {
      columns: [
        column('id', 'UUID'),
        column('classification', 'String'),
        column('source', 'String'),
        column('average_heart_rate', 'Float64'),
        column('start', 'DateTime'),
        column('end', 'DateTime'),
        column('number_of_voltage_measurements', 'UInt32'),
        column('sampling_frequency', 'Float64'),
      ],
      primaryKey: ['id'],
    },
    ecg_voltage: {
      columns: [
        column('ecg_id', 'UUID'),
        column('sample_index', 'UInt32'),
        column('timestamp', 'DateTime64(3)'),
        column('voltage', 'Float64'),
        column('units', 'String'),
      ],
      primaryKey: ['ecg_id', 'sample_index'],
    },
    metrics: {
      columns: [
        column('timestamp', 'DateTime'),
        column('metric_name', 'String'),
        column('metric_unit', 'String'),
        column('metric_type', 'String'),
        column('qty', 'Float64'),
        column('max', 'Float64'),
        column('min', 'Float64'),
        column('avg', 'Float64'),
        column('asleep', 'Float64'),
        column('in_bed', 'Float64'),
        column('sleep_source', 'String'),
        column('in_bed_source', 'String'),
      ],
      primaryKey: ['timestamp', 'metric_name'],
    },
    state_of_mind: {
      columns: [
        column('id', 'UUID'),
        column('start', 'DateTime'),
        column('end', 'DateTime'),
        column('valence', 'Float64'),
        column('valence_classification', 'String'),
        column('kind', 'String'),
        column('labels', 'Array(String)'),
        column('associations', 'Array(String)'),
      ],
      primaryKey: ['id'],
    },
    workout_active_energy: childTable(layout, timeseriesColumns),
    workout_heart_rate_data: childTable(layout, heartRateColumns),
    workout_heart_rate_recovery: childTable(layout, heartRateColumns),
    workout_routes: childTable(layout, [
      column('lat', 'Float64'),
      column('lon', 'Float64'),
      column('altitude', 'Float64'),
      column('course', 'Float64'),
      column('vertical_accuracy', 'Float64'),
      column('horizontal_accuracy', 'Float64'),
      column('course_accuracy', 'Float64'),
      column('speed', 'Float64'),
      column('speed_accuracy', 'Float64'),
    ]),
    workout_step_count_log: childTable(layout, timeseriesColumns),
    workout_walking_running_distance: childTable(layout, timeseriesColumns),
    workouts: {
      columns: [
        // Legacy exports may carry non-UUID ids, so the column relaxes to String
        column('id', layout === 'uuid' ? 'UUID' : 'String'),
        column('name', 'String'),
        column('location', 'String'),
        column('start', 'DateTime'),
        column('end', 'DateTime'),
        column('duration', 'Float64'),
        ...quantityColumns('active_energy'),
        ...quantityColumns('distance'),
        ...quantityColumns('intensity'),
        ...quantityColumns('humidity'),
        ...quantityColumns('temperature'),
        ...quantityColumns('elevation_up'),
        ...quantityColumns('avg_heart_rate'),
        ...quantityColumns('max_heart_rate'),
        ...quantityColumns('step_cadence'),
        ...quantityColumns('speed'),
      ],
      primaryKey: layout === 'uuid' ? ['id'] : ['name', 'start'],
    },
  };
}

export function createDatabaseStatement(database: string): string {
  return `CREATE DATABASE IF NOT EXISTS ${database}`;
}

export function createTableStatement(qualifiedName: string, definition: TableDefinition): string {
  const columns = definition.columns.map(({ name, type }) => `  \`${name}\` ${type}`).join(',\n');
  const primaryKey = definition.primaryKey.map((name) => `\`${name}\``).join(', ');
  return [
    `CREATE TABLE IF NOT EXISTS ${qualifiedName} (`,
    columns,
    `) ENGINE = ReplacingMergeTree`,
    `PRIMARY KEY (${primaryKey})`,
    `ORDER BY (${primaryKey})`,
  ].join('\n');
}

export function optimizeTableStatement(qualifiedName: string): string {
  return `OPTIMIZE TABLE ${qualifiedName} FINAL`;
}
