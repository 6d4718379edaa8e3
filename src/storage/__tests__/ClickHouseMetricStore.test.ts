import { FakeClickHouseClient, testClickHouseConfig } from '../../__tests__/support/fakeClickHouse';
import { silenceConsole, testLogger } from '../../__tests__/support/helpers';
import { StorageError } from '../../utils/errors';
import { ClickHouseMetricStore } from '../clickhouse/ClickHouseMetricStore';

import type { ClickHouseConfig } from '../../config';
import type { Ecg, Metric, StateOfMind, Workout } from '../../types';

const NOW = new Date('2024-02-01T12:00:00Z');
const WORKOUT_ID = '0b1c2d3e-4f50-4617-8293-a4b5c6d7e8f9';

function setup(overrides: Partial<ClickHouseConfig> = {}) {
  const config = testClickHouseConfig(overrides);
  const client = new FakeClickHouseClient(config);
  const store = new ClickHouseMetricStore({
    client,
    config,
    log: testLogger(),
    now: () => NOW,
    retry: { baseDelayMs: 1, maxRetries: 2 },
  });
  return { client, config, store };
}

const heartRate: Metric = {
  name: 'heart_rate',
  samples: [
    { date: new Date('2024-01-01T08:00:00Z'), kind: 'quantity', qty: 65 },
    { date: new Date('2024-01-01T08:01:00Z'), kind: 'quantity', qty: 67 },
  ],
  units: 'count/min',
};

const run: Workout = {
  activeEnergy: [{ date: new Date('2024-01-01T07:01:00Z'), qty: 12, source: 'Watch', units: 'kcal' }],
  duration: 1800,
  end: new Date('2024-01-01T07:30:00Z'),
  heartRateData: [
    { avg: 150, date: new Date('2024-01-01T07:05:00Z'), max: 160, min: 140, qty: 0, source: 'Watch', units: 'bpm' },
  ],
  heartRateRecovery: [],
  id: WORKOUT_ID,
  location: 'Outdoor',
  name: 'Outdoor Run',
  route: [],
  start: new Date('2024-01-01T07:00:00Z'),
  stepCount: [],
  walkingAndRunningDistance: [],
};

const mood: StateOfMind = {
  associations: [],
  end: new Date('2024-01-01T09:00:00Z'),
  kind: 'dailyMood',
  labels: ['Happy'],
  start: new Date('2024-01-01T09:00:00Z'),
  valence: 0.8,
  valenceClassification: 'pleasant',
};

const ecg: Ecg = {
  averageHeartRate: 70,
  classification: 'Sinus Rhythm',
  end: new Date('2024-01-01T10:00:30Z'),
  numberOfVoltageMeasurements: 2,
  samplingFrequency: 500,
  source: 'Apple Watch',
  start: new Date('2024-01-01T10:00:00Z'),
  voltageMeasurements: [
    { units: 'mcV', voltage: 1 },
    { units: 'mcV', voltage: 2 },
  ],
};

describe('ClickHouseMetricStore', () => {
  silenceConsole();

  describe('init', () => {
    it('creates the database and all eleven tables', async () => {
      const { client, store } = setup();

      await store.init();

      expect(client.commands).toHaveLength(12);
      expect(client.commands[0]).toBe('CREATE DATABASE IF NOT EXISTS health');
      expect(client.commands[1]).toBe(
        [
          'CREATE TABLE IF NOT EXISTS health.metrics (',
          '  `timestamp` DateTime,',
          '  `metric_name` String,',
          '  `metric_unit` String,',
          '  `metric_type` String,',
          '  `qty` Float64,',
          '  `max` Float64,',
          '  `min` Float64,',
          '  `avg` Float64,',
          '  `asleep` Float64,',
          '  `in_bed` Float64,',
          '  `sleep_source` String,',
          '  `in_bed_source` String',
          ') ENGINE = ReplacingMergeTree',
          'PRIMARY KEY (`timestamp`, `metric_name`)',
          'ORDER BY (`timestamp`, `metric_name`)',
        ].join('\n'),
      );
      expect(client.commands.at(-1)).toContain('CREATE TABLE IF NOT EXISTS health.ecg_voltage (');
    });

    it('uses configured table names', async () => {
      const { client, store } = setup({
        tables: { ...testClickHouseConfig().tables, metrics: 'health_metrics' },
      });

      await store.init();

      expect(client.commands[1]).toMatch(/^CREATE TABLE IF NOT EXISTS health\.health_metrics \(/);
    });

    it('only pings when table creation is disabled', async () => {
      const { client, store } = setup({ createTables: false });

      await store.init();

      expect(client.commands).toEqual([]);
    });

    it('retries the ping and fails once attempts run out', async () => {
      const { client, store } = setup();
      client.pingFailures = 1;
      await expect(store.init()).resolves.toBeUndefined();

      client.pingFailures = 2;
      await expect(store.init()).rejects.toThrow('ECONNREFUSED');
    });
  });

  it('writes metric rows', async () => {
    const { client, store } = setup();

    const result = await store.storeMetrics([heartRate]);

    expect(result).toEqual({ category: 'metrics', skipped: [], written: 2 });
    expect(client.rows('health.metrics').map((row) => row.qty)).toEqual([65, 67]);
  });

  it('splits inserts into batches', async () => {
    const { client, store } = setup({ insertBatchSize: 2 });
    const samples = [1, 2, 3, 4, 5].map((qty) => ({
      date: new Date(Date.UTC(2024, 0, 1, 0, qty)),
      kind: 'quantity' as const,
      qty,
    }));

    await store.storeMetrics([{ name: 'step_count', samples, units: 'count' }]);

    expect(client.inserts).toEqual([
      { rows: 2, table: 'health.metrics' },
      { rows: 2, table: 'health.metrics' },
      { rows: 1, table: 'health.metrics' },
    ]);
  });

  it('writes a workout and its children', async () => {
    const { client, store } = setup();

    const result = await store.storeWorkouts([run]);

    expect(result).toEqual({ category: 'workouts', skipped: [], written: 3 });
    expect(client.inserts.map((insert) => insert.table)).toEqual([
      'health.workouts',
      'health.workout_heart_rate_data',
      'health.workout_active_energy',
    ]);
    expect(client.rows('health.workout_active_energy')[0]).toMatchObject({
      qty: 12,
      workout_id: WORKOUT_ID,
    });
  });

  it('reports skipped records', async () => {
    const { store } = setup();

    const result = await store.storeStateOfMind([{ ...mood, end: undefined }, mood]);

    expect(result).toEqual({
      category: 'stateOfMind',
      skipped: [{ category: 'stateOfMind', index: 0, reason: 'missing end time' }],
      written: 1,
    });
  });

  it('writes ECG summary and voltage rows', async () => {
    const { client, store } = setup();

    const result = await store.storeEcg([ecg]);

    expect(result.written).toBe(3);
    expect(client.rows('health.ecg_voltage').map((row) => row.sample_index)).toEqual([0, 1]);
  });

  it('wraps insert failures in a StorageError naming the table', async () => {
    const { client, store } = setup();
    client.failInsertsInto('health.workout_heart_rate_data');

    const failure = store.storeWorkouts([run]);

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toThrow(
      'failed to write to health.workout_heart_rate_data: connection reset',
    );
    // the workout row was already sent; the remaining child tables were not
    expect(client.inserts.map((insert) => insert.table)).toEqual(['health.workouts']);
  });

  it('does nothing for empty input', async () => {
    const { client, store } = setup();

    await store.storeMetrics([]);
    await store.storeWorkouts([]);
    await store.storeStateOfMind([]);
    await store.storeEcg([]);

    expect(client.inserts).toEqual([]);
  });

  it('leaves one row per primary key after re-writing and optimizing', async () => {
    const { client, store } = setup();

    for (let upload = 0; upload < 2; upload++) {
      await store.storeMetrics([heartRate]);
      await store.storeEcg([ecg]);
      await store.storeWorkouts([run]);
      await store.storeStateOfMind([mood]);
    }
    expect(client.rows('health.metrics')).toHaveLength(4);

    await store.optimizeTables();
    await store.optimizeTables();

    expect(client.rows('health.metrics')).toHaveLength(2);
    expect(client.rows('health.ecg')).toHaveLength(1);
    expect(client.rows('health.ecg_voltage')).toHaveLength(2);
    expect(client.rows('health.workouts')).toHaveLength(1);
    expect(client.rows('health.workout_heart_rate_data')).toHaveLength(1);
    expect(client.rows('health.workout_active_energy')).toHaveLength(1);
    expect(client.rows('health.state_of_mind')).toHaveLength(1);
    expect(client.commands.filter((command) => command.startsWith('OPTIMIZE'))).toHaveLength(22);
  });

  it('closes the client', async () => {
    const { client, store } = setup();

    await store.close();

    expect(client.closed).toBe(true);
  });
});
