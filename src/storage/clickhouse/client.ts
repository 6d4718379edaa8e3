import { createClient } from '@clickhouse/client';

import type { ClickHouseConfig } from '../../config';
import type { RowRecord } from '../../types';
import type { ColumnStoreClient } from '../types';

/**
 * Adapt the official HTTP client to `ColumnStoreClient`.
 *
 * Dates in rows serialise through `Date#toJSON` (ISO 8601, UTC), which
 * `best_effort` parsing accepts for both DateTime and DateTime64 columns.
 */
export function createClickHouseClient(
  config: Pick<ClickHouseConfig, 'password' | 'url' | 'username'>,
): ColumnStoreClient {
  const client = createClient({
    password: config.password,
    url: config.url,
    username: config.username,
  });

  return {
    async close() {
      await client.close();
    },
    async command(query, signal) {
      await client.command({ abort_signal: signal, query });
    },
    async insert(table: string, rows: RowRecord[], signal?: AbortSignal) {
      await client.insert({
        abort_signal: signal,
        clickhouse_settings: { date_time_input_format: 'best_effort' },
        format: 'JSONEachRow',
        table,
        values: rows,
      });
    },
    async ping() {
      const result = await client.ping();
      if (!result.success) {
        throw result.error;
      }
    },
  };
}
