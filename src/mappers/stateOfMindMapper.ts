import { createStateOfMindId } from '../utils/deduplication';

import type { MappedRows, StateOfMind, StateOfMindRow } from '../types';

export function toStateOfMindRows(entries: StateOfMind[]): MappedRows<StateOfMindRow> {
  const result: MappedRows<StateOfMindRow> = { rows: [], skipped: [] };

  for (const [index, entry] of entries.entries()) {
    const { end, start } = entry;
    if (!start || !end) {
      result.skipped.push({
        category: 'stateOfMind',
        index,
        reason: start ? 'missing end time' : 'missing start time',
      });
      continue;
    }

    result.rows.push({
      associations: entry.associations,
      end,
      id: createStateOfMindId(entry, start, end),
      kind: entry.kind,
      labels: entry.labels,
      start,
      valence: entry.valence,
      valence_classification: entry.valenceClassification,
    });
  }

  return result;
}
