import { createHash } from 'crypto';

import type { Ecg, StateOfMind } from '../types';

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}

/**
 * Deterministic UUID for a key string: SHA-256 truncated to 128 bits with
 * the version (5, name-based) and RFC 4122 variant bits set.
 * Identical keys always map to the same UUID, so re-uploads replace rows
 * instead of adding them.
 */
export function uuidFromKey(key: string): string {
  const bytes = createHash('sha256').update(key, 'utf8').digest().subarray(0, 16);
  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

/**
 * ECG recordings carry no id. Two uploads of the same recording hash to the
 * same id; recordings differing in any listed field do not.
 */
export function createEcgId(ecg: Ecg, start: Date): string {
  const key = [
    ecg.classification,
    ecg.source,
    String(ecg.averageHeartRate),
    String(ecg.samplingFrequency),
    String(ecg.numberOfVoltageMeasurements),
    start.toISOString(),
  ].join('|');
  return uuidFromKey(key);
}

/**
 * UUID ids pass through (lowercased), other ids are hashed, and entries
 * without an id are identified by their content.
 */
export function createStateOfMindId(entry: StateOfMind, start: Date, end: Date): string {
  if (entry.id !== undefined && entry.id !== '') {
    return isUuid(entry.id) ? entry.id.toLowerCase() : uuidFromKey(entry.id);
  }
  return uuidFromKey(
    [start.toISOString(), end.toISOString(), entry.kind, String(entry.valence)].join('|'),
  );
}
