#!/usr/bin/env node
/**
 * Decode a dumped upload and print what would be written, one line per
 * record. Usage: health-export-parse [request.json]
 */

import { promises as fs } from 'fs';

import { decodeExport, formatSummary, summarizeExport } from '../mappers/exportMapper';
import { DecodeError, errorMessage } from '../utils/errors';
import { formatTimestamp } from '../validation/timestamp';

import type { Export, Sample } from '../types';

function optionalTime(date: Date | undefined): string {
  return date ? formatTimestamp(date) : '-';
}

function describeSample(sample: Sample): string {
  switch (sample.kind) {
    case 'quantity': {
      return `qty=${String(sample.qty)}`;
    }
    case 'range': {
      return `min=${String(sample.min)} avg=${String(sample.avg)} max=${String(sample.max)}`;
    }
    case 'sleep': {
      return `asleep=${String(sample.asleep)} inBed=${String(sample.inBed)} sleepSource=${sample.sleepSource} inBedSource=${sample.inBedSource}`;
    }
  }
}

/**
 * Human-readable listing of a decoded export.
 */
export function describeExport(data: Export): string[] {
  const lines: string[] = [];

  for (const metric of data.metrics) {
    for (const sample of metric.samples) {
      lines.push(
        `metric ${metric.name} [${metric.units}] ${optionalTime(sample.date)} ${describeSample(sample)}`,
      );
    }
  }

  for (const workout of data.workouts) {
    lines.push(
      `workout ${workout.id ?? '-'} ${workout.name} ${optionalTime(workout.start)} -> ${optionalTime(workout.end)}`,
    );
    for (const point of workout.route) {
      lines.push(
        `  route ${optionalTime(point.timestamp)} lat=${String(point.latitude)} lon=${String(point.longitude)}`,
      );
    }
    for (const [label, logs] of [
      ['heartRateData', workout.heartRateData],
      ['heartRateRecovery', workout.heartRateRecovery],
    ] as const) {
      for (const log of logs) {
        lines.push(
          `  ${label} ${optionalTime(log.date)} min=${String(log.min)} avg=${String(log.avg)} max=${String(log.max)} ${log.units}`,
        );
      }
    }
    for (const [label, logs] of [
      ['stepCount', workout.stepCount],
      ['walkingAndRunningDistance', workout.walkingAndRunningDistance],
      ['activeEnergy', workout.activeEnergy],
    ] as const) {
      for (const log of logs) {
        lines.push(`  ${label} ${optionalTime(log.date)} qty=${String(log.qty)} ${log.units}`);
      }
    }
  }

  for (const entry of data.stateOfMind) {
    lines.push(
      `stateOfMind ${entry.kind} ${optionalTime(entry.start)} valence=${String(entry.valence)} labels=${entry.labels.join(',')}`,
    );
  }

  for (const ecg of data.ecg) {
    lines.push(
      `ecg ${ecg.classification} ${optionalTime(ecg.start)} ${String(ecg.samplingFrequency)}Hz ${String(ecg.voltageMeasurements.length)} samples`,
    );
    for (const [index, point] of ecg.voltageMeasurements.entries()) {
      lines.push(`  voltage #${String(index)} ${String(point.voltage)} ${point.units}`);
    }
  }

  return lines;
}

async function main(filePath: string): Promise<void> {
  const body = await fs.readFile(filePath, 'utf-8');
  const { export: data } = decodeExport(body);
  for (const line of describeExport(data)) {
    console.log(line);
  }
  console.log(formatSummary(summarizeExport(data)));
}

if (require.main === module) {
  const filePath = process.argv[2] ?? 'request.json';
  main(filePath).catch((error: unknown) => {
    console.error(error instanceof DecodeError ? `ERROR: ${error.message}` : errorMessage(error));
    process.exitCode = 1;
  });
}
