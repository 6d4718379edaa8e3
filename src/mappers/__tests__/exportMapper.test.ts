import { DecodeError } from '../../utils/errors';
import { classifySample, decodeExport, formatSummary, summarizeExport } from '../exportMapper';

function decode(data: Record<string, unknown>) {
  return decodeExport(JSON.stringify({ data }));
}

describe('decodeExport', () => {
  it('defaults every category to empty', () => {
    const { export: data, report } = decode({});

    expect(data).toEqual({ ecg: [], metrics: [], stateOfMind: [], workouts: [] });
    expect(report.ambiguousSamples).toBe(0);
    expect(formatSummary(summarizeExport(data))).toBe(
      'Processing request. Received 0 metrics (0 populated), 0 samples, 0 workouts, 0 state of mind entries and 0 ECG recordings.',
    );
  });

  it('counts populated metrics and samples', () => {
    const { export: data } = decode({
      metrics: [
        {
          data: [
            { date: '2024-01-01 08:00:00 +0000', qty: 65 },
            { date: '2024-01-01 08:01:00 +0000', qty: 66 },
          ],
          name: 'heart_rate',
          units: 'count/min',
        },
        { data: [], name: 'step_count', units: 'count' },
      ],
    });

    expect(summarizeExport(data)).toEqual({
      ecg: 0,
      metrics: 2,
      populatedMetrics: 1,
      samples: 2,
      stateOfMind: 0,
      workouts: 0,
    });
  });

  it('decodes a quantity object and a one-element array identically', () => {
    const quantity = { qty: 5.2, units: 'km' };
    const single = decode({ workouts: [{ distance: quantity, name: 'Run' }] });
    const wrapped = decode({ workouts: [{ distance: [quantity], name: 'Run' }] });

    expect(single.export.workouts[0].distance).toEqual({ qty: 5.2, units: 'km' });
    expect(wrapped.export).toEqual(single.export);
  });

  it('reports the path of a quantity that is neither object nor array', () => {
    expect(() => decode({ workouts: [{ distance: 'far' }] })).toThrow(
      new DecodeError('data.workouts.0.distance: Expected object, received string'),
    );
  });

  it('rejects an unrecognized timestamp', () => {
    expect(() =>
      decode({ metrics: [{ data: [{ date: 'yesterday', qty: 1 }], name: 'step_count' }] }),
    ).toThrow('data.metrics.0.data.0.date: unrecognized timestamp "yesterday"');
  });

  it('rejects a body that is not JSON', () => {
    expect(() => decodeExport('{"data":')).toThrow(DecodeError);
    expect(() => decodeExport('')).toThrow(/^invalid JSON: /);
  });

  it('rejects a body without a data object', () => {
    expect(() => decodeExport('{"metrics":[]}')).toThrow('data: Required');
  });

  it('ignores unknown fields', () => {
    const { export: data } = decode({
      extra: true,
      metrics: [{ data: [{ qty: 1, unexpected: 'x' }], name: 'step_count', units: 'count' }],
    });

    expect(data.metrics[0].samples[0]).toEqual({ date: undefined, kind: 'quantity', qty: 1 });
  });

  it('normalizes capitalised heart rate statistics', () => {
    const { export: data } = decode({
      metrics: [{ data: [{ Avg: 60, Max: 70, Min: 50 }], name: 'heart_rate', units: 'count/min' }],
      workouts: [{ heartRateData: [{ Avg: 120, Max: 150, Min: 90, units: 'bpm' }], name: 'Run' }],
    });

    expect(data.metrics[0].samples[0]).toEqual({
      avg: 60,
      date: undefined,
      kind: 'range',
      max: 70,
      min: 50,
    });
    expect(data.workouts[0].heartRateData[0]).toMatchObject({ avg: 120, max: 150, min: 90, qty: 0 });
  });

  it('fills heart rate quantities from the heartRate summary', () => {
    const { export: data } = decode({
      workouts: [
        {
          heartRate: { avg: { qty: 140, units: 'bpm' }, max: { qty: 171, units: 'bpm' } },
          maxHeartRate: { qty: 175, units: 'bpm' },
          name: 'Run',
        },
      ],
    });

    expect(data.workouts[0].avgHeartRate).toEqual({ qty: 140, units: 'bpm' });
    expect(data.workouts[0].maxHeartRate).toEqual({ qty: 175, units: 'bpm' });
  });

  it('counts ambiguous samples and keeps the first-priority shape', () => {
    const { export: data, report } = decode({
      metrics: [{ data: [{ min: 3, qty: 1 }, { qty: 2 }], name: 'odd_metric' }],
    });

    expect(report.ambiguousSamples).toBe(1);
    expect(data.metrics[0].samples.map((sample) => sample.kind)).toEqual(['range', 'quantity']);
  });

  it('reads ECG voltage dates as Unix seconds and defaults the measurement count', () => {
    const { export: data } = decode({
      ecg: [
        {
          classification: 'Sinus Rhythm',
          samplingFrequency: 512,
          start: '2024-01-01 08:00:00 +0000',
          voltageMeasurements: [
            { date: 1704096000.5, units: 'mcV', voltage: -12.5 },
            { units: 'mcV', voltage: 3 },
          ],
        },
      ],
    });

    const [ecg] = data.ecg;
    expect(ecg.numberOfVoltageMeasurements).toBe(2);
    expect(ecg.voltageMeasurements[0].date?.toISOString()).toBe('2024-01-01T08:00:00.500Z');
    expect(ecg.voltageMeasurements[1].date).toBeUndefined();
  });

  it('decodes state of mind entries with ISO timestamps', () => {
    const { export: data } = decode({
      stateOfMind: [
        {
          associations: ['Work'],
          end: '2024-01-01T09:00:00Z',
          kind: 'momentaryEmotion',
          labels: ['Calm'],
          start: '2024-01-01T08:59:00Z',
          valence: 0.4,
          valenceClassification: 'slightlyPleasant',
        },
      ],
    });

    expect(data.stateOfMind[0]).toEqual({
      associations: ['Work'],
      end: new Date('2024-01-01T09:00:00Z'),
      id: undefined,
      kind: 'momentaryEmotion',
      labels: ['Calm'],
      start: new Date('2024-01-01T08:59:00Z'),
      valence: 0.4,
      valenceClassification: 'slightlyPleasant',
    });
  });
});

describe('classifySample', () => {
  it('treats a sample without value fields as a zero quantity', () => {
    expect(classifySample({})).toEqual({
      ambiguous: false,
      sample: { date: undefined, kind: 'quantity', qty: 0 },
    });
  });

  it('prefers sleep over the other shapes', () => {
    const { ambiguous, sample } = classifySample({ asleep: 6.5, qty: 1, sleepSource: 'Watch' });

    expect(ambiguous).toBe(true);
    expect(sample).toEqual({
      asleep: 6.5,
      date: undefined,
      inBed: 0,
      inBedSource: '',
      kind: 'sleep',
      sleepSource: 'Watch',
    });
  });
});
