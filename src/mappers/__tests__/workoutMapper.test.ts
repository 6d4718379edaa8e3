import { toWorkoutRows } from '../workoutMapper';

import type { Workout } from '../../types';

const START = new Date('2024-01-01T07:00:00Z');
const END = new Date('2024-01-01T07:45:00Z');
const WORKOUT_ID = '6F1E2C3B-9A8D-4E7F-8A6B-5C4D3E2F1A0B';

function workout(overrides: Partial<Workout> = {}): Workout {
  return {
    activeEnergy: [],
    duration: 2700,
    end: END,
    heartRateData: [],
    heartRateRecovery: [],
    id: WORKOUT_ID,
    location: 'Outdoor',
    name: 'Outdoor Run',
    route: [],
    start: START,
    stepCount: [],
    walkingAndRunningDistance: [],
    ...overrides,
  };
}

describe('toWorkoutRows', () => {
  it('keys rows by the lowercased workout id under the uuid layout', () => {
    const result = toWorkoutRows(
      [
        workout({
          distance: { qty: 8.4, units: 'km' },
          heartRateData: [
            { avg: 150, date: new Date('2024-01-01T07:10:00Z'), max: 160, min: 140, qty: 0, source: 'Watch', units: 'bpm' },
          ],
          stepCount: [{ qty: 120, source: 'Watch', units: 'count' }],
        }),
      ],
      'uuid',
    );
    const id = WORKOUT_ID.toLowerCase();

    expect(result.skipped).toEqual([]);
    expect(result.workouts).toHaveLength(1);
    expect(result.workouts[0]).toMatchObject({
      active_energy_qty: 0,
      active_energy_units: '',
      distance_qty: 8.4,
      distance_units: 'km',
      duration: 2700,
      end: END,
      id,
      location: 'Outdoor',
      name: 'Outdoor Run',
      start: START,
    });
    expect(result.heartRateData).toEqual([
      {
        avg: 150,
        max: 160,
        min: 140,
        qty: 0,
        source: 'Watch',
        timestamp: new Date('2024-01-01T07:10:00Z'),
        units: 'bpm',
        workout_id: id,
      },
    ]);
    // no date of its own: inherits the workout start
    expect(result.stepCount).toEqual([
      { qty: 120, source: 'Watch', timestamp: START, units: 'count', workout_id: id },
    ]);
  });

  it('keys children by name and start under the legacy layout', () => {
    const result = toWorkoutRows(
      [
        workout({
          id: 'not-a-uuid',
          route: [
            {
              altitude: 12,
              course: 90,
              courseAccuracy: 5,
              horizontalAccuracy: 3,
              latitude: 52.1,
              longitude: 4.3,
              speed: 2.9,
              speedAccuracy: 0.4,
              verticalAccuracy: 2,
            },
          ],
        }),
      ],
      'legacy',
    );

    expect(result.workouts[0].id).toBe('not-a-uuid');
    expect(result.routes).toEqual([
      {
        altitude: 12,
        course: 90,
        course_accuracy: 5,
        horizontal_accuracy: 3,
        lat: 52.1,
        lon: 4.3,
        speed: 2.9,
        speed_accuracy: 0.4,
        timestamp: START,
        vertical_accuracy: 2,
        workout_name: 'Outdoor Run',
        workout_start: START,
      },
    ]);
  });

  it('skips workouts it cannot identify or place in time', () => {
    const result = toWorkoutRows(
      [
        workout({ start: undefined }),
        workout({ end: undefined }),
        workout({ id: undefined }),
        workout({ id: 'run-1' }),
        workout({ stepCount: [{ qty: 1, source: '', units: 'count' }] }),
      ],
      'uuid',
    );

    expect(result.skipped).toEqual([
      { category: 'workouts', index: 0, reason: 'missing start time' },
      { category: 'workouts', index: 1, reason: 'missing end time' },
      { category: 'workouts', index: 2, reason: 'missing id' },
      { category: 'workouts', index: 3, reason: 'id "run-1" is not a UUID' },
    ]);
    expect(result.workouts).toHaveLength(1);
    expect(result.stepCount).toHaveLength(1);
  });

  it('maps routes with hundreds of thousands of points', () => {
    const points = 200_000;
    const route = Array.from({ length: points }, (_, i) => ({
      altitude: 12,
      course: 90,
      courseAccuracy: 1,
      horizontalAccuracy: 3,
      latitude: 52 + i / 1_000_000,
      longitude: 13,
      speed: 2.5,
      speedAccuracy: 0.5,
      timestamp: new Date(START.getTime() + i * 1000),
      verticalAccuracy: 2,
    }));
    const stepCount = Array.from({ length: points }, () => ({ qty: 1, source: 'Watch', units: 'count' }));

    const result = toWorkoutRows([workout({ route, stepCount })], 'uuid');

    expect(result.routes).toHaveLength(points);
    expect(result.stepCount).toHaveLength(points);
    expect(result.routes[points - 1]).toMatchObject({
      timestamp: new Date(START.getTime() + (points - 1) * 1000),
      workout_id: WORKOUT_ID.toLowerCase(),
    });
  });
});
