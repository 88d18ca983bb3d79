import type { RecoveryRecord, SleepRecord, WorkoutRecord } from '../services/whoopTypes';

export const sleepRecord: SleepRecord = {
  id: 101,
  start: '2025-01-09T22:30:00.000Z',
  end: '2025-01-10T06:30:00.000Z',
  nap: false,
  score_state: 'SCORED',
  score: {
    stage_summary: {
      total_in_bed_time_milli: 28_800_000,
      total_light_sleep_time_milli: 12_600_000,
      total_slow_wave_sleep_time_milli: 5_400_000,
      total_rem_sleep_time_milli: 6_300_000,
    },
  },
};

export const napRecord: SleepRecord = {
  id: 102,
  start: '2025-01-10T14:00:00.000Z',
  end: '2025-01-10T14:30:00.000Z',
  nap: true,
  score_state: 'SCORED',
  score: {
    stage_summary: {
      total_in_bed_time_milli: 1_800_000,
      total_light_sleep_time_milli: 1_200_000,
      total_slow_wave_sleep_time_milli: 600_000,
      total_rem_sleep_time_milli: 0,
    },
  },
};

export const recoveryRecord: RecoveryRecord = {
  cycle_id: 201,
  sleep_id: 101,
  score_state: 'SCORED',
  score: { recovery_score: 67, resting_heart_rate: 52 },
};

export const workoutRecord: WorkoutRecord = {
  id: 301,
  start: '2025-01-10T17:00:00.000Z',
  end: '2025-01-10T18:00:00.000Z',
  sport_name: 'running',
  score_state: 'SCORED',
  score: { strain: 12.4, kilojoule: 1530.6 },
};
