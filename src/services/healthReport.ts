import type { DailyMetricsRecord } from '../stores/dailyMetricsStore';
import type { RecoveryRecord, SleepRecord, WorkoutRecord } from './whoopTypes';

type ScoredSleep = SleepRecord & { score: NonNullable<SleepRecord['score']> };
type ScoredRecovery = RecoveryRecord & { score: NonNullable<RecoveryRecord['score']> };
type ScoredWorkout = WorkoutRecord & { score: NonNullable<WorkoutRecord['score']> };

export function millisToHhmm(milliseconds: number): string {
  const totalMinutes = Math.floor(Math.max(0, milliseconds) / 60000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

// Records are newest first; pending (unscored) ones are skipped. Naps only count when nothing else is scored.
function mainSleep(records: SleepRecord[]): ScoredSleep | undefined {
  const scored = records.filter((r): r is ScoredSleep => r.score !== undefined);
  return scored.find(r => !r.nap) ?? scored[0];
}

function latestRecovery(records: RecoveryRecord[]): ScoredRecovery | undefined {
  return records.find((r): r is ScoredRecovery => r.score !== undefined);
}

function latestWorkout(records: WorkoutRecord[]): ScoredWorkout | undefined {
  return records.find((r): r is ScoredWorkout => r.score !== undefined);
}

export function hasHealthData(record: DailyMetricsRecord | null): record is DailyMetricsRecord {
  return !!record && (record.sleepRecords.length > 0 || record.recoveryRecords.length > 0 || record.workoutRecords.length > 0);
}

/** One-line summary used as model context, e.g. `SWS: 01:30, REM: 01:45 | Recovery: 67 | Strain: 12.4`. */
export function summarizeDailyMetrics(record: DailyMetricsRecord | null): string {
  if (!record) return 'No health data';

  const parts: string[] = [];

  const sleep = mainSleep(record.sleepRecords);
  if (sleep) {
    const stages = sleep.score.stage_summary;
    parts.push(`SWS: ${millisToHhmm(stages.total_slow_wave_sleep_time_milli)}, REM: ${millisToHhmm(stages.total_rem_sleep_time_milli)}`);
  } else {
    parts.push('No sleep data');
  }

  const recovery = latestRecovery(record.recoveryRecords);
  parts.push(recovery ? `Recovery: ${recovery.score.recovery_score}` : 'No recovery data');

  const workout = latestWorkout(record.workoutRecords);
  parts.push(workout ? `Strain: ${workout.score.strain}` : 'No workout data');

  return parts.join(' | ');
}

export function buildReportHtml(record: DailyMetricsRecord): string {
  let sleepText = 'No sleep data available.';
  const sleep = mainSleep(record.sleepRecords);
  if (sleep) {
    const slowWave = sleep.score.stage_summary.total_slow_wave_sleep_time_milli;
    const rem = sleep.score.stage_summary.total_rem_sleep_time_milli;
    sleepText = [
      `Slow Wave: ${millisToHhmm(slowWave)}`,
      `REM: ${millisToHhmm(rem)}`,
      `Total (SWS + REM): ${millisToHhmm(slowWave + rem)}`,
    ].join('\n');
  }

  const recovery = latestRecovery(record.recoveryRecords);
  const recoveryText = recovery ? `Recovery Score: ${recovery.score.recovery_score}` : 'No recovery data available.';

  let workoutText = 'No workout data available.';
  const workout = latestWorkout(record.workoutRecords);
  if (workout) {
    const kilojoules = workout.score.kilojoule;
    workoutText = `Strain: ${workout.score.strain}\nKilojoules: ${kilojoules !== undefined ? Math.round(kilojoules) : 'N/A'}`;
  }

  return [
    `<b>Health Report for ${record.date}</b>`,
    '',
    '<b>Sleep</b>',
    sleepText,
    '',
    '<b>Recovery</b>',
    recoveryText,
    '',
    '<b>Workout</b>',
    workoutText,
  ].join('\n');
}
