import { DailyMetrics } from '../models/DailyMetrics';
import {
  recordListParsers,
  type RecoveryRecord,
  type SleepRecord,
  type WorkoutRecord,
} from '../services/whoopTypes';

export interface DailyMetricsRecord {
  userId: string;
  date: string;
  sleepRecords: SleepRecord[];
  recoveryRecords: RecoveryRecord[];
  workoutRecords: WorkoutRecord[];
  syncedAt: Date;
}

export type DailyMetricsLists = Pick<DailyMetricsRecord, 'sleepRecords' | 'recoveryRecords' | 'workoutRecords'>;

export interface DailyMetricsStore {
  get(userId: string, date: string): Promise<DailyMetricsRecord | null>;
  /** Creates or overwrites the (userId, date) record with all three lists. */
  upsert(userId: string, date: string, lists: DailyMetricsLists, syncedAt: Date): Promise<DailyMetricsRecord>;
}

interface StoredMetrics {
  userId: string;
  date: string;
  sleepRecords?: unknown;
  recoveryRecords?: unknown;
  workoutRecords?: unknown;
  syncedAt: Date;
}

function toRecord(doc: StoredMetrics): DailyMetricsRecord {
  return {
    userId: doc.userId,
    date: doc.date,
    sleepRecords: recordListParsers.sleep(doc.sleepRecords),
    recoveryRecords: recordListParsers.recovery(doc.recoveryRecords),
    workoutRecords: recordListParsers.workout(doc.workoutRecords),
    syncedAt: doc.syncedAt,
  };
}

export class MongoDailyMetricsStore implements DailyMetricsStore {
  async get(userId: string, date: string): Promise<DailyMetricsRecord | null> {
    const doc = await DailyMetrics.findOne({ userId, date }).lean();
    return doc ? toRecord(doc) : null;
  }

  async upsert(userId: string, date: string, lists: DailyMetricsLists, syncedAt: Date): Promise<DailyMetricsRecord> {
    const doc = await DailyMetrics.findOneAndUpdate(
      { userId, date },
      {
        $set: {
          sleepRecords: lists.sleepRecords,
          recoveryRecords: lists.recoveryRecords,
          workoutRecords: lists.workoutRecords,
          syncedAt,
        },
      },
      { upsert: true, returnDocument: 'after' }
    ).lean();

    if (!doc) throw new Error(`Upsert returned no document for ${userId}/${date}`);
    return toRecord(doc);
  }
}
