import { mapWithConcurrency } from '../lib/concurrency';
import { shiftCalendarDate } from '../lib/dates';
import type { Failure, Result } from '../lib/result';
import type { CredentialStore } from '../stores/credentialStore';
import type { DailyMetricsRecord, DailyMetricsStore } from '../stores/dailyMetricsStore';
import { errorMessage } from './whoopAuthService';
import type { WhoopClient } from './whoopClient';
import { WHOOP_CATEGORIES, type WhoopCategory, type WhoopRecordMap } from './whoopTypes';

export interface CategoryStatus {
  category: WhoopCategory;
  ok: boolean;
  count: number;
  failure?: Failure;
}

export type SyncStatus = 'synced' | 'partial' | 'failed' | 'not_linked';

export interface SyncOutcome {
  userId: string;
  date: string;
  status: SyncStatus;
  partialSync: boolean;
  categories: CategoryStatus[];
  record: DailyMetricsRecord | null;
}

export interface SweepSummary {
  date: string;
  users: number;
  synced: number;
  partial: number;
  failed: number;
  notLinked: number;
  errors: Array<{ userId: string; message: string }>;
}

export interface HealthSyncOptions {
  recordLimit: number;
  concurrency: number;
  clock?: () => Date;
}

export class HealthSyncService {
  private readonly clock: () => Date;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly metrics: DailyMetricsStore,
    private readonly whoop: WhoopClient,
    private readonly options: HealthSyncOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async sync(userId: string, date: string): Promise<SyncOutcome> {
    if (!(await this.credentials.get(userId))) {
      return {
        userId,
        date,
        status: 'not_linked',
        partialSync: false,
        categories: WHOOP_CATEGORIES.map((category): CategoryStatus => ({
          category,
          ok: false,
          count: 0,
          failure: { kind: 'NotLinked', message: 'No WHOOP account linked' },
        })),
        record: null,
      };
    }

    const filters = {
      startDate: date,
      endDate: shiftCalendarDate(date, 1),
      limit: this.options.recordLimit,
    };
    const [sleep, recovery, workout] = await Promise.all([
      this.whoop.fetchRecords(userId, 'sleep', filters),
      this.whoop.fetchRecords(userId, 'recovery', filters),
      this.whoop.fetchRecords(userId, 'workout', filters),
    ]);

    const categories = [
      categoryStatus('sleep', sleep),
      categoryStatus('recovery', recovery),
      categoryStatus('workout', workout),
    ];
    const succeeded = categories.filter(c => c.ok).length;

    // A failed category is stored empty, never left at its previous value.
    const record = await this.metrics.upsert(
      userId,
      date,
      {
        sleepRecords: sleep.ok ? sleep.value : [],
        recoveryRecords: recovery.ok ? recovery.value : [],
        workoutRecords: workout.ok ? workout.value : [],
      },
      this.clock()
    );

    if (succeeded === 0) {
      console.error(`❌ WHOOP sync failed for user ${userId} on ${date}`);
      return { userId, date, status: 'failed', partialSync: false, categories, record };
    }

    const partialSync = succeeded < categories.length;
    if (partialSync) {
      const failed = categories.filter(c => !c.ok).map(c => `${c.category} (${c.failure?.kind})`);
      console.warn(`⚠️ PartialSync for user ${userId} on ${date}: ${failed.join(', ')}`);
    }

    return {
      userId,
      date,
      status: partialSync ? 'partial' : 'synced',
      partialSync,
      categories,
      record,
    };
  }

  /** Sync sweep over every linked user. One user's failure never stops the others. */
  async syncAll(date: string): Promise<SweepSummary> {
    const userIds = await this.credentials.listUserIds();
    console.log(`🔄 Starting WHOOP sync sweep for ${date} (${userIds.length} users)`);

    const summary: SweepSummary = { date, users: userIds.length, synced: 0, partial: 0, failed: 0, notLinked: 0, errors: [] };

    await mapWithConcurrency(userIds, this.options.concurrency, async userId => {
      try {
        const outcome = await this.sync(userId, date);
        if (outcome.status === 'synced') summary.synced++;
        else if (outcome.status === 'partial') summary.partial++;
        else if (outcome.status === 'not_linked') summary.notLinked++;
        else summary.failed++;
      } catch (error) {
        console.error(`❌ Sync crashed for user ${userId}:`, error);
        summary.failed++;
        summary.errors.push({ userId, message: errorMessage(error) });
      }
    });

    console.log(
      `✅ Sync sweep ${date}: ${summary.synced} synced, ${summary.partial} partial, ${summary.failed} failed, ${summary.notLinked} not linked`
    );
    return summary;
  }
}

function categoryStatus<C extends WhoopCategory>(category: C, result: Result<WhoopRecordMap[C][]>): CategoryStatus {
  return result.ok
    ? { category, ok: true, count: result.value.length }
    : { category, ok: false, count: 0, failure: result.error };
}
