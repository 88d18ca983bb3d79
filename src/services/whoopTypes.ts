import { z } from 'zod';

export const WHOOP_CATEGORIES = ['sleep', 'recovery', 'workout'] as const;
export type WhoopCategory = (typeof WHOOP_CATEGORIES)[number];
export type WhoopResource = WhoopCategory | 'profile';

export const WHOOP_ENDPOINTS: Record<WhoopResource, string> = {
  sleep: 'activity/sleep',
  recovery: 'recovery',
  workout: 'activity/workout',
  profile: 'user/profile/basic',
};

const recordId = z.union([z.string(), z.number()]);

// Records keep every upstream field; only the ones the coach reads are checked.
export const sleepRecordSchema = z
  .object({
    id: recordId,
    start: z.string(),
    end: z.string().optional(),
    nap: z.boolean().optional(),
    score_state: z.string(),
    score: z
      .object({
        stage_summary: z
          .object({
            total_in_bed_time_milli: z.number(),
            total_light_sleep_time_milli: z.number(),
            total_slow_wave_sleep_time_milli: z.number(),
            total_rem_sleep_time_milli: z.number(),
          })
          .passthrough(),
        sleep_performance_percentage: z.number().optional(),
        sleep_efficiency_percentage: z.number().optional(),
        respiratory_rate: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const recoveryRecordSchema = z
  .object({
    cycle_id: recordId,
    sleep_id: recordId.optional(),
    created_at: z.string().optional(),
    score_state: z.string(),
    score: z
      .object({
        recovery_score: z.number(),
        resting_heart_rate: z.number().optional(),
        hrv_rmssd_milli: z.number().optional(),
        spo2_percentage: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const workoutRecordSchema = z
  .object({
    id: recordId,
    start: z.string(),
    end: z.string().optional(),
    sport_id: z.number().optional(),
    sport_name: z.string().optional(),
    score_state: z.string(),
    score: z
      .object({
        strain: z.number(),
        kilojoule: z.number().optional(),
        average_heart_rate: z.number().optional(),
        max_heart_rate: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const profileSchema = z
  .object({
    user_id: z.number(),
    email: z.string().optional(),
    first_name: z.string(),
    last_name: z.string(),
  })
  .passthrough();

export type SleepRecord = z.infer<typeof sleepRecordSchema>;
export type RecoveryRecord = z.infer<typeof recoveryRecordSchema>;
export type WorkoutRecord = z.infer<typeof workoutRecordSchema>;
export type WhoopProfile = z.infer<typeof profileSchema>;

export interface WhoopRecordMap {
  sleep: SleepRecord;
  recovery: RecoveryRecord;
  workout: WorkoutRecord;
}

export interface CollectionPage<C extends WhoopCategory> {
  records: WhoopRecordMap[C][];
  next_token?: string | null;
}

function pageParser<S extends z.ZodTypeAny>(recordSchema: S) {
  const page = z.object({
    records: z.array(recordSchema),
    next_token: z.string().nullish(),
  });
  return (payload: unknown) => {
    const parsed = page.safeParse(payload);
    return parsed.success ? parsed.data : null;
  };
}

export const pageParsers: { [C in WhoopCategory]: (payload: unknown) => CollectionPage<C> | null } = {
  sleep: pageParser(sleepRecordSchema),
  recovery: pageParser(recoveryRecordSchema),
  workout: pageParser(workoutRecordSchema),
};

export const recordListParsers: { [C in WhoopCategory]: (stored: unknown) => WhoopRecordMap[C][] } = {
  sleep: stored => z.array(sleepRecordSchema).parse(stored ?? []),
  recovery: stored => z.array(recoveryRecordSchema).parse(stored ?? []),
  workout: stored => z.array(workoutRecordSchema).parse(stored ?? []),
};

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});
