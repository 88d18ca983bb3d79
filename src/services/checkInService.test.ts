import { beforeEach, describe, expect, it, vi } from 'vitest';
import { recoveryRecord, sleepRecord, workoutRecord } from '../testing/fixtures';
import { MemoryChatHistoryStore, MemoryDailyMetricsStore, MemoryUserStore } from '../testing/memoryStores';
import { AICoachService } from './aiCoachService';
import { type CheckInOptions, CheckInService, type MessageSender } from './checkInService';

const NOON = new Date('2025-01-10T12:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;

const options: CheckInOptions = {
  timeZone: 'UTC',
  minHoursBetweenMessages: 4,
  quietHoursStart: 22,
  quietHoursEnd: 7,
  concurrency: 2,
};

class RecordingSender implements MessageSender {
  readonly sent: Array<{ userId: string; text: string }> = [];

  async send(userId: string, text: string): Promise<void> {
    if (userId === 'u4') throw new Error('bot was blocked by the user');
    this.sent.push({ userId, text });
  }
}

describe('CheckInService', () => {
  let users: MemoryUserStore;
  let history: MemoryChatHistoryStore;
  let metrics: MemoryDailyMetricsStore;
  let sender: RecordingSender;
  let service: CheckInService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    users = new MemoryUserStore(() => NOON);
    history = new MemoryChatHistoryStore(() => NOON);
    metrics = new MemoryDailyMetricsStore();
    sender = new RecordingSender();
    service = new CheckInService(users, history, metrics, new AICoachService(null), sender, options);
  });

  it('treats a range past midnight as quiet', () => {
    expect(service.isQuietHour(new Date('2025-01-10T23:00:00.000Z'))).toBe(true);
    expect(service.isQuietHour(new Date('2025-01-10T22:00:00.000Z'))).toBe(true);
    expect(service.isQuietHour(new Date('2025-01-10T03:00:00.000Z'))).toBe(true);
    expect(service.isQuietHour(new Date('2025-01-10T07:00:00.000Z'))).toBe(false);
    expect(service.isQuietHour(NOON)).toBe(false);
  });

  it('handles a quiet range within one day', () => {
    const daytime = new CheckInService(users, history, metrics, new AICoachService(null), sender, {
      ...options,
      quietHoursStart: 1,
      quietHoursEnd: 5,
    });

    expect(daytime.isQuietHour(new Date('2025-01-10T03:00:00.000Z'))).toBe(true);
    expect(daytime.isQuietHour(new Date('2025-01-10T05:00:00.000Z'))).toBe(false);
    expect(daytime.isQuietHour(new Date('2025-01-10T23:00:00.000Z'))).toBe(false);
  });

  it('waits the minimum gap after the last message', () => {
    const at = (hoursAgo: number) => [
      { role: 'user' as const, content: 'hi', timestamp: new Date(NOON.getTime() - hoursAgo * HOUR_MS) },
    ];

    expect(service.isDue([], NOON)).toBe(true);
    expect(service.isDue(at(3), NOON)).toBe(false);
    expect(service.isDue(at(4), NOON)).toBe(true);
  });

  it('skips everyone during quiet hours', async () => {
    await users.ensure('u1', 'Ada');
    await users.ensure('u2');

    const summary = await service.run(new Date('2025-01-10T23:30:00.000Z'));

    expect(summary).toEqual({ users: 2, sent: 0, skipped: 2, failed: 0 });
    expect(sender.sent).toHaveLength(0);
  });

  it('messages due users and isolates delivery failures', async () => {
    const today = { sleepRecords: [sleepRecord], recoveryRecords: [recoveryRecord], workoutRecords: [workoutRecord] };
    await users.ensure('u1', 'Ada');
    await users.ensure('u2', 'Grace');
    await users.ensure('u3');
    await users.ensure('u4');
    await metrics.upsert('u1', '2025-01-10', today, NOON);
    await metrics.upsert('u4', '2025-01-10', today, NOON);
    history.seed('u2', { role: 'user', content: 'thanks!', timestamp: new Date(NOON.getTime() - HOUR_MS) });

    const summary = await service.run(NOON);

    expect(summary).toEqual({ users: 4, sent: 1, skipped: 2, failed: 1 });
    const text = 'Quick check-in: SWS: 01:30, REM: 01:45 | Recovery: 67 | Strain: 12.4. How are you feeling today?';
    expect(sender.sent).toEqual([{ userId: 'u1', text }]);
    expect(history.all('u1')).toEqual([{ role: 'assistant', content: text, timestamp: NOON }]);
    expect(history.all('u4')).toEqual([]);
  });
});
