import { mapWithConcurrency } from '../lib/concurrency';
import { calendarDate, hourOfDay } from '../lib/dates';
import type { ChatEntry, ChatHistoryStore } from '../stores/chatHistoryStore';
import type { DailyMetricsStore } from '../stores/dailyMetricsStore';
import type { UserStore } from '../stores/userStore';
import type { AICoachService } from './aiCoachService';
import { summarizeDailyMetrics } from './healthReport';
import { errorMessage } from './whoopAuthService';

/** Outbound side of the chat layer. */
export interface MessageSender {
  send(userId: string, text: string): Promise<void>;
}

export interface CheckInOptions {
  timeZone: string;
  minHoursBetweenMessages: number;
  quietHoursStart: number;
  quietHoursEnd: number;
  concurrency: number;
}

export type CheckInResult = 'sent' | 'skipped' | 'failed';

export interface CheckInSummary {
  users: number;
  sent: number;
  skipped: number;
  failed: number;
}

const HOUR_MS = 60 * 60 * 1000;

export class CheckInService {
  constructor(
    private readonly users: UserStore,
    private readonly chatHistory: ChatHistoryStore,
    private readonly metrics: DailyMetricsStore,
    private readonly coach: AICoachService,
    private readonly sender: MessageSender,
    private readonly options: CheckInOptions
  ) {}

  isQuietHour(now: Date): boolean {
    const hour = hourOfDay(now, this.options.timeZone);
    const { quietHoursStart: start, quietHoursEnd: end } = this.options;
    return start > end ? hour >= start || hour < end : hour >= start && hour < end;
  }

  isDue(history: ChatEntry[], now: Date): boolean {
    const last = history[history.length - 1];
    if (!last) return true;
    return now.getTime() - last.timestamp.getTime() >= this.options.minHoursBetweenMessages * HOUR_MS;
  }

  async checkIn(userId: string, userName: string | undefined, now: Date): Promise<CheckInResult> {
    const history = await this.chatHistory.recent(userId, 10);
    if (!this.isDue(history, now)) return 'skipped';
    if (!(await this.coach.shouldCheckIn(history))) return 'skipped';

    const today = calendarDate(now, this.options.timeZone);
    const record = await this.metrics.get(userId, today);
    const message = await this.coach.proactiveMessage({
      userName,
      healthSummary: summarizeDailyMetrics(record),
      history,
    });
    if (!message) return 'skipped';

    await this.sender.send(userId, message);
    await this.chatHistory.append(userId, 'assistant', message);
    return 'sent';
  }

  /** Proactive sweep over all known users; each user is handled in isolation. */
  async run(now: Date): Promise<CheckInSummary> {
    const profiles = await this.users.list();
    const summary: CheckInSummary = { users: profiles.length, sent: 0, skipped: 0, failed: 0 };

    if (this.isQuietHour(now)) {
      console.log('🌙 Quiet hours, skipping check-ins');
      summary.skipped = profiles.length;
      return summary;
    }

    await mapWithConcurrency(profiles, this.options.concurrency, async profile => {
      let result: CheckInResult;
      try {
        result = await this.checkIn(profile.telegramId, profile.name, now);
      } catch (error) {
        console.error(`❌ Check-in failed for user ${profile.telegramId}: ${errorMessage(error)}`);
        result = 'failed';
      }
      summary[result]++;
    });

    console.log(`📨 Check-ins: ${summary.sent} sent, ${summary.skipped} skipped, ${summary.failed} failed`);
    return summary;
  }
}
