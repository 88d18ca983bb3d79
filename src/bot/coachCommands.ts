import { calendarDate, isCalendarDate } from '../lib/dates';
import { needsRelink } from '../lib/result';
import type { AICoachService } from '../services/aiCoachService';
import { buildReportHtml, hasHealthData, summarizeDailyMetrics } from '../services/healthReport';
import type { HealthSyncService, SyncOutcome } from '../services/healthSyncService';
import type { WhoopClient } from '../services/whoopClient';
import type { WhoopLinkService } from '../services/whoopLinkService';
import type { ChatHistoryStore } from '../stores/chatHistoryStore';
import type { DailyMetricsStore } from '../stores/dailyMetricsStore';
import type { UserStore } from '../stores/userStore';
import { escapeHtml, markdownToTelegramHtml } from './format';
import { failureText, START_TEXT } from './messages';

export interface CoachCommandsDeps {
  users: UserStore;
  chatHistory: ChatHistoryStore;
  metrics: DailyMetricsStore;
  links: WhoopLinkService;
  sync: HealthSyncService;
  whoop: WhoopClient;
  coach: AICoachService;
  timeZone: string;
  clock?: () => Date;
}

const CATEGORY_LABELS = { sleep: 'Sleep', recovery: 'Recovery', workout: 'Workout' } as const;

/**
 * Chat-layer command logic, independent of the Telegram framework.
 * Every method resolves to the HTML reply for the user.
 */
export class CoachCommands {
  private readonly clock: () => Date;

  constructor(private readonly deps: CoachCommandsDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  today(): string {
    return calendarDate(this.clock(), this.deps.timeZone);
  }

  async start(userId: string, name?: string): Promise<string> {
    await this.deps.users.ensure(userId, name);
    return START_TEXT;
  }

  async linkWhoop(userId: string): Promise<string> {
    const url = await this.deps.links.beginLink(userId);
    return [
      'Open the link below to authorize your WHOOP account:',
      `<a href="${escapeHtml(url)}">Authorize WHOOP</a>`,
      '',
      'After you approve access you’ll be sent back and I’ll let you know here.',
    ].join('\n');
  }

  async sync(userId: string, dateArg?: string): Promise<string> {
    const date = this.resolveDate(dateArg);
    if (!date) return invalidDateText('sync');

    const outcome = await this.deps.sync.sync(userId, date);
    return syncReply(outcome);
  }

  async report(userId: string, text: string, dateArg?: string): Promise<string> {
    const date = this.resolveDate(dateArg);
    if (!date) return invalidDateText('report');

    if (!(await this.deps.users.get(userId))) return 'Please /start first.';

    const record = await this.deps.metrics.get(userId, date);
    if (!hasHealthData(record)) {
      return `No WHOOP data stored for ${date}. Use /sync ${date} to pull it.`;
    }

    const analysis = await this.deps.coach.analyzeReport(record);
    const reply = `${buildReportHtml(record)}\n\n<b>Analysis</b>\n${markdownToTelegramHtml(analysis)}`;

    await this.deps.chatHistory.append(userId, 'user', text);
    await this.deps.chatHistory.append(userId, 'assistant', reply);
    return reply;
  }

  async status(userId: string): Promise<string> {
    const profile = await this.deps.whoop.fetchProfile(userId);
    if (!profile.ok) return failureText(profile.error);
    return `✅ Linked to WHOOP as ${escapeHtml(`${profile.value.first_name} ${profile.value.last_name}`)}.`;
  }

  async chat(userId: string, name: string | undefined, text: string): Promise<string> {
    const profile = await this.deps.users.ensure(userId, name);
    const history = await this.deps.chatHistory.recent(userId, 10);
    await this.deps.chatHistory.append(userId, 'user', text);

    const record = await this.deps.metrics.get(userId, this.today());
    const reply = await this.deps.coach.reply(
      { userName: profile.name, healthSummary: summarizeDailyMetrics(record), history },
      text
    );

    await this.deps.chatHistory.append(userId, 'assistant', reply);
    return markdownToTelegramHtml(reply);
  }

  private resolveDate(arg?: string): string | null {
    if (!arg) return this.today();
    return isCalendarDate(arg) ? arg : null;
  }
}

function invalidDateText(command: string): string {
  return `Please use the date format YYYY-MM-DD, e.g. /${command} 2025-01-10.`;
}

function countText(count: number): string {
  return `${count} record${count === 1 ? '' : 's'}`;
}

export function syncReply(outcome: SyncOutcome): string {
  const failures = outcome.categories.flatMap(c => (c.failure ? [c.failure] : []));

  if (outcome.status === 'not_linked' || outcome.status === 'failed') {
    const relink = failures.find(f => needsRelink(f.kind));
    return failureText(relink ?? { kind: 'UpstreamError' });
  }

  const lines = outcome.categories.map(c =>
    c.ok ? `${CATEGORY_LABELS[c.category]}: ${countText(c.count)}` : `${CATEGORY_LABELS[c.category]}: not available right now`
  );
  const header = outcome.partialSync
    ? `⚠️ WHOOP data partly synced for ${outcome.date}`
    : `✅ WHOOP data synced for ${outcome.date}`;
  return [header, ...lines].join('\n');
}
