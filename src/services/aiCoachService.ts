import type { ChatEntry } from '../stores/chatHistoryStore';
import type { DailyMetricsRecord } from '../stores/dailyMetricsStore';
import type { PromptMessage, TextGenerator } from './textGenerator';

export interface CoachContext {
  userName?: string;
  healthSummary: string;
  history: ChatEntry[];
}

const COACH_IDENTITY = `You are a health coach talking to one user over Telegram.
Keep replies short (preferably under 3 sentences), plain and specific.
Do not ask for data that is already in the health summary.
Offer one actionable, evidence-based suggestion at a time.
Use **bold** sparingly; no other formatting.`;

const OFFLINE_REPLY =
  'I can’t reach my coaching model right now. Your message is saved and I’ll have more to say soon.';

export class AICoachService {
  constructor(private readonly generator: TextGenerator | null) {}

  get isOnline(): boolean {
    return this.generator !== null;
  }

  async reply(context: CoachContext, message: string): Promise<string> {
    if (!this.generator) return OFFLINE_REPLY;

    const messages: PromptMessage[] = [
      { role: 'system', content: this.systemPrompt(context) },
      ...context.history.slice(-10).map(entry => ({ role: entry.role, content: entry.content })),
      { role: 'user', content: message },
    ];

    try {
      return (await this.generator.complete(messages, { maxTokens: 400 })) ?? OFFLINE_REPLY;
    } catch (error) {
      console.error('Coach reply error:', error);
      return 'Sorry, I hit an error while thinking about that. Please try again in a moment.';
    }
  }

  /**
   * Asks the model whether a proactive check-in fits the recent conversation.
   * Without a model only an empty history qualifies.
   */
  async shouldCheckIn(history: ChatEntry[]): Promise<boolean> {
    if (history.length === 0) return true;
    if (!this.generator) return false;

    const transcript = history
      .slice(-5)
      .map(entry => `${entry.role}: ${entry.content}`)
      .join('\n');

    try {
      const answer = await this.generator.complete(
        [
          {
            role: 'system',
            content:
              'Decide whether a health coach should send an unprompted check-in now. ' +
              'Answer "no" if the user asked for space, seems annoyed, or the last message needs no follow-up. ' +
              'Reply with exactly "yes" or "no".',
          },
          { role: 'user', content: transcript },
        ],
        { temperature: 0, maxTokens: 3 }
      );
      return answer?.trim().toLowerCase().startsWith('yes') ?? false;
    } catch (error) {
      console.error('Check-in decision error:', error);
      return false;
    }
  }

  async proactiveMessage(context: CoachContext): Promise<string | null> {
    if (!this.generator) {
      return context.healthSummary === 'No health data'
        ? null
        : `Quick check-in: ${context.healthSummary}. How are you feeling today?`;
    }

    try {
      return await this.generator.complete(
        [
          { role: 'system', content: this.systemPrompt(context) },
          { role: 'user', content: 'Write a short, friendly check-in message for the user based on today’s data.' },
        ],
        { maxTokens: 200 }
      );
    } catch (error) {
      console.error('Proactive message error:', error);
      return null;
    }
  }

  async analyzeReport(record: DailyMetricsRecord): Promise<string> {
    if (!this.generator) return 'No analysis available.';

    const prompt = `Analyze this WHOOP data for ${record.date} in 3-4 sentences. Point out what stands out and one thing to do today.

SLEEP:
${JSON.stringify(record.sleepRecords, null, 2)}

RECOVERY:
${JSON.stringify(record.recoveryRecords, null, 2)}

WORKOUT:
${JSON.stringify(record.workoutRecords, null, 2)}`;

    try {
      return (
        (await this.generator.complete(
          [
            { role: 'system', content: 'You are a sports physiologist summarizing wearable data.' },
            { role: 'user', content: prompt },
          ],
          { temperature: 0.4, maxTokens: 300 }
        )) ?? 'No analysis available.'
      );
    } catch (error) {
      console.error('Report analysis error:', error);
      return 'No analysis available (error).';
    }
  }

  private systemPrompt(context: CoachContext): string {
    return `${COACH_IDENTITY}

User's name: ${context.userName ?? 'unknown'}
Today's health data: ${context.healthSummary}`;
  }
}
