import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChatEntry } from '../stores/chatHistoryStore';
import { recoveryRecord, sleepRecord } from '../testing/fixtures';
import { ScriptedGenerator } from '../testing/scriptedGenerator';
import { AICoachService, type CoachContext } from './aiCoachService';

const SUMMARY = 'SWS: 01:30, REM: 01:45 | Recovery: 67 | No workout data';

function entries(count: number): ChatEntry[] {
  return Array.from({ length: count }, (_, i): ChatEntry => ({
    role: i % 2 === 0 ? 'user' : 'assistant',
    content: `message ${i}`,
    timestamp: new Date(Date.UTC(2025, 0, 10, 8, i)),
  }));
}

const context = (history: ChatEntry[] = []): CoachContext => ({ userName: 'Ada', healthSummary: SUMMARY, history });

const record = {
  userId: 'u1',
  date: '2025-01-10',
  sleepRecords: [sleepRecord],
  recoveryRecords: [recoveryRecord],
  workoutRecords: [],
  syncedAt: new Date('2025-01-10T12:00:00.000Z'),
};

describe('AICoachService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('without a model', () => {
    const coach = new AICoachService(null);

    it('answers with the offline reply', async () => {
      expect(coach.isOnline).toBe(false);
      await expect(coach.reply(context(), 'hi')).resolves.toBe(
        'I can’t reach my coaching model right now. Your message is saved and I’ll have more to say soon.'
      );
    });

    it('checks in only on an empty history', async () => {
      await expect(coach.shouldCheckIn([])).resolves.toBe(true);
      await expect(coach.shouldCheckIn(entries(1))).resolves.toBe(false);
    });

    it('builds the check-in from the summary', async () => {
      await expect(coach.proactiveMessage(context())).resolves.toBe(
        `Quick check-in: ${SUMMARY}. How are you feeling today?`
      );
      await expect(coach.proactiveMessage({ healthSummary: 'No health data', history: [] })).resolves.toBeNull();
    });

    it('has no analysis to offer', async () => {
      await expect(coach.analyzeReport(record)).resolves.toBe('No analysis available.');
    });
  });

  describe('with a model', () => {
    it('sends the system prompt, the last ten messages and the new message', async () => {
      const generator = new ScriptedGenerator(['Sleep a bit earlier tonight.']);
      const coach = new AICoachService(generator);

      const reply = await coach.reply(context(entries(12)), 'How did I sleep?');

      expect(reply).toBe('Sleep a bit earlier tonight.');
      const { messages } = generator.calls[0];
      expect(messages).toHaveLength(12);
      expect(messages[0].role).toBe('system');
      expect(messages[0].content).toContain(`Today's health data: ${SUMMARY}`);
      expect(messages[0].content).toContain("User's name: Ada");
      expect(messages[1]).toEqual({ role: 'user', content: 'message 2' });
      expect(messages[11]).toEqual({ role: 'user', content: 'How did I sleep?' });
    });

    it('apologizes when the model call throws', async () => {
      const coach = new AICoachService(new ScriptedGenerator([new Error('rate limited')]));

      await expect(coach.reply(context(), 'hi')).resolves.toBe(
        'Sorry, I hit an error while thinking about that. Please try again in a moment.'
      );
    });

    it('reads a yes/no check-in decision', async () => {
      const coach = new AICoachService(new ScriptedGenerator(['Yes.', 'no', new Error('down')]));

      await expect(coach.shouldCheckIn(entries(2))).resolves.toBe(true);
      await expect(coach.shouldCheckIn(entries(2))).resolves.toBe(false);
      await expect(coach.shouldCheckIn(entries(2))).resolves.toBe(false);
    });

    it('returns null for a failed proactive message', async () => {
      const coach = new AICoachService(new ScriptedGenerator([new Error('down')]));

      await expect(coach.proactiveMessage(context())).resolves.toBeNull();
    });

    it('falls back when the analysis is empty or fails', async () => {
      const coach = new AICoachService(new ScriptedGenerator(['Solid recovery.', null, new Error('down')]));

      await expect(coach.analyzeReport(record)).resolves.toBe('Solid recovery.');
      await expect(coach.analyzeReport(record)).resolves.toBe('No analysis available.');
      await expect(coach.analyzeReport(record)).resolves.toBe('No analysis available (error).');
    });
  });
});
