import type { Failure, FailureKind } from '../lib/result';

export const START_TEXT = `Welcome! I'm your health coach. 🤖

I use your WHOOP data to keep an eye on:
• Sleep 😴
• Recovery 🔄
• Workouts 🏃

Commands:
/linkwhoop – connect your WHOOP account
/sync [YYYY-MM-DD] – pull WHOOP data for a day
/report [YYYY-MM-DD] – health report for a day
/status – check your WHOOP connection

Or just message me.`;

export const LINKED_TEXT = 'Your WHOOP account is now linked! ✅ Try /sync to pull today’s data.';

const FAILURE_TEXT: Record<FailureKind, string> = {
  NotLinked: 'Your WHOOP account isn’t linked yet. Use /linkwhoop to connect it.',
  AuthExpired: 'Your WHOOP link has expired. Use /linkwhoop to connect your account again.',
  ExchangeFailed: 'WHOOP didn’t accept the authorization. Use /linkwhoop to try linking again.',
  InvalidState: 'That link is invalid or was already used. Send /linkwhoop to get a new one.',
  UpstreamError: 'WHOOP isn’t responding right now. Please try again in a few minutes.',
};

export function failureText(failure: Pick<Failure, 'kind'>): string {
  return FAILURE_TEXT[failure.kind];
}
