import { fail, ok, type Result } from '../lib/result';
import type { CredentialStore } from '../stores/credentialStore';
import type { OAuthStateStore } from '../stores/oauthStateStore';
import type { WhoopAuthService } from './whoopAuthService';

export interface LinkedAccount {
  userId: string;
}

export class WhoopLinkService {
  constructor(
    private readonly states: OAuthStateStore,
    private readonly credentials: CredentialStore,
    private readonly auth: WhoopAuthService,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async beginLink(userId: string): Promise<string> {
    const state = await this.states.create(userId);
    return this.auth.getAuthUrl(state);
  }

  async completeLink(code: string, state: string): Promise<Result<LinkedAccount, 'InvalidState' | 'ExchangeFailed'>> {
    // Consumed before the exchange so a failed callback can't be replayed.
    const userId = await this.states.consume(state);
    if (!userId) return fail('InvalidState', 'Invalid, expired or already used state');

    const grant = await this.auth.exchangeCode(code);
    if (!grant.ok) {
      console.error(`❌ WHOOP code exchange failed for user ${userId}: ${grant.error.message}`);
      return grant;
    }

    await this.credentials.put({
      userId,
      accessToken: grant.value.accessToken,
      refreshToken: grant.value.refreshToken,
      scope: grant.value.scope,
      updatedAt: this.clock(),
    });
    console.log(`✅ WHOOP account linked for user ${userId}`);

    return ok({ userId });
  }
}
