import { randomUUID } from 'crypto';
import { OAuthState } from '../models/OAuthState';

export interface OAuthStateStore {
  /** Mints a fresh state value bound to `userId`. */
  create(userId: string): Promise<string>;
  /** Resolves and deletes in one step; null for unknown, expired or used states. */
  consume(state: string): Promise<string | null>;
}

export class MongoOAuthStateStore implements OAuthStateStore {
  async create(userId: string): Promise<string> {
    const state = randomUUID();
    await OAuthState.create({ state, userId });
    return state;
  }

  async consume(state: string): Promise<string | null> {
    const doc = await OAuthState.findOneAndDelete({ state }).lean();
    return doc?.userId ?? null;
  }
}
