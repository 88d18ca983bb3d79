import { User } from '../models/User';

export interface UserProfile {
  telegramId: string;
  name?: string;
  joinedAt: Date;
}

export interface UserStore {
  /** Returns the stored profile, creating it on first contact. */
  ensure(telegramId: string, name?: string): Promise<UserProfile>;
  get(telegramId: string): Promise<UserProfile | null>;
  list(): Promise<UserProfile[]>;
}

type StoredUser = { telegramId: string; name?: string | null; joinedAt: Date };

function toProfile(doc: StoredUser): UserProfile {
  return { telegramId: doc.telegramId, name: doc.name ?? undefined, joinedAt: doc.joinedAt };
}

export class MongoUserStore implements UserStore {
  async ensure(telegramId: string, name?: string): Promise<UserProfile> {
    const doc = await User.findOneAndUpdate(
      { telegramId },
      { $setOnInsert: { telegramId, name, joinedAt: new Date() } },
      { upsert: true, returnDocument: 'after' }
    ).lean();

    if (!doc) throw new Error(`Upsert returned no user for ${telegramId}`);
    return toProfile(doc);
  }

  async get(telegramId: string): Promise<UserProfile | null> {
    const doc = await User.findOne({ telegramId }).lean();
    return doc ? toProfile(doc) : null;
  }

  async list(): Promise<UserProfile[]> {
    const docs = await User.find().sort({ joinedAt: 1 }).lean();
    return docs.map(toProfile);
  }
}
