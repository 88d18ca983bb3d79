import { WhoopCredential } from '../models/WhoopCredential';

export interface Credential {
  userId: string;
  accessToken: string;
  refreshToken?: string;
  scope: string[];
  updatedAt: Date;
}

export interface CredentialStore {
  get(userId: string): Promise<Credential | null>;
  /** Last write wins; access and refresh token are written together. */
  put(credential: Credential): Promise<void>;
  listUserIds(): Promise<string[]>;
}

/**
 * Update document for `put`. A credential without a refresh token clears the
 * stored one; an absent field in `$set` would leave the old token in place.
 */
export function credentialUpdate(credential: Credential, now: Date) {
  const fields = {
    accessToken: credential.accessToken,
    scope: credential.scope,
    updatedAt: credential.updatedAt,
  };
  if (credential.refreshToken === undefined) {
    return { $set: fields, $unset: { refreshToken: 1 }, $setOnInsert: { createdAt: now } };
  }
  return { $set: { ...fields, refreshToken: credential.refreshToken }, $setOnInsert: { createdAt: now } };
}

export class MongoCredentialStore implements CredentialStore {
  async get(userId: string): Promise<Credential | null> {
    const doc = await WhoopCredential.findOne({ userId }).lean();
    if (!doc) return null;

    return {
      userId: doc.userId,
      accessToken: doc.accessToken,
      refreshToken: doc.refreshToken ?? undefined,
      scope: doc.scope,
      updatedAt: doc.updatedAt,
    };
  }

  async put(credential: Credential): Promise<void> {
    await WhoopCredential.updateOne({ userId: credential.userId }, credentialUpdate(credential, new Date()), {
      upsert: true,
    });
  }

  async listUserIds(): Promise<string[]> {
    const ids = await WhoopCredential.distinct('userId');
    return ids.map(String);
  }
}
