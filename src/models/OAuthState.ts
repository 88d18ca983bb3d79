import mongoose from 'mongoose';

export const OAUTH_STATE_TTL_SECONDS = 10 * 60;

const oauthStateSchema = new mongoose.Schema({
  state: { type: String, required: true, unique: true },
  userId: { type: String, required: true },
  // TTL index: Mongo drops states nobody came back for
  createdAt: { type: Date, default: Date.now, expires: OAUTH_STATE_TTL_SECONDS },
});

export const OAuthState = mongoose.model('OAuthState', oauthStateSchema);
