import mongoose from 'mongoose';

const whoopCredentialSchema = new mongoose.Schema({
  userId: { type: String, required: true, unique: true },
  accessToken: { type: String, required: true },
  refreshToken: { type: String },
  scope: { type: [String], default: [] },
  createdAt: { type: Date, default: Date.now },
  updatedAt: { type: Date, default: Date.now },
});

export const WhoopCredential = mongoose.model('WhoopCredential', whoopCredentialSchema);
