import mongoose from 'mongoose';

// Raw WHOOP records, validated before they are written and again when read back
const dailyMetricsSchema = new mongoose.Schema({
  userId: { type: String, required: true },
  date: { type: String, required: true }, // YYYY-MM-DD
  sleepRecords: { type: [mongoose.Schema.Types.Mixed], default: [] },
  recoveryRecords: { type: [mongoose.Schema.Types.Mixed], default: [] },
  workoutRecords: { type: [mongoose.Schema.Types.Mixed], default: [] },
  syncedAt: { type: Date, required: true },
});

dailyMetricsSchema.index({ userId: 1, date: 1 }, { unique: true });
dailyMetricsSchema.index({ date: -1 });

export const DailyMetrics = mongoose.model('DailyMetrics', dailyMetricsSchema);
