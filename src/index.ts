import dotenv from 'dotenv';
import mongoose from 'mongoose';
import { createApp } from './app';
import { CoachCommands } from './bot/coachCommands';
import { createTelegramBot, telegramSender } from './bot/telegramBot';
import { loadConfig } from './config';
import { AICoachService } from './services/aiCoachService';
import { CheckInService } from './services/checkInService';
import { HealthSyncService } from './services/healthSyncService';
import { GroqTextGenerator } from './services/textGenerator';
import { WhoopAuthService } from './services/whoopAuthService';
import { WhoopClient } from './services/whoopClient';
import { WhoopLinkService } from './services/whoopLinkService';
import { MongoChatHistoryStore } from './stores/chatHistoryStore';
import { MongoCredentialStore } from './stores/credentialStore';
import { MongoDailyMetricsStore } from './stores/dailyMetricsStore';
import { MongoOAuthStateStore } from './stores/oauthStateStore';
import { MongoUserStore } from './stores/userStore';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();

  await mongoose.connect(config.mongoUri);
  console.log('✅ MongoDB connected');

  const credentials = new MongoCredentialStore();
  const metrics = new MongoDailyMetricsStore();
  const chatHistory = new MongoChatHistoryStore();
  const users = new MongoUserStore();

  const auth = new WhoopAuthService({
    clientId: config.whoop.clientId,
    clientSecret: config.whoop.clientSecret,
    redirectUri: config.whoop.redirectUri,
    scope: config.whoop.scope,
    authUrl: config.whoop.authUrl,
    tokenUrl: config.whoop.tokenUrl,
    requestTimeoutMs: config.whoop.requestTimeoutMs,
  });
  const whoop = new WhoopClient(credentials, auth, {
    apiBaseUrl: config.whoop.apiBaseUrl,
    requestTimeoutMs: config.whoop.requestTimeoutMs,
  });
  const links = new WhoopLinkService(new MongoOAuthStateStore(), credentials, auth);
  const sync = new HealthSyncService(credentials, metrics, whoop, {
    recordLimit: config.whoop.syncLimit,
    concurrency: config.sync.concurrency,
  });

  const generator = config.groq.apiKey ? new GroqTextGenerator(config.groq.apiKey, config.groq.model) : null;
  if (!generator) console.warn('⚠️ GROQ_API_KEY not set, coach replies use offline fallbacks');
  const coach = new AICoachService(generator);

  const commands = new CoachCommands({
    users,
    chatHistory,
    metrics,
    links,
    sync,
    whoop,
    coach,
    timeZone: config.sync.timeZone,
  });
  const bot = createTelegramBot(config.telegram.token, commands);
  const sender = telegramSender(bot);

  const checkIns = new CheckInService(users, chatHistory, metrics, coach, sender, {
    timeZone: config.sync.timeZone,
    minHoursBetweenMessages: config.checkIn.minHoursBetweenMessages,
    quietHoursStart: config.checkIn.quietHoursStart,
    quietHoursEnd: config.checkIn.quietHoursEnd,
    concurrency: config.sync.concurrency,
  });

  const webhookMode = config.telegram.mode === 'webhook';
  const app = createApp({
    links,
    sync,
    checkIns,
    sender,
    timeZone: config.sync.timeZone,
    schedulerSecret: config.scheduler.secret,
    webhook: webhookMode
      ? { path: config.telegram.webhookPath, handler: bot.webhookCallback(config.telegram.webhookPath) }
      : undefined,
  });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
  });

  if (webhookMode) {
    const webhookUrl = `${config.publicUrl}${config.telegram.webhookPath}`;
    await bot.telegram.setWebhook(webhookUrl);
    console.log(`🤖 Telegram webhook set to ${webhookUrl}`);
  } else {
    await bot.telegram.deleteWebhook();
    bot.launch().catch(error => {
      console.error('❌ Telegram polling stopped:', error);
    });
    console.log('🤖 Telegram bot polling');
  }

  const shutdown = async (signal: string) => {
    console.log(`Shutting down (${signal})...`);
    if (!webhookMode) bot.stop(signal);
    server.close();
    await mongoose.disconnect();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(error => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch(error => {
  console.error('❌ Startup failed:', error);
  process.exit(1);
});
