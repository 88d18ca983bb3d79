import { type Context, Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import type { MessageSender } from '../services/checkInService';
import type { CoachCommands } from './coachCommands';
import { markdownToTelegramHtml } from './format';

interface Sender {
  id: string;
  name?: string;
}

const ERROR_TEXT = 'Sorry, I encountered an error while processing your message. Please try again later.';

export function commandArgument(text: string): string | undefined {
  return text.trim().split(/\s+/)[1];
}

async function respond(ctx: Context, handler: (from: Sender) => Promise<string>): Promise<void> {
  if (!ctx.from) return;
  const from: Sender = { id: String(ctx.from.id), name: ctx.from.first_name };

  let reply: string;
  try {
    reply = await handler(from);
  } catch (error) {
    console.error(`❌ Bot handler error for user ${from.id}:`, error);
    reply = ERROR_TEXT;
  }
  await ctx.reply(reply, { parse_mode: 'HTML', link_preview_options: { is_disabled: true } });
}

export function createTelegramBot(token: string, commands: CoachCommands): Telegraf {
  const bot = new Telegraf(token);

  bot.start(ctx => respond(ctx, from => commands.start(from.id, from.name)));
  bot.command('linkwhoop', ctx => respond(ctx, from => commands.linkWhoop(from.id)));
  bot.command('sync', ctx => respond(ctx, from => commands.sync(from.id, commandArgument(ctx.message.text))));
  bot.command('report', ctx =>
    respond(ctx, from => commands.report(from.id, ctx.message.text, commandArgument(ctx.message.text)))
  );
  bot.command('status', ctx => respond(ctx, from => commands.status(from.id)));

  bot.on(message('text'), async ctx => {
    if (ctx.message.text.startsWith('/')) {
      await ctx.reply('Unknown command. Send /start to see what I can do.');
      return;
    }
    await ctx.sendChatAction('typing');
    await respond(ctx, from => commands.chat(from.id, from.name, ctx.message.text));
  });

  bot.catch((error, ctx) => {
    console.error(`❌ Telegram update ${ctx.update.update_id} failed:`, error);
  });

  return bot;
}

export function telegramSender(bot: Telegraf): MessageSender {
  return {
    async send(userId: string, text: string): Promise<void> {
      await bot.telegram.sendMessage(userId, markdownToTelegramHtml(text), { parse_mode: 'HTML' });
    },
  };
}
