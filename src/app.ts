import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { LINKED_TEXT, failureText } from './bot/messages';
import { calendarDate, isCalendarDate } from './lib/dates';
import type { CheckInService, MessageSender } from './services/checkInService';
import type { HealthSyncService } from './services/healthSyncService';
import type { WhoopLinkService } from './services/whoopLinkService';

export interface AppDeps {
  links: WhoopLinkService;
  sync: HealthSyncService;
  checkIns: CheckInService;
  sender: MessageSender;
  timeZone: string;
  schedulerSecret?: string;
  webhook?: { path: string; handler: RequestHandler };
  clock?: () => Date;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const clock = deps.clock ?? (() => new Date());

  app.use(cors());
  if (deps.webhook) {
    app.use(deps.webhook.handler);
  }
  app.use(express.json());

  const requireScheduler = (req: Request, res: Response, next: NextFunction) => {
    if (deps.schedulerSecret && req.get('X-Scheduler-Token') !== deps.schedulerSecret) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };

  // ========== HEALTH ==========
  app.get('/', (req, res) => {
    res.json({ message: 'WHOOP health coach up and running.' });
  });

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: clock().toISOString() });
  });

  // ========== WHOOP ==========
  app.get('/whoop/callback', async (req, res) => {
    const { code, state } = req.query;
    if (typeof code !== 'string' || typeof state !== 'string' || !code || !state) {
      return res.status(400).json({ error: 'Missing code or state in the WHOOP callback.' });
    }

    try {
      const linked = await deps.links.completeLink(code, state);
      if (!linked.ok) {
        return res.status(400).json({ error: failureText(linked.error) });
      }

      try {
        await deps.sender.send(linked.value.userId, LINKED_TEXT);
      } catch (error) {
        console.error(`⚠️ Could not notify user ${linked.value.userId} about the new link:`, error);
      }
      res.json({ message: 'WHOOP authorization successful! You can close this page.' });
    } catch (error) {
      console.error('WHOOP callback error:', error);
      res.status(500).json({ error: 'Failed to link WHOOP account.' });
    }
  });

  // ========== SCHEDULED ==========
  app.post('/scheduled/update-health-data', requireScheduler, async (req, res) => {
    const requested: unknown = req.body?.date;
    if (requested !== undefined && (typeof requested !== 'string' || !isCalendarDate(requested))) {
      return res.status(400).json({ error: 'date must be YYYY-MM-DD' });
    }
    const date = typeof requested === 'string' ? requested : calendarDate(clock(), deps.timeZone);

    try {
      const summary = await deps.sync.syncAll(date);
      res.json({ status: 'success', summary });
    } catch (error) {
      console.error('Scheduled sync error:', error);
      res.status(500).json({ error: 'Health data update failed' });
    }
  });

  app.post('/scheduled/check-in', requireScheduler, async (req, res) => {
    try {
      const summary = await deps.checkIns.run(clock());
      res.json({ status: 'success', summary });
    } catch (error) {
      console.error('Scheduled check-in error:', error);
      res.status(500).json({ error: 'Check-in sweep failed' });
    }
  });

  return app;
}
