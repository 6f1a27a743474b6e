import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { Telegraf } from 'telegraf';
import { env } from '../MoviePostBot/config';
import { getBot } from '../MoviePostBot/bot';

type Update = Parameters<Telegraf['handleUpdate']>[0];

export interface UpdateHandler {
  handleUpdate(update: Update): Promise<void>;
}

export interface WebhookRequest {
  method?: string;
  query: Partial<Record<string, string | string[]>>;
  body: unknown;
}

export interface WebhookResponse {
  status(code: number): WebhookResponse;
  send(body: string): unknown;
  end(): unknown;
}

function isUpdate(value: unknown): value is Update {
  return typeof value === 'object' && value != null && 'update_id' in value && typeof value.update_id === 'number';
}

/**
 * Telegram webhook: only POSTs carry updates, everything else is a health
 * check.  When WEBHOOK_SECRET is set the request must repeat it as `?secret=`.
 */
export function createWebhookHandler(getHandler: () => UpdateHandler, secret?: string) {
  return async (req: WebhookRequest, res: WebhookResponse): Promise<void> => {
    if (req.method !== 'POST') {
      res.status(200).send('OK');
      return;
    }

    if (secret && req.query.secret !== secret) {
      res.status(403).send('Forbidden');
      return;
    }

    try {
      const update: unknown = typeof req.body === 'string' ? JSON.parse(req.body) : req.body;
      if (!isUpdate(update)) {
        res.status(400).send('Bad Request');
        return;
      }
      await getHandler().handleUpdate(update);
      res.status(200).send('OK');
    } catch (err) {
      console.error('[webhook] failed to handle update', err);
      res.status(500).end();
    }
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  await createWebhookHandler(() => getBot().bot, env.WEBHOOK_SECRET)(req, res);
}
