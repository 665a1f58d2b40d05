import type { Context } from 'hono';
import type { SignatureMode } from '../config/env.js';
import { logger } from '../logger.js';
import type { WebhookService } from '../services/webhook.service.js';
import { webhookBodySchema } from '../types/line.js';
import { LINE_SIGNATURE_HEADER, verifyLineSignature } from '../utils/line-webhook.js';

const log = logger.child({ service: 'webhook-controller' });

export const WEBHOOK_ACK = { status: 'ok' } as const;

export interface WebhookControllerOptions {
  channelSecret?: string | undefined;
  /** strict: firma inválida → 400. lenient: se loguea y se procesa igual */
  signatureMode: SignatureMode;
}

/**
 * Eventos del body, o undefined si no es JSON o no trae `events`
 */
function parseEvents(rawBody: string): unknown[] | undefined {
  if (!rawBody) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    log.warn({ bytes: rawBody.length }, 'Body del webhook no es JSON');
    return undefined;
  }

  const parsed = webhookBodySchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.map((i) => i.message) }, 'Body del webhook sin events');
    return undefined;
  }
  return parsed.data.events;
}

export class WebhookController {
  constructor(
    private webhookService: WebhookService,
    private options: WebhookControllerOptions
  ) {}

  /**
   * POST /webhook
   * Siempre responde { status: 'ok' } (salvo firma inválida en modo strict)
   * para que LINE no reintente en cascada.
   */
  async handleWebhook(c: Context) {
    const rawBody = await c.req.text();
    const events = parseEvents(rawBody);

    // Body vacío, inválido o verificación de LINE sin eventos
    if (!events || events.length === 0) {
      return c.json(WEBHOOK_ACK);
    }

    const signature = c.req.header(LINE_SIGNATURE_HEADER);
    if (!verifyLineSignature(rawBody, signature, this.options.channelSecret)) {
      if (this.options.signatureMode === 'strict') {
        log.warn({ events: events.length }, 'Firma inválida, webhook rechazado');
        return c.json({ detail: 'Invalid signature' }, 400);
      }
      log.warn({ events: events.length }, 'Firma inválida, se procesa igual (modo lenient)');
    }

    try {
      await this.webhookService.dispatch(events);
    } catch (error) {
      log.error({ err: error }, 'Error despachando eventos');
    }

    return c.json(WEBHOOK_ACK);
  }
}
