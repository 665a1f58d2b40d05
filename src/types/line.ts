/**
 * Payloads del webhook de LINE Messaging API
 * Sólo se validan los campos que usa el bot; el resto pasa sin tocar.
 */

import { z } from 'zod';

export const webhookBodySchema = z.object({
  destination: z.string().optional(),
  events: z.array(z.unknown()),
});

const userSourceSchema = z
  .object({
    type: z.string(),
    userId: z.string().min(1),
  })
  .passthrough();

export const messageEventSchema = z
  .object({
    type: z.literal('message'),
    replyToken: z.string().min(1),
    source: userSourceSchema,
    message: z
      .object({
        id: z.string().optional(),
        type: z.string(),
        text: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const followEventSchema = z
  .object({
    type: z.literal('follow'),
    replyToken: z.string().min(1),
    source: userSourceSchema,
  })
  .passthrough();

export type LineMessageEvent = z.infer<typeof messageEventSchema>;
export type LineFollowEvent = z.infer<typeof followEventSchema>;

/** Tipo del evento sin validar el resto del payload */
export function eventTypeOf(event: unknown): string {
  if (typeof event === 'object' && event !== null && 'type' in event && typeof event.type === 'string') {
    return event.type;
  }
  return 'unknown';
}
