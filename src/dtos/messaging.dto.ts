import { z } from 'zod';

/**
 * Schemas de validación de la API de envío y consulta
 * Los nombres de campo en snake_case son parte del contrato HTTP
 */

export const pushMessageSchema = z.object({
  user_id: z.string().min(1),
  message: z.string().min(1),
});

export const multicastMessageSchema = z.object({
  user_ids: z.array(z.string().min(1)).min(1),
  message: z.string().min(1),
});

export const broadcastMessageSchema = z.object({
  message: z.string().min(1),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type PushMessageDTO = z.infer<typeof pushMessageSchema>;
export type MulticastMessageDTO = z.infer<typeof multicastMessageSchema>;
export type BroadcastMessageDTO = z.infer<typeof broadcastMessageSchema>;
export type HistoryQueryDTO = z.infer<typeof historyQuerySchema>;
