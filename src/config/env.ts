/**
 * src/config/env.ts
 *
 * Configuración tipada a partir de variables de entorno.
 * `dotenv/config` se carga en el entry point (src/index.ts).
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  MONGODB_URI: z.string().trim().min(1, 'MONGODB_URI es obligatorio'),
  MONGODB_DBNAME: z.string().trim().min(1).default('line_chat_relay'),

  LINE_CHANNEL_ACCESS_TOKEN: z.string().trim().min(1, 'LINE_CHANNEL_ACCESS_TOKEN es obligatorio'),
  // Sin secreto la verificación de firma queda desactivada (modo local/testing)
  LINE_CHANNEL_SECRET: optionalString,
  LINE_SIGNATURE_MODE: z.enum(['strict', 'lenient']).default('strict'),
  LINE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.0-flash'),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  HISTORY_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type SignatureMode = 'strict' | 'lenient';

export interface AppConfig {
  port: number;
  mongo: {
    uri: string;
    dbName: string;
  };
  line: {
    channelAccessToken: string;
    channelSecret?: string | undefined;
    signatureMode: SignatureMode;
    timeoutMs: number;
  };
  gemini: {
    apiKey?: string | undefined;
    model: string;
    timeoutMs: number;
  };
  historyLimit: number;
  logLevel: string;
}

/**
 * Lee y valida la configuración.
 * @throws ValidationError con la lista de variables inválidas
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Configuración inválida: ${issues.join('; ')}`, {
      code: 'INVALID_CONFIG',
      context: { issues },
    });
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    mongo: {
      uri: vars.MONGODB_URI,
      dbName: vars.MONGODB_DBNAME,
    },
    line: {
      channelAccessToken: vars.LINE_CHANNEL_ACCESS_TOKEN,
      channelSecret: vars.LINE_CHANNEL_SECRET,
      signatureMode: vars.LINE_SIGNATURE_MODE,
      timeoutMs: vars.LINE_TIMEOUT_MS,
    },
    gemini: {
      apiKey: vars.GEMINI_API_KEY,
      model: vars.GEMINI_MODEL,
      timeoutMs: vars.GEMINI_TIMEOUT_MS,
    },
    historyLimit: vars.HISTORY_LIMIT,
    logLevel: vars.LOG_LEVEL,
  };
}
