import pino from 'pino';

/**
 * Logger raíz de la aplicación.
 * Cada módulo crea su hijo con `logger.child({ service: '...' })`.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { app: 'line-chat-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
});
