/**
   * src/db/client.ts
   *
   * Conexión a MongoDB (mongoose)
   * Una conexión explícita por proceso, pasada a los repositorios desde el Container
   * Graceful shutdown en producción
   */

import mongoose from 'mongoose';
import type { AppConfig } from '../config/env.js';
import { logger } from '../logger.js';
import { createChatMessageModel, type ChatMessageModel } from './models/chat-message.model.js';
import { createRegistrationModel, type RegistrationModel } from './models/registration.model.js';
import { createUserModel, type UserModel } from './models/user.model.js';

const log = logger.child({ service: 'db' });

export interface Database {
  models: {
    user: UserModel;
    chatMessage: ChatMessageModel;
    registration: RegistrationModel;
  };
  disconnect(): Promise<void>;
}

export async function connectDatabase(config: AppConfig['mongo']): Promise<Database> {
  const connection = mongoose.createConnection(config.uri, { dbName: config.dbName });
  await connection.asPromise();
  log.info({ dbName: config.dbName }, 'Conectado a MongoDB');

  const models = {
    user: createUserModel(connection),
    chatMessage: createChatMessageModel(connection),
    registration: createRegistrationModel(connection),
  };

  const disconnect = async () => {
    log.info('Desconectando MongoDB...');
    await connection.close();
    log.info('MongoDB desconectado');
  };

  // Graceful shutdown handlers
  const shutdown = (signal: NodeJS.Signals) => {
    disconnect()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error, signal }, 'Error cerrando la conexión');
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return { models, disconnect };
}
