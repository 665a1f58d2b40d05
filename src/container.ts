/**
 * src/container.ts
 *
 * Wiring de dependencias: una conexión a MongoDB, repositorios,
 * servicios y controladores, todo construido una sola vez al arrancar.
 */

import type { ControllerProvider } from './app.js';
import type { AppConfig } from './config/env.js';
import { HealthController } from './controllers/health.controller.js';
import { MessagingController } from './controllers/messaging.controller.js';
import { UsersController } from './controllers/users.controller.js';
import { WebhookController } from './controllers/webhook.controller.js';
import { connectDatabase, type Database } from './db/client.js';
import { MongoChatHistoryRepository } from './repositories/chat-history.repository.js';
import { MongoRegistrationRepository } from './repositories/registration.repository.js';
import { MongoUserRepository } from './repositories/user.repository.js';
import { AiService } from './services/ai.service.js';
import { ConversationService } from './services/conversation.service.js';
import { LineService } from './services/line.service.js';
import { RegistrationService } from './services/registration.service.js';
import { UserService } from './services/user.service.js';
import { WebhookService } from './services/webhook.service.js';

export class Container implements ControllerProvider {
  private healthController: HealthController;
  private webhookController: WebhookController;
  private usersController: UsersController;
  private messagingController: MessagingController;

  private constructor(config: AppConfig, database: Database) {
    const userRepository = new MongoUserRepository(database.models.user);
    const chatHistory = new MongoChatHistoryRepository(database.models.chatMessage);
    const registrationRepository = new MongoRegistrationRepository(database.models.registration);

    const lineService = LineService.fromConfig(config.line);
    const aiService = AiService.fromConfig(config.gemini);

    const userService = new UserService(userRepository, lineService);
    const registrationService = new RegistrationService(registrationRepository, userRepository);
    const conversationService = new ConversationService({
      registrationService,
      chatHistory,
      replyGenerator: aiService,
      messaging: lineService,
      historyLimit: config.historyLimit,
    });
    const webhookService = new WebhookService(userService, conversationService);

    this.healthController = new HealthController();
    this.webhookController = new WebhookController(webhookService, {
      channelSecret: config.line.channelSecret,
      signatureMode: config.line.signatureMode,
    });
    this.usersController = new UsersController(userService, chatHistory);
    this.messagingController = new MessagingController(lineService);
  }

  static async create(config: AppConfig): Promise<Container> {
    const database = await connectDatabase(config.mongo);
    return new Container(config, database);
  }

  getHealthController(): HealthController {
    return this.healthController;
  }

  getWebhookController(): WebhookController {
    return this.webhookController;
  }

  getUsersController(): UsersController {
    return this.usersController;
  }

  getMessagingController(): MessagingController {
    return this.messagingController;
  }
}
