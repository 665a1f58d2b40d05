/**
 * Responder de conversación
 *
 * Orden de decisión para un texto entrante (el primero que aplica gana):
 *   1. Código de 4 dígitos → reclamo de registro (si falla, sigue como chat)
 *   2. /clear → borra historial
 *   3. Palabra clave de registro → instrucciones + User ID
 *   4. Chat normal → historial + Gemini + guardar ambos turnos
 */

import {
    CHAT_MESSAGES,
    CLEAR_HISTORY_COMMAND,
    DEFAULT_DISPLAY_NAME,
    REGISTER_KEYWORD,
    REGISTRATION_MESSAGES,
} from '../constants/messages.js';
import type { Registration } from '../domain/registration.js';
import type { User } from '../domain/user.js';
import { logger } from '../logger.js';
import type { ChatHistoryRepository } from '../repositories/chat-history.repository.js';
import type { ReplyGenerator } from './ai.service.js';
import type { MessagingGateway } from './line.service.js';
import { isRegistrationCode, type RegistrationService } from './registration.service.js';

const log = logger.child({ service: 'conversation' });

export const DEFAULT_HISTORY_LIMIT = 10;

export type ResponderOutcome =
    | { kind: 'registered'; registration: Registration; delivered: boolean }
    | { kind: 'cleared'; deleted: number; delivered: boolean }
    | { kind: 'registration-info'; delivered: boolean }
    | { kind: 'chat'; reply: string; delivered: boolean }
    | { kind: 'unsupported'; delivered: boolean }
    | { kind: 'welcomed'; delivered: boolean };

export interface ConversationServiceDeps {
    registrationService: RegistrationService;
    chatHistory: ChatHistoryRepository;
    replyGenerator: ReplyGenerator;
    messaging: Pick<MessagingGateway, 'replyText'>;
    historyLimit?: number;
}

export class ConversationService {
    private registrationService: RegistrationService;
    private chatHistory: ChatHistoryRepository;
    private replyGenerator: ReplyGenerator;
    private messaging: Pick<MessagingGateway, 'replyText'>;
    private historyLimit: number;

    constructor(deps: ConversationServiceDeps) {
        this.registrationService = deps.registrationService;
        this.chatHistory = deps.chatHistory;
        this.replyGenerator = deps.replyGenerator;
        this.messaging = deps.messaging;
        this.historyLimit = deps.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    }

    async handleText(user: User, text: string, replyToken: string): Promise<ResponderOutcome> {
        const trimmed = text.trim();

        if (isRegistrationCode(trimmed)) {
            const registration = await this.registrationService.claim({
                code: trimmed,
                lineUserId: user.lineUserId,
                displayName: user.displayName ?? undefined,
                pictureUrl: user.pictureUrl ?? undefined,
            });

            if (registration) {
                const delivered = await this.messaging.replyText(
                    replyToken,
                    REGISTRATION_MESSAGES.SUCCESS(registration.contextName(), user.nameOr(DEFAULT_DISPLAY_NAME))
                );
                return { kind: 'registered', registration, delivered };
            }
            // Sin ticket: el código se trata como texto común
        }

        if (trimmed.toLowerCase() === CLEAR_HISTORY_COMMAND) {
            const deleted = await this.chatHistory.clear(user.lineUserId);
            log.info({ lineUserId: user.lineUserId, deleted }, 'Historial borrado');
            const delivered = await this.messaging.replyText(replyToken, CHAT_MESSAGES.HISTORY_CLEARED(deleted));
            return { kind: 'cleared', deleted, delivered };
        }

        if (trimmed === REGISTER_KEYWORD) {
            const delivered = await this.messaging.replyText(replyToken, [
                REGISTRATION_MESSAGES.INSTRUCTIONS,
                user.lineUserId,
            ]);
            return { kind: 'registration-info', delivered };
        }

        return this.chat(user, text, replyToken);
    }

    /**
     * Mensajes que no son texto: respuesta fija, nada se persiste
     */
    async handleUnsupported(replyToken: string): Promise<ResponderOutcome> {
        const delivered = await this.messaging.replyText(replyToken, CHAT_MESSAGES.UNSUPPORTED_MESSAGE);
        return { kind: 'unsupported', delivered };
    }

    async welcome(user: User, replyToken: string): Promise<ResponderOutcome> {
        const delivered = await this.messaging.replyText(
            replyToken,
            CHAT_MESSAGES.WELCOME(user.nameOr(DEFAULT_DISPLAY_NAME))
        );
        return { kind: 'welcomed', delivered };
    }

    private async chat(user: User, text: string, replyToken: string): Promise<ResponderOutcome> {
        const history = await this.chatHistory.recent(user.lineUserId, this.historyLimit);
        const reply = await this.replyGenerator.generateReply(text, history);

        // Primero el turno del usuario: si algo falla entre ambos,
        // nunca queda una respuesta del asistente huérfana
        await this.chatHistory.append(user.lineUserId, 'user', text);
        await this.chatHistory.append(user.lineUserId, 'assistant', reply);

        const delivered = await this.messaging.replyText(replyToken, reply);
        log.debug({ lineUserId: user.lineUserId, historySize: history.length, delivered }, 'Respuesta de chat enviada');
        return { kind: 'chat', reply, delivered };
    }
}
