/**
 * Despachador de eventos del webhook de LINE
 *
 * Cada evento se procesa por separado: si uno falla se loguea
 * y se sigue con el resto del lote.
 */

import { errorMessage, ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import {
    eventTypeOf,
    followEventSchema,
    messageEventSchema,
    type LineFollowEvent,
    type LineMessageEvent,
} from '../types/line.js';
import type { ConversationService, ResponderOutcome } from './conversation.service.js';
import type { UserService } from './user.service.js';

const log = logger.child({ service: 'webhook' });

export type EventOutcome =
    | { index: number; type: string; status: 'handled'; result: ResponderOutcome }
    | { index: number; type: string; status: 'ignored' }
    | { index: number; type: string; status: 'failed'; error: string };

export class WebhookService {

    constructor(
        private userService: UserService,
        private conversationService: ConversationService
    ) {}

    async dispatch(events: unknown[]): Promise<EventOutcome[]> {
        const outcomes: EventOutcome[] = [];

        for (const [index, event] of events.entries()) {
            outcomes.push(await this.processEvent(index, event));
        }

        if (outcomes.length > 0) {
            log.info(
                {
                    total: outcomes.length,
                    handled: outcomes.filter((o) => o.status === 'handled').length,
                    failed: outcomes.filter((o) => o.status === 'failed').length,
                },
                'Lote de eventos procesado'
            );
        }
        return outcomes;
    }

    private async processEvent(index: number, event: unknown): Promise<EventOutcome> {
        const type = eventTypeOf(event);

        try {
            switch (type) {
                case 'message': {
                    const result = await this.handleMessage(messageEventSchema.parse(event));
                    return { index, type, status: 'handled', result };
                }
                case 'follow': {
                    const result = await this.handleFollow(followEventSchema.parse(event));
                    return { index, type, status: 'handled', result };
                }
                default:
                    log.debug({ index, type }, 'Evento ignorado');
                    return { index, type, status: 'ignored' };
            }
        } catch (error) {
            log.error({ err: error, index, type, event }, 'Error procesando evento');
            return { index, type, status: 'failed', error: errorMessage(error) };
        }
    }

    private async handleMessage(event: LineMessageEvent): Promise<ResponderOutcome> {
        const { replyToken, message } = event;

        if (message.type !== 'text') {
            return this.conversationService.handleUnsupported(replyToken);
        }
        if (message.text === undefined) {
            throw new ValidationError('Mensaje de texto sin campo text', { context: { messageId: message.id } });
        }

        const user = await this.userService.resolveUser(event.source.userId);
        return this.conversationService.handleText(user, message.text, replyToken);
    }

    private async handleFollow(event: LineFollowEvent): Promise<ResponderOutcome> {
        const user = await this.userService.resolveUser(event.source.userId);
        return this.conversationService.welcome(user, event.replyToken);
    }
}
