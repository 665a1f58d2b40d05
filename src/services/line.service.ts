/**
 * Cliente de LINE Messaging API
 * Usa el SDK oficial: @line/bot-sdk
 *
 * Ningún método lanza: los errores (incluido el timeout) se loguean
 * y se devuelven como false / undefined.
 */

import { messagingApi } from '@line/bot-sdk';
import type { AppConfig } from '../config/env.js';
import { logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = logger.child({ service: 'line' });

/** LINE acepta hasta 5 mensajes por reply/push */
export const MAX_MESSAGES_PER_REQUEST = 5;

export interface LineProfile {
    displayName: string;
    pictureUrl?: string | undefined;
}

/**
 * Capacidad de envío que usa el resto de la aplicación
 */
export interface MessagingGateway {
    replyText(replyToken: string, text: string | string[]): Promise<boolean>;
    pushText(to: string, text: string): Promise<boolean>;
    multicastText(to: string[], text: string): Promise<boolean>;
    broadcastText(text: string): Promise<boolean>;
    getProfile(lineUserId: string): Promise<LineProfile | undefined>;
}

export type LineMessagingClient = Pick<
    messagingApi.MessagingApiClient,
    'replyMessage' | 'pushMessage' | 'multicast' | 'broadcast' | 'getProfile'
>;

function toTextMessages(text: string | string[]): messagingApi.TextMessage[] {
    const texts = Array.isArray(text) ? text : [text];
    if (texts.length > MAX_MESSAGES_PER_REQUEST) {
        log.warn({ count: texts.length }, 'Demasiados mensajes, se envían sólo los primeros 5');
    }
    return texts
        .slice(0, MAX_MESSAGES_PER_REQUEST)
        .map((body): messagingApi.TextMessage => ({ type: 'text', text: body }));
}

export class LineService implements MessagingGateway {

    constructor(
        private client: LineMessagingClient,
        private timeoutMs: number = 10_000
    ) {}

    static fromConfig(config: AppConfig['line']): LineService {
        const client = new messagingApi.MessagingApiClient({
            channelAccessToken: config.channelAccessToken,
        });
        log.info('Cliente LINE inicializado');
        return new LineService(client, config.timeoutMs);
    }

    /**
     * Responde usando el reply token del evento (uno o varios textos)
     */
    async replyText(replyToken: string, text: string | string[]): Promise<boolean> {
        return this.send('reply', { replyToken }, () =>
            this.client.replyMessage({ replyToken, messages: toTextMessages(text) })
        );
    }

    /**
     * Envía un mensaje directo a un usuario (Push Message)
     */
    async pushText(to: string, text: string): Promise<boolean> {
        return this.send('push', { to }, () =>
            this.client.pushMessage({ to, messages: toTextMessages(text) })
        );
    }

    async multicastText(to: string[], text: string): Promise<boolean> {
        return this.send('multicast', { recipients: to.length }, () =>
            this.client.multicast({ to, messages: toTextMessages(text) })
        );
    }

    /**
     * Envía a todos los usuarios que agregaron el bot como amigo
     */
    async broadcastText(text: string): Promise<boolean> {
        return this.send('broadcast', {}, () =>
            this.client.broadcast({ messages: toTextMessages(text) })
        );
    }

    async getProfile(lineUserId: string): Promise<LineProfile | undefined> {
        try {
            const profile = await withTimeout(
                this.client.getProfile(lineUserId),
                this.timeoutMs,
                'line.getProfile'
            );
            return {
                displayName: profile.displayName,
                pictureUrl: profile.pictureUrl,
            };
        } catch (error) {
            log.error({ err: error, lineUserId }, 'Error obteniendo perfil de LINE');
            return undefined;
        }
    }

    private async send(
        operation: string,
        context: Record<string, unknown>,
        request: () => Promise<unknown>
    ): Promise<boolean> {
        try {
            await withTimeout(request(), this.timeoutMs, `line.${operation}`);
            log.debug({ operation, ...context }, 'Mensaje enviado');
            return true;
        } catch (error) {
            log.error({ err: error, operation, ...context }, 'Error enviando mensaje a LINE');
            return false;
        }
    }
}
