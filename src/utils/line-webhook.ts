/**
 * src/utils/line-webhook.ts
 * Verificación de firma de los webhooks de LINE
 */

import crypto from 'node:crypto';
import { logger } from '../logger.js';

const log = logger.child({ service: 'line-signature' });

export const LINE_SIGNATURE_HEADER = 'x-line-signature';

/**
 * Firma esperada: base64(HMAC-SHA256(body, channelSecret))
 */
export function computeLineSignature(payload: string, secret: string): string {
    return crypto
        .createHmac('sha256', secret)
        .update(payload)
        .digest('base64');
}

/**
 * Verifica la firma HMAC-SHA256 del webhook
 * @param payload - Body crudo del webhook
 * @param signature - Header X-Line-Signature
 * @param secret - Channel secret; si falta, la verificación se omite
 * @returns true si la firma es válida (o si no hay secreto configurado)
 */
export function verifyLineSignature(
    payload: string,
    signature: string | undefined,
    secret: string | undefined
): boolean {
    if (!secret) {
        return true;
    }
    if (!signature) {
        return false;
    }

    try {
        const expected = Buffer.from(computeLineSignature(payload, secret));
        const received = Buffer.from(signature);

        // timingSafeEqual exige buffers del mismo largo
        if (expected.length !== received.length) {
            return false;
        }
        return crypto.timingSafeEqual(expected, received);
    } catch (error) {
        log.warn({ err: error }, 'Error verificando firma');
        return false;
    }
}
