import { GoogleGenAI, type Content, type GenerateContentParameters } from '@google/genai';
import type { AppConfig } from '../config/env.js';
import { AI_MESSAGES } from '../constants/messages.js';
import type { ConversationTurn } from '../domain/conversation-turn.js';
import { logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = logger.child({ service: 'gemini' });

/**
 * Capacidad de respuesta generada: nunca lanza,
 * ante cualquier falla devuelve un texto de disculpa.
 */
export interface ReplyGenerator {
    generateReply(message: string, history: ConversationTurn[]): Promise<string>;
}

/** Subconjunto de `GoogleGenAI.models` que usa el servicio */
export interface ContentGenerator {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface AiServiceOptions {
    model: string;
    timeoutMs: number;
    maxOutputTokens?: number;
    temperature?: number;
}

/**
 * Arma el contenido para Gemini: historial (assistant → model) + mensaje nuevo
 */
export function buildContents(message: string, history: ConversationTurn[]): Content[] {
    const contents: Content[] = history.map((turn) => ({
        role: turn.role === 'user' ? 'user' : 'model',
        parts: [{ text: turn.content }],
    }));

    contents.push({ role: 'user', parts: [{ text: message }] });
    return contents;
}

export class AiService implements ReplyGenerator {

    constructor(
        private generator: ContentGenerator | null,
        private options: AiServiceOptions
    ) {}

    static fromConfig(config: AppConfig['gemini']): AiService {
        if (!config.apiKey) {
            log.warn('GEMINI_API_KEY no configurada, las respuestas serán un aviso fijo');
        }
        const generator = config.apiKey ? new GoogleGenAI({ apiKey: config.apiKey }).models : null;
        return new AiService(generator, { model: config.model, timeoutMs: config.timeoutMs });
    }

    async generateReply(message: string, history: ConversationTurn[]): Promise<string> {
        if (!this.generator) {
            return AI_MESSAGES.NOT_CONFIGURED;
        }

        try {
            const response = await withTimeout(
                this.generator.generateContent({
                    model: this.options.model,
                    contents: buildContents(message, history),
                    config: {
                        systemInstruction: AI_MESSAGES.SYSTEM_PROMPT,
                        maxOutputTokens: this.options.maxOutputTokens ?? 1024,
                        temperature: this.options.temperature ?? 0.7,
                    },
                }),
                this.options.timeoutMs,
                'gemini.generateContent'
            );

            const text = response.text?.trim();
            if (!text) {
                log.warn({ model: this.options.model }, 'Respuesta vacía de Gemini');
                return AI_MESSAGES.CONNECTION_ERROR;
            }
            return text;
        } catch (error) {
            log.error({ err: error, model: this.options.model }, 'Error llamando a Gemini');
            return AI_MESSAGES.CONNECTION_ERROR;
        }
    }
}
