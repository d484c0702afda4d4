import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';

export interface InvokeOptions {
    temperature?: number;
    systemPrompt?: string;
}

export class LlmRequestError extends Error {
    constructor(message: string, readonly cause?: unknown) {
        super(message);
        this.name = 'LlmRequestError';
    }
}

/**
 * Thin text-in/text-out wrapper over the Gemini API.
 *
 * Every failure (missing key, transport, empty candidate) surfaces as an
 * {@link LlmRequestError}; callers decide how to degrade.
 */
@Injectable()
export class GeminiService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI | null;
    private readonly chatModel: string;

    constructor(private readonly configService: ConfigService) {
        const apiKey = this.configService.get<string>('GEMINI_API_KEY');
        this.chatModel = this.configService.get<string>('GEMINI_CHAT_MODEL', 'gemini-2.5-flash-lite');
        this.genAI = apiKey ? new GoogleGenAI({ apiKey }) : null;
        if (!this.genAI) {
            this.logger.warn('GEMINI_API_KEY is not set; model calls will fail');
        }
    }

    async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
        if (!this.genAI) {
            throw new LlmRequestError('GEMINI_API_KEY is missing');
        }

        // Gemini has no system role here; the system prompt goes in as a preamble turn.
        const preamble = options.systemPrompt?.trim();
        const contents = [
            ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
            { role: 'user', parts: [{ text: prompt }] },
        ];

        let text: string | undefined;
        try {
            const result = await this.genAI.models.generateContent({
                model: this.chatModel,
                contents,
                config: { temperature: options.temperature ?? 0.3 },
            });
            text = result.text;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`generateContent failed: ${message}`);
            throw new LlmRequestError(`Failed to generate content: ${message}`, error);
        }

        if (!text) {
            throw new LlmRequestError('Model returned no text');
        }
        return text;
    }
}
