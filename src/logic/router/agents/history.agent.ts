import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeminiService } from '../../gemini/gemini.service';
import { truncateForPrompt } from '../../../utils/textNormalizer';
import { positiveIntSetting } from '../../../utils/settings';
import { HISTORY_NEEDS_DOCUMENT_MESSAGE, HISTORY_SYSTEM, historyUser } from '../prompts';
import { AgentResult, SessionContext } from '../types';
import { PersonaAgent } from './agent';

export const DEFAULT_HISTORY_CONTEXT_CHARS = 20000;

@Injectable()
export class HistoryAgent extends PersonaAgent {
    readonly name = 'History Agent' as const;
    protected readonly logger = new Logger(HistoryAgent.name);
    private readonly contextChars: number;

    constructor(geminiService: GeminiService, configService: ConfigService) {
        super(geminiService);
        this.contextChars = positiveIntSetting(configService, 'HISTORY_CONTEXT_CHARS', DEFAULT_HISTORY_CONTEXT_CHARS);
    }

    async handle(request: string, session: SessionContext): Promise<AgentResult> {
        if (!session.document) {
            return { responseText: HISTORY_NEEDS_DOCUMENT_MESSAGE, producingAgent: 'System' };
        }
        const record = truncateForPrompt(session.document.text, this.contextChars);
        return this.generate(historyUser(record, request), { systemPrompt: HISTORY_SYSTEM, temperature: 0 });
    }
}
