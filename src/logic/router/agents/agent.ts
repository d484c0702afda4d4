import { Logger } from '@nestjs/common';
import { GeminiService, InvokeOptions } from '../../gemini/gemini.service';
import { GENERATION_ERROR_MESSAGE } from '../prompts';
import { AgentName, AgentResult, SessionContext } from '../types';

export interface Agent {
    readonly name: AgentName;
    handle(request: string, session: SessionContext): Promise<AgentResult>;
}

/**
 * Base for agents that make exactly one model call. A failed call becomes a
 * generic System reply; the turn still completes.
 */
export abstract class PersonaAgent implements Agent {
    abstract readonly name: AgentName;
    protected abstract readonly logger: Logger;

    constructor(protected readonly geminiService: GeminiService) {}

    abstract handle(request: string, session: SessionContext): Promise<AgentResult>;

    protected async generate(prompt: string, options: InvokeOptions): Promise<AgentResult> {
        try {
            const responseText = await this.geminiService.invoke(prompt, options);
            return { responseText, producingAgent: this.name };
        } catch (error) {
            this.logger.error(`${this.name} generation failed`, error instanceof Error ? error.stack : String(error));
            return { responseText: GENERATION_ERROR_MESSAGE, producingAgent: 'System' };
        }
    }
}
