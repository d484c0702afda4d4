import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../../gemini/gemini.service';
import { STRATEGY_SYSTEM, strategyUser } from '../prompts';
import { AgentResult } from '../types';
import { PersonaAgent } from './agent';

@Injectable()
export class StrategyAgent extends PersonaAgent {
    readonly name = 'Strategy Agent' as const;
    protected readonly logger = new Logger(StrategyAgent.name);

    constructor(geminiService: GeminiService) {
        super(geminiService);
    }

    handle(request: string): Promise<AgentResult> {
        return this.generate(strategyUser(request), { systemPrompt: STRATEGY_SYSTEM, temperature: 0 });
    }
}
