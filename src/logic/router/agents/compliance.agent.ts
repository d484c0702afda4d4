import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../../gemini/gemini.service';
import { COMPLIANCE_SYSTEM, complianceUser } from '../prompts';
import { AgentResult } from '../types';
import { PersonaAgent } from './agent';

@Injectable()
export class ComplianceAgent extends PersonaAgent {
    readonly name = 'Compliance Agent' as const;
    protected readonly logger = new Logger(ComplianceAgent.name);

    constructor(geminiService: GeminiService) {
        super(geminiService);
    }

    handle(request: string): Promise<AgentResult> {
        return this.generate(complianceUser(request), { systemPrompt: COMPLIANCE_SYSTEM, temperature: 0.1 });
    }
}
