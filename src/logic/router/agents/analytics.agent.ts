import { Injectable } from '@nestjs/common';
import { ANALYTICS_ACKNOWLEDGEMENT } from '../prompts';
import { AgentResult } from '../types';
import { Agent } from './agent';

// Charting happens on the /analytics/csv upload; this agent never calls the model.
@Injectable()
export class AnalyticsAgent implements Agent {
    readonly name = 'Analytics Agent' as const;

    async handle(): Promise<AgentResult> {
        return { responseText: ANALYTICS_ACKNOWLEDGEMENT, producingAgent: this.name };
    }
}
