import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RoutingLabel } from './routing-label';
import { Agent } from './agents/agent';
import { ComplianceAgent } from './agents/compliance.agent';
import { HistoryAgent } from './agents/history.agent';
import { StrategyAgent } from './agents/strategy.agent';
import { AnalyticsAgent } from './agents/analytics.agent';
import { AgentResult, SessionContext } from './types';

@Injectable()
export class DispatcherService {
    private readonly agents: Readonly<Record<RoutingLabel, Agent>>;

    constructor(
        complianceAgent: ComplianceAgent,
        historyAgent: HistoryAgent,
        strategyAgent: StrategyAgent,
        analyticsAgent: AnalyticsAgent,
        configService: ConfigService,
    ) {
        const analyticsEnabled = String(configService.get('ENABLE_ANALYTICS_AGENT', 'true')) !== 'false';
        this.agents = {
            [RoutingLabel.COMPLIANCE]: complianceAgent,
            [RoutingLabel.HISTORY]: historyAgent,
            [RoutingLabel.STRATEGY]: strategyAgent,
            [RoutingLabel.ANALYTICS]: analyticsEnabled ? analyticsAgent : strategyAgent,
        };
    }

    agentFor(label: RoutingLabel): Agent {
        return this.agents[label];
    }

    dispatch(label: RoutingLabel, request: string, session: SessionContext): Promise<AgentResult> {
        return this.agentFor(label).handle(request, session);
    }
}
