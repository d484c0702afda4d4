import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { ClassifierService } from './classifier.service';
import { DispatcherService } from './dispatcher.service';
import { RouterService } from './router.service';
import { ComplianceAgent } from './agents/compliance.agent';
import { HistoryAgent } from './agents/history.agent';
import { StrategyAgent } from './agents/strategy.agent';
import { AnalyticsAgent } from './agents/analytics.agent';

@Module({
    imports: [GeminiModule],
    providers: [
        ClassifierService,
        DispatcherService,
        RouterService,
        ComplianceAgent,
        HistoryAgent,
        StrategyAgent,
        AnalyticsAgent,
    ],
    exports: [RouterService, ClassifierService],
})
export class RoutingModule {}
