import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DispatcherService } from './dispatcher.service';
import { ComplianceAgent } from './agents/compliance.agent';
import { HistoryAgent } from './agents/history.agent';
import { StrategyAgent } from './agents/strategy.agent';
import { AnalyticsAgent } from './agents/analytics.agent';
import { GeminiService } from '../gemini/gemini.service';
import { RoutingLabel } from './routing-label';
import { ANALYTICS_ACKNOWLEDGEMENT, COMPLIANCE_SYSTEM, STRATEGY_SYSTEM } from './prompts';
import { FakeGeminiService } from '../../testing/fake-gemini.service';
import { SessionContext } from './types';

async function createDispatcher(gemini: FakeGeminiService, config: Record<string, unknown> = {}) {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      DispatcherService,
      ComplianceAgent,
      HistoryAgent,
      StrategyAgent,
      AnalyticsAgent,
      { provide: GeminiService, useValue: gemini },
      { provide: ConfigService, useValue: new ConfigService(config) },
    ],
  }).compile();
  return module.get<DispatcherService>(DispatcherService);
}

describe('DispatcherService', () => {
  const session: SessionContext = { userId: 'user-1' };

  it('maps every label to an agent', async () => {
    const dispatcher = await createDispatcher(new FakeGeminiService());
    expect(Object.values(RoutingLabel).map(label => dispatcher.agentFor(label).name)).toEqual([
      'Compliance Agent',
      'History Agent',
      'Strategy Agent',
      'Analytics Agent',
    ]);
  });

  it('runs the compliance persona with the request', async () => {
    const gemini = new FakeGeminiService('Under IDEA, a change of placement...');
    const dispatcher = await createDispatcher(gemini);

    const result = await dispatcher.dispatch(RoutingLabel.COMPLIANCE, 'Is a 12 day suspension allowed?', session);

    expect(result).toEqual({ responseText: 'Under IDEA, a change of placement...', producingAgent: 'Compliance Agent' });
    expect(gemini.calls).toEqual([
      { prompt: "Check compliance for: 'Is a 12 day suspension allowed?'", options: { systemPrompt: COMPLIANCE_SYSTEM, temperature: 0.1 } },
    ]);
  });

  it('runs the strategy persona with the request', async () => {
    const gemini = new FakeGeminiService('Try chunking the text.');
    const dispatcher = await createDispatcher(gemini);

    const result = await dispatcher.dispatch(RoutingLabel.STRATEGY, 'Help with reading', session);

    expect(result).toEqual({ responseText: 'Try chunking the text.', producingAgent: 'Strategy Agent' });
    expect(gemini.calls[0]).toEqual({ prompt: "Create a strategy for: 'Help with reading'", options: { systemPrompt: STRATEGY_SYSTEM, temperature: 0 } });
  });

  it('acknowledges analytics without calling the model', async () => {
    const gemini = new FakeGeminiService();
    const dispatcher = await createDispatcher(gemini);

    await expect(dispatcher.dispatch(RoutingLabel.ANALYTICS, 'Chart her reading scores', session)).resolves.toEqual({
      responseText: ANALYTICS_ACKNOWLEDGEMENT,
      producingAgent: 'Analytics Agent',
    });
    expect(gemini.calls).toHaveLength(0);
  });

  it('folds analytics into strategy when the analytics agent is disabled', async () => {
    const gemini = new FakeGeminiService('Track words per minute weekly.');
    const dispatcher = await createDispatcher(gemini, { ENABLE_ANALYTICS_AGENT: 'false' });

    const result = await dispatcher.dispatch(RoutingLabel.ANALYTICS, 'Chart her reading scores', session);

    expect(result.producingAgent).toBe('Strategy Agent');
    expect(gemini.calls).toHaveLength(1);
  });
});
