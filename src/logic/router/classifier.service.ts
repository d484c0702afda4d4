import { Injectable, Logger } from '@nestjs/common';
import { GeminiService } from '../gemini/gemini.service';
import { FALLBACK_LABEL, matchLabel } from './routing-label';
import { classifierPrompt } from './prompts';
import { ClassificationResult } from './types';

@Injectable()
export class ClassifierService {
    private readonly logger = new Logger(ClassifierService.name);

    constructor(private readonly geminiService: GeminiService) {}

    /**
     * One model call, no retry. The returned label is always a member of
     * RoutingLabel; `status` tells a real classification apart from a fallback.
     */
    async classify(request: string): Promise<ClassificationResult> {
        let raw: string;
        try {
            raw = await this.geminiService.invoke(classifierPrompt(request), { temperature: 0 });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Classifier call failed, falling back to ${FALLBACK_LABEL}: ${message}`);
            return { status: 'failed', label: FALLBACK_LABEL, error: message };
        }

        const label = matchLabel(raw);
        if (!label) {
            this.logger.warn(`Unrecognized classifier reply "${raw.slice(0, 40)}", falling back to ${FALLBACK_LABEL}`);
            return { status: 'unmatched', label: FALLBACK_LABEL, raw };
        }
        return { status: 'classified', label, raw };
    }
}
