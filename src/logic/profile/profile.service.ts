import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { GeminiService } from '../gemini/gemini.service';
import { stripCodeFence, truncateForPrompt } from '../../utils/textNormalizer';
import { positiveIntSetting } from '../../utils/settings';
import { profilePrompt } from './prompts';

export interface StudentProfile {
    name: string;
    diagnosis: string;
    grade: string;
    iepDate: string;
}

export const PLACEHOLDER_PROFILE: Readonly<StudentProfile> = Object.freeze({
    name: 'Unknown',
    diagnosis: 'Not Found',
    grade: 'N/A',
    iepDate: 'N/A',
});

export const DEFAULT_PROFILE_CONTEXT_CHARS = 3000;

// Each field falls back on its own, so a reply with one bad field keeps the rest.
const profileSchema = z.object({
    name: z.string().min(1).catch(PLACEHOLDER_PROFILE.name),
    diagnosis: z.string().min(1).catch(PLACEHOLDER_PROFILE.diagnosis),
    grade: z.union([z.string().min(1), z.number()]).transform(String).catch(PLACEHOLDER_PROFILE.grade),
    iep_date: z.string().min(1).catch(PLACEHOLDER_PROFILE.iepDate),
});

@Injectable()
export class ProfileService {
    private readonly logger = new Logger(ProfileService.name);
    private readonly contextChars: number;

    constructor(
        private readonly geminiService: GeminiService,
        configService: ConfigService,
    ) {
        this.contextChars = positiveIntSetting(configService, 'PROFILE_CONTEXT_CHARS', DEFAULT_PROFILE_CONTEXT_CHARS);
    }

    async extractProfile(documentText: string): Promise<StudentProfile> {
        let reply: string;
        try {
            reply = await this.geminiService.invoke(profilePrompt(truncateForPrompt(documentText, this.contextChars)), { temperature: 0 });
        } catch (error) {
            this.logger.warn(`Profile extraction call failed: ${error instanceof Error ? error.message : String(error)}`);
            return { ...PLACEHOLDER_PROFILE };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(stripCodeFence(reply));
        } catch {
            this.logger.warn(`Profile reply was not JSON: ${reply.slice(0, 80)}`);
            return { ...PLACEHOLDER_PROFILE };
        }

        const result = profileSchema.safeParse(parsed);
        if (!result.success) {
            return { ...PLACEHOLDER_PROFILE };
        }
        const { name, diagnosis, grade, iep_date } = result.data;
        return { name, diagnosis, grade, iepDate: iep_date };
    }
}
