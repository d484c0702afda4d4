import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const logger = new Logger('Settings');

/** Positive integer setting; unset, blank or malformed values give `fallback`. */
export function positiveIntSetting(configService: ConfigService, key: string, fallback: number): number {
    const raw = configService.get<string | number>(key);
    if (raw === undefined || String(raw).trim() === '') {
        return fallback;
    }
    const value = typeof raw === 'number' ? raw : Number(raw.trim());
    if (!Number.isInteger(value) || value <= 0) {
        logger.warn(`${key}=${raw} is not a positive integer; using ${fallback}`);
        return fallback;
    }
    return value;
}
