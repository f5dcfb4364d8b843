// src/config/appConfig.ts

import { readFileSync } from 'fs';
import { z } from 'zod';
import { TransportMode } from '../models/Incident';
import { RulesOverrides } from './optimizationRules';
import { RulesOverridesSchema, formatZodError } from '../validation/schemas';

const AppConfigSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    FACILITIES_PATH: z.string().min(1).default('data/facilities.json'),
    RULES_PATH: z.string().min(1).optional(),
    TRANSPORT_MODE: z.nativeEnum(TransportMode).default(TransportMode.GROUND),
    SOLVER_TIME_LIMIT_SECONDS: z.coerce.number().positive().optional(),
    REASONING_API_KEY: z.string().min(1).optional(),
    REASONING_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
    REASONING_MODEL: z.string().min(1).default('openai/gpt-4o-mini'),
    REASONING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000)
});

export interface AppConfig {
    port: number;
    facilitiesPath: string;
    rulesPath: string | null;
    transportMode: TransportMode;
    solverTimeLimitSeconds: number | null;  // null = value from the rules
    reasoning: {
        apiKey: string | null;              // null = template reasoning only
        baseUrl: string;
        model: string;
        timeoutMs: number;
    };
}

/**
 * Read service configuration from the environment
 * Throws on the first invalid variable so start-up fails fast
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = AppConfigSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        facilitiesPath: vars.FACILITIES_PATH,
        rulesPath: vars.RULES_PATH ?? null,
        transportMode: vars.TRANSPORT_MODE,
        solverTimeLimitSeconds: vars.SOLVER_TIME_LIMIT_SECONDS ?? null,
        reasoning: {
            apiKey: vars.REASONING_API_KEY ?? null,
            baseUrl: vars.REASONING_BASE_URL.replace(/\/+$/, ''),
            model: vars.REASONING_MODEL,
            timeoutMs: vars.REASONING_TIMEOUT_MS
        }
    };
}

/**
 * Parse a JSON rules-override file
 *
 * @param path File path, e.g. RULES_PATH
 */
export function loadRulesOverrides(path: string): RulesOverrides {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = RulesOverridesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Invalid rules file ${path}: ${formatZodError(parsed.error)}`);
    }
    return parsed.data;
}
