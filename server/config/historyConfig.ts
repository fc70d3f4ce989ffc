/**
 * History Engine Configuration
 *
 * Process-wide tuning knobs with documented defaults. Values come from, in
 * increasing priority: defaults, environment variables, explicit overrides
 * passed at engine construction.
 *
 * | Setting              | Env var                  | Default |
 * |----------------------|--------------------------|---------|
 * | pointBudget          | HISTORY_POINT_BUDGET     | 200     |
 * | minimumBucketWidthMs | HISTORY_MIN_BUCKET_MS    | 60000   |
 * | cacheCapacity        | HISTORY_CACHE_CAPACITY   | 50      |
 * | scanTimeoutMs        | HISTORY_SCAN_TIMEOUT_MS  | 10000   |
 *
 * @module server/config/historyConfig
 */

import { z } from 'zod';
import { HistoryConfigError } from '../history/errors';

const historyConfigSchema = z.object({
    pointBudget: z.number().int().positive(),
    minimumBucketWidthMs: z.number().int().positive(),
    cacheCapacity: z.number().int().positive(),
    scanTimeoutMs: z.number().int().positive(),
});

export type HistoryConfig = z.infer<typeof historyConfigSchema>;

type HistoryConfigKey = keyof HistoryConfig;

export const DEFAULT_HISTORY_CONFIG: Readonly<HistoryConfig> = Object.freeze({
    pointBudget: 200,
    minimumBucketWidthMs: 60_000,
    cacheCapacity: 50,
    scanTimeoutMs: 10_000,
});

const ENV_VARS: Record<HistoryConfigKey, string> = {
    pointBudget: 'HISTORY_POINT_BUDGET',
    minimumBucketWidthMs: 'HISTORY_MIN_BUCKET_MS',
    cacheCapacity: 'HISTORY_CACHE_CAPACITY',
    scanTimeoutMs: 'HISTORY_SCAN_TIMEOUT_MS',
};

function readEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    return Number(raw);
}

/**
 * Build the effective engine configuration.
 * Throws HistoryConfigError if any resulting value is not a positive integer.
 */
export function loadHistoryConfig(
    overrides: Partial<HistoryConfig> = {},
    env: NodeJS.ProcessEnv = process.env
): HistoryConfig {
    const pick = (key: HistoryConfigKey): number =>
        overrides[key] ?? readEnvNumber(env, ENV_VARS[key]) ?? DEFAULT_HISTORY_CONFIG[key];

    const parsed = historyConfigSchema.safeParse({
        pointBudget: pick('pointBudget'),
        minimumBucketWidthMs: pick('minimumBucketWidthMs'),
        cacheCapacity: pick('cacheCapacity'),
        scanTimeoutMs: pick('scanTimeoutMs'),
    });

    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new HistoryConfigError(`Invalid history config (${problems.join('; ')})`, { problems });
    }

    return parsed.data;
}
