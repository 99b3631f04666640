import { ConfigError } from '@inboxterm/model';

export type HydrationPolicy = 'abort' | 'degrade';

export interface SyncConfig {
    apiBaseUrl: string;
    /** Notifications per list page; the remote caps this at 50 */
    perPage: number;
    /** Maximum remote calls in flight during a refresh */
    concurrency: number;
    requestTimeoutMs: number;
    /** What a refresh does when a single stub fails to hydrate */
    hydrationPolicy: HydrationPolicy;
    timelineCacheSize: number;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

function policyFromEnv(env: Env): HydrationPolicy {
    const raw = env.INBOXTERM_HYDRATION_POLICY;
    if (raw === undefined || raw === '' || raw === 'abort') {
        return 'abort';
    }
    if (raw === 'degrade') {
        return 'degrade';
    }
    throw new ConfigError(`INBOXTERM_HYDRATION_POLICY must be "abort" or "degrade", got "${raw}"`);
}

/**
 * Build the sync configuration from environment variables
 * @param env - environment to read, defaults to process.env
 * @param configOverride - optional values that win over the environment
 */
export function loadConfig(env: Env = process.env, configOverride?: Partial<SyncConfig>): SyncConfig {
    const config: SyncConfig = {
        apiBaseUrl: (env.INBOXTERM_API_URL || 'https://api.github.com').replace(/\/+$/, ''),
        perPage: intFromEnv(env, 'INBOXTERM_PER_PAGE', 50, 1, 50),
        concurrency: intFromEnv(env, 'INBOXTERM_CONCURRENCY', 12, 1),
        requestTimeoutMs: intFromEnv(env, 'INBOXTERM_TIMEOUT_MS', 15000, 1),
        hydrationPolicy: policyFromEnv(env),
        timelineCacheSize: intFromEnv(env, 'INBOXTERM_TIMELINE_CACHE_SIZE', 100, 1),
    };

    return { ...config, ...configOverride };
}
