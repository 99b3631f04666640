import { Counter, Gauge, Histogram, register } from 'prom-client';

// Initialize Prometheus metrics
const metrics = {
    // Remote call metrics
    remoteRequests: new Counter({
        name: 'inbox_remote_requests_total',
        help: 'Total number of remote calls by operation and outcome',
        labelNames: ['operation', 'outcome'] as const,
    }),

    // Hydration metrics
    hydrationDuration: new Histogram({
        name: 'inbox_hydration_duration_ms',
        help: 'Time taken to hydrate a full inbox in milliseconds',
        buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
    }),

    stubsResolved: new Counter({
        name: 'inbox_stubs_resolved_total',
        help: 'Total number of notification stubs resolved by target kind',
        labelNames: ['kind'] as const,
    }),

    // Cache metrics
    cacheSize: new Gauge({
        name: 'inbox_cache_notifications',
        help: 'Number of notifications currently held in the cache',
    }),

    // Error metrics
    pipelineFailures: new Counter({
        name: 'inbox_pipeline_failures_total',
        help: 'Total number of failed pipeline requests by error code',
        labelNames: ['code'] as const,
    }),
};

register.setDefaultLabels({
    app: 'inboxterm',
});

// Helper functions to track metrics
const trackRemoteRequest = (operation: string, success: boolean) => {
    metrics.remoteRequests.inc({ operation, outcome: success ? 'ok' : 'error' });
};

const trackHydration = (durationMs: number) => {
    metrics.hydrationDuration.observe(durationMs);
};

const trackResolved = (kind: string) => {
    metrics.stubsResolved.inc({ kind });
};

const trackCacheSize = (size: number) => {
    metrics.cacheSize.set(size);
};

const trackFailure = (code: string) => {
    metrics.pipelineFailures.inc({ code });
};

export {
    metrics,
    register,
    trackRemoteRequest,
    trackHydration,
    trackResolved,
    trackCacheSize,
    trackFailure,
};
