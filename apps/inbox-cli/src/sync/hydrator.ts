import {
    AuthenticationError,
    HydrationError,
    RateLimitError,
    ResolveError,
    TaskAggregationError,
    TargetKind,
    UNKNOWN_TARGET,
    describeError,
} from '@inboxterm/model';
import type { Notification, NotificationStub } from '@inboxterm/model';
import type { HydrationPolicy } from '../config';
import { trackHydration, trackResolved } from '../metrics';
import { mapSettled } from './limit';
import type { TargetResolver } from './resolver';

export interface HydratorOptions {
    concurrency: number;
    policy: HydrationPolicy;
}

function recencyKey(notification: Notification): number {
    const time = Date.parse(notification.stub.lastUpdatedAt);
    return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Most recently updated first. Ties keep their input order.
 */
export function sortByRecency(notifications: readonly Notification[]): Notification[] {
    return [...notifications].sort((a, b) => {
        const ka = recencyKey(a);
        const kb = recencyKey(b);
        if (ka === kb) {
            return 0;
        }
        return ka > kb ? -1 : 1;
    });
}

/**
 * Resolves a batch of stubs concurrently and joins them into a sorted inbox
 */
export class Hydrator {
    constructor(
        private resolver: TargetResolver,
        private options: HydratorOptions,
    ) {}

    async hydrate(stubs: readonly NotificationStub[]): Promise<Notification[]> {
        const startedAt = Date.now();
        const settled = await mapSettled(stubs, this.options.concurrency, stub => this.resolver.resolve(stub));

        const notifications: Notification[] = [];
        const failures: ResolveError[] = [];
        const crashes: unknown[] = [];

        for (const [index, result] of settled.entries()) {
            const stub = stubs[index];
            if (result.status === 'fulfilled') {
                notifications.push({ stub, target: result.value });
                trackResolved(result.value.kind);
                continue;
            }

            const error: unknown = result.reason;
            // Session-level failures abort under either policy
            if (error instanceof AuthenticationError || error instanceof RateLimitError) {
                throw error;
            }

            if (this.options.policy === 'degrade') {
                console.warn(`[hydrator] Showing notification ${stub.id} as unknown: ${describeError(error)}`);
                notifications.push({ stub, target: UNKNOWN_TARGET });
                trackResolved(TargetKind.UNKNOWN);
            } else if (error instanceof ResolveError) {
                failures.push(error);
            } else {
                crashes.push(error);
            }
        }

        if (crashes.length > 0) {
            throw new TaskAggregationError(crashes);
        }
        if (failures.length > 0) {
            throw new HydrationError(failures);
        }

        trackHydration(Date.now() - startedAt);
        return sortByRecency(notifications);
    }
}
