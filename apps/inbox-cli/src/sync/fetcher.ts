import type { NotificationStub } from '@inboxterm/model';
import type { RemoteGateway } from '../gateway/client';
import { mapSettled } from './limit';

export interface FetcherOptions {
    perPage: number;
    concurrency: number;
}

/**
 * Retrieves every page of notification stubs for the authenticated user
 */
export class PaginationFetcher {
    constructor(
        private gateway: RemoteGateway,
        private options: FetcherOptions,
    ) {}

    /**
     * Fetch page 1 to learn the page count, then the rest concurrently.
     * All or nothing: a failure on any page rejects the whole call.
     */
    async fetchAllStubs(): Promise<NotificationStub[]> {
        const { perPage, concurrency } = this.options;
        const first = await this.gateway.listNotifications(1, perPage);
        const stubs = [...first.stubs];

        if (first.pageCount <= 1) {
            return stubs;
        }

        const remaining = Array.from({ length: first.pageCount - 1 }, (_, i) => i + 2);
        const pages = await mapSettled(remaining, concurrency, page => this.gateway.listNotifications(page, perPage));

        for (const page of pages) {
            if (page.status === 'rejected') {
                throw page.reason;
            }
            stubs.push(...page.value.stubs);
        }

        return stubs;
    }
}
