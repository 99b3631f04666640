import { describe, it, expect } from 'vitest';
import { FetchError } from '@inboxterm/model';
import type { NotificationPage } from '../gateway/client';
import { FakeGateway, makeStub } from '../testing/gateway';
import { PaginationFetcher } from './fetcher';

// Holds every list call open briefly so overlapping calls can be observed
class SlowGateway extends FakeGateway {
    inFlight = 0;
    maxInFlight = 0;

    async listNotifications(page: number, perPage: number): Promise<NotificationPage> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        this.inFlight--;
        return super.listNotifications(page, perPage);
    }
}

const stubs = ['1', '2', '3', '4', '5'].map(id => makeStub(id, 'CheckSuite'));

describe('PaginationFetcher', () => {
    it('fetches a single page once', async () => {
        const gateway = new FakeGateway();
        gateway.setInbox(stubs.slice(0, 3), 50);

        const result = await new PaginationFetcher(gateway, { perPage: 50, concurrency: 4 }).fetchAllStubs();

        expect(result.map(s => s.id)).toEqual(['1', '2', '3']);
        expect(gateway.calls).toEqual(['list:1:50']);
    });

    it('fetches the first page, then the rest, and concatenates them', async () => {
        const gateway = new FakeGateway();
        gateway.setInbox(stubs, 2);

        const result = await new PaginationFetcher(gateway, { perPage: 2, concurrency: 4 }).fetchAllStubs();

        expect(result.map(s => s.id)).toEqual(['1', '2', '3', '4', '5']);
        expect(gateway.calls[0]).toBe('list:1:2');
        expect([...gateway.calls].sort()).toEqual(['list:1:2', 'list:2:2', 'list:3:2']);
    });

    it('requests the remaining pages concurrently up to the cap', async () => {
        const gateway = new SlowGateway();
        gateway.setInbox(stubs, 1);

        await new PaginationFetcher(gateway, { perPage: 1, concurrency: 3 }).fetchAllStubs();

        expect(gateway.calls).toHaveLength(5);
        expect(gateway.maxInFlight).toBe(3);
    });

    it('fails when the first page fails', async () => {
        const gateway = new FakeGateway();
        gateway.pages.set(1, new FetchError('Service unavailable', 503));

        await expect(
            new PaginationFetcher(gateway, { perPage: 2, concurrency: 4 }).fetchAllStubs(),
        ).rejects.toThrow('Service unavailable');
        expect(gateway.calls).toEqual(['list:1:2']);
    });

    it('fails as a whole when a later page fails', async () => {
        const gateway = new FakeGateway();
        gateway.setInbox(stubs, 2);
        gateway.pages.set(2, new FetchError('Bad gateway', 502));

        await expect(
            new PaginationFetcher(gateway, { perPage: 2, concurrency: 4 }).fetchAllStubs(),
        ).rejects.toBeInstanceOf(FetchError);
    });
});
