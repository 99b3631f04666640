import type { Notification } from '@inboxterm/model';
import { trackCacheSize } from '../metrics';

const EMPTY: readonly Notification[] = Object.freeze([]);

/**
 * Owner of the current hydrated inbox.
 * Writes go through a single chain and are applied one at a time; readers
 * always see a complete frozen array and never wait on a writer.
 */
export class NotificationCache {
    private items: readonly Notification[] = EMPTY;
    private writes: Promise<void> = Promise.resolve();

    /**
     * Swap the whole collection. Later duplicates of an id are dropped.
     */
    replace(notifications: readonly Notification[]): Promise<void> {
        return this.enqueue(() => {
            const seen = new Set<string>();
            const next: Notification[] = [];
            for (const notification of notifications) {
                if (!seen.has(notification.stub.id)) {
                    seen.add(notification.stub.id);
                    next.push(notification);
                }
            }
            this.commit(next);
        });
    }

    /**
     * Drop the entry with this id. Resolves false if it was not present.
     */
    remove(id: string): Promise<boolean> {
        return this.enqueue(() => {
            const next = this.items.filter(notification => notification.stub.id !== id);
            if (next.length === this.items.length) {
                return false;
            }
            this.commit(next);
            return true;
        });
    }

    snapshot(): readonly Notification[] {
        return this.items;
    }

    get(index: number): Notification | undefined {
        return this.items[index];
    }

    find(id: string): Notification | undefined {
        return this.items.find(notification => notification.stub.id === id);
    }

    get size(): number {
        return this.items.length;
    }

    private commit(next: Notification[]): void {
        this.items = Object.freeze(next);
        trackCacheSize(next.length);
    }

    private enqueue<T>(write: () => T): Promise<T> {
        const result = this.writes.then(write);
        // The chain only orders writes; each caller still sees its own outcome
        this.writes = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }
}
