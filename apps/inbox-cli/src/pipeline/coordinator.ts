import {
    AuthenticationError,
    FetchError,
    NoBrowsableUrlError,
    RateLimitError,
    TargetKind,
    UnknownNotificationError,
} from '@inboxterm/model';
import type { Notification } from '@inboxterm/model';
import type { NotificationCache } from '../cache/store';
import type { RemoteGateway } from '../gateway/client';
import { isRecord } from '../gateway/wire';
import type { PaginationFetcher } from '../sync/fetcher';
import type { Hydrator } from '../sync/hydrator';
import { mapSettled } from '../sync/limit';

export interface CoordinatorDeps {
    gateway: RemoteGateway;
    cache: NotificationCache;
    fetcher: PaginationFetcher;
    hydrator: Hydrator;
    concurrency: number;
}

function browsable(url: string, notificationId: string): string {
    if (!url) {
        throw new NoBrowsableUrlError(notificationId);
    }
    return url;
}

/**
 * Applies user actions against the remote service and mirrors their outcome in the cache
 */
export class MutationCoordinator {
    constructor(private deps: CoordinatorDeps) {}

    /**
     * Fetch, hydrate and swap in a fresh inbox. On any failure the cache keeps its previous contents.
     */
    async refresh(): Promise<readonly Notification[]> {
        const { fetcher, hydrator, cache } = this.deps;
        const stubs = await fetcher.fetchAllStubs();
        const notifications = await hydrator.hydrate(stubs);
        await cache.replace(notifications);
        return cache.snapshot();
    }

    /**
     * Mark a thread read remotely, then drop it locally. A remote failure leaves the cache untouched.
     */
    async markAsRead(notificationId: string): Promise<void> {
        await this.deps.gateway.markThreadRead(notificationId);
        await this.deps.cache.remove(notificationId);
    }

    /**
     * Mark several threads read concurrently. Successful ones are removed from the cache
     * even when others fail; the failures are then reported together.
     * @returns ids that were marked and removed
     */
    async markManyAsRead(notificationIds: readonly string[]): Promise<string[]> {
        const { gateway, cache, concurrency } = this.deps;
        const results = await mapSettled(notificationIds, concurrency, id => gateway.markThreadRead(id));

        const done: string[] = [];
        const failures: unknown[] = [];
        for (const [index, result] of results.entries()) {
            if (result.status === 'fulfilled') {
                done.push(notificationIds[index]);
            } else {
                failures.push(result.reason);
            }
        }

        for (const id of done) {
            await cache.remove(id);
        }

        const fatal = failures.find(error => error instanceof AuthenticationError || error instanceof RateLimitError);
        if (fatal !== undefined) {
            throw fatal;
        }
        if (failures.length > 0) {
            throw new FetchError(
                `${failures.length} of ${notificationIds.length} notification(s) could not be marked as read`,
                undefined,
                undefined,
                { cause: failures[0] },
            );
        }
        return done;
    }

    /**
     * Browser url for a cached notification.
     * Issues open at their latest comment; pull requests deliberately open at the pull request itself.
     */
    async resolveOpenUrl(notificationId: string): Promise<string> {
        const notification = this.deps.cache.find(notificationId);
        if (!notification) {
            throw new UnknownNotificationError(notificationId);
        }

        const target = notification.target;
        switch (target.kind) {
            case TargetKind.RELEASE:
                return browsable(target.release.htmlUrl, notificationId);
            case TargetKind.ISSUE: {
                const commentUrl = notification.stub.subject.latestCommentUrl;
                if (commentUrl) {
                    const comment = await this.deps.gateway.getResource(commentUrl);
                    if (isRecord(comment) && typeof comment.html_url === 'string' && comment.html_url) {
                        return comment.html_url;
                    }
                }
                return browsable(target.issue.htmlUrl, notificationId);
            }
            case TargetKind.PULL_REQUEST:
                return browsable(target.pullRequest.htmlUrl, notificationId);
            case TargetKind.DISCUSSION:
                return browsable(target.discussion.htmlUrl, notificationId);
            default:
                throw new NoBrowsableUrlError(notificationId);
        }
    }
}
