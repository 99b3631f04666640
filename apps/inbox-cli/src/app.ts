import { NotificationCache } from './cache/store';
import type { SyncConfig } from './config';
import type { RemoteGateway } from './gateway/client';
import { MutationCoordinator } from './pipeline/coordinator';
import { PipelineWorker } from './pipeline/worker';
import { PaginationFetcher } from './sync/fetcher';
import { Hydrator } from './sync/hydrator';
import { TargetResolver } from './sync/resolver';
import { TimelineService } from './timeline/service';

export interface InboxApp {
    cache: NotificationCache;
    coordinator: MutationCoordinator;
    timelines: TimelineService;
    worker: PipelineWorker;
}

/**
 * Wire the pipeline around one gateway instance
 */
export function createInboxApp(config: SyncConfig, gateway: RemoteGateway): InboxApp {
    const cache = new NotificationCache();
    const fetcher = new PaginationFetcher(gateway, { perPage: config.perPage, concurrency: config.concurrency });
    const hydrator = new Hydrator(new TargetResolver(gateway), {
        concurrency: config.concurrency,
        policy: config.hydrationPolicy,
    });
    const coordinator = new MutationCoordinator({
        gateway,
        cache,
        fetcher,
        hydrator,
        concurrency: config.concurrency,
    });
    const timelines = new TimelineService(gateway, config.timelineCacheSize);

    return {
        cache,
        coordinator,
        timelines,
        worker: new PipelineWorker(coordinator, timelines),
    };
}
