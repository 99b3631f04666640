import { v4 as uuidv4 } from 'uuid';
import { RequestType, ResponseType, describeError, isPipelineError } from '@inboxterm/model';
import type { PipelineRequest, PipelineResponse } from '@inboxterm/model';
import { trackFailure } from '../metrics';
import type { TimelineService } from '../timeline/service';
import type { MutationCoordinator } from './coordinator';

export interface WorkerEvents {
    response: [response: PipelineResponse];
    busy: [busy: boolean];
}

type Listener<E extends keyof WorkerEvents> = (...args: WorkerEvents[E]) => void;

type ListenerMap = { [E in keyof WorkerEvents]: Listener<E>[] };

interface QueuedRequest {
    requestId: string;
    request: PipelineRequest;
}

/**
 * Single background worker between the UI and the pipeline.
 * Requests are taken from a FIFO queue and run one at a time, so a mark-as-read
 * can never race a refresh. Every outcome, failures included, comes back as a
 * `response` event.
 */
export class PipelineWorker {
    private queue: QueuedRequest[] = [];
    private draining?: Promise<void>;
    private listeners: ListenerMap = { response: [], busy: [] };

    constructor(
        private coordinator: MutationCoordinator,
        private timelines: TimelineService,
    ) {}

    /**
     * Queue a request
     * @returns request id echoed on the matching response
     */
    submit(request: PipelineRequest): string {
        const requestId = uuidv4();
        this.queue.push({ requestId, request });
        if (!this.draining) {
            this.emit('busy', true);
            this.draining = this.processQueue();
        }
        return requestId;
    }

    isBusy(): boolean {
        return this.draining !== undefined;
    }

    /**
     * Resolves once the queue is empty and nothing is running
     */
    async whenIdle(): Promise<void> {
        while (this.draining) {
            await this.draining;
        }
    }

    on<E extends keyof WorkerEvents>(event: E, listener: Listener<E>): void {
        const listeners: Listener<E>[] = this.listeners[event];
        listeners.push(listener);
    }

    off<E extends keyof WorkerEvents>(event: E, listener: Listener<E>): void {
        const listeners: Listener<E>[] = this.listeners[event];
        const index = listeners.indexOf(listener);
        if (index !== -1) {
            listeners.splice(index, 1);
        }
    }

    private emit<E extends keyof WorkerEvents>(event: E, ...args: WorkerEvents[E]): void {
        const listeners: Listener<E>[] = this.listeners[event];
        for (const listener of [...listeners]) {
            try {
                listener(...args);
            } catch (error) {
                console.error(`[worker] ${event} listener threw: ${describeError(error)}`);
            }
        }
    }

    // Never rejects: process() turns every failure into a response
    private async processQueue(): Promise<void> {
        let next = this.queue.shift();
        while (next) {
            this.emit('response', await this.process(next));
            next = this.queue.shift();
        }
        this.draining = undefined;
        this.emit('busy', false);
    }

    private async process({ requestId, request }: QueuedRequest): Promise<PipelineResponse> {
        try {
            return await this.handle(requestId, request);
        } catch (caught) {
            const error = caught instanceof Error ? caught : new Error(String(caught));
            trackFailure(isPipelineError(error) ? error.code : 'unexpected');
            console.error(`[worker] ${RequestType[request.type]} failed: ${describeError(error)}`);
            return { type: ResponseType.OPERATION_FAILED, requestId, request, error };
        }
    }

    private async handle(requestId: string, request: PipelineRequest): Promise<PipelineResponse> {
        switch (request.type) {
            case RequestType.REFRESH: {
                const notifications = await this.coordinator.refresh();
                this.timelines.clear();
                console.log(`[worker] Inbox refreshed with ${notifications.length} notification(s)`);
                return { type: ResponseType.NOTIFICATIONS_REPLACED, requestId, notifications };
            }
            case RequestType.MARK_AS_READ:
                await this.coordinator.markAsRead(request.notificationId);
                return { type: ResponseType.NOTIFICATION_REMOVED, requestId, notificationId: request.notificationId };
            case RequestType.RESOLVE_OPEN_URL: {
                const url = await this.coordinator.resolveOpenUrl(request.notificationId);
                return { type: ResponseType.OPEN_URL_RESOLVED, requestId, notificationId: request.notificationId, url };
            }
            case RequestType.MARK_MANY_AS_READ: {
                const notificationIds = await this.coordinator.markManyAsRead(request.notificationIds);
                return { type: ResponseType.NOTIFICATIONS_REMOVED, requestId, notificationIds };
            }
            case RequestType.OPEN_ISSUE:
                return { type: ResponseType.ISSUE_LOADED, requestId, issue: await this.timelines.issue(request.issue) };
            case RequestType.OPEN_PULL_REQUEST:
                return {
                    type: ResponseType.PULL_REQUEST_LOADED,
                    requestId,
                    pullRequest: await this.timelines.pullRequest(request.pullRequest),
                };
            case RequestType.OPEN_DISCUSSION:
                return {
                    type: ResponseType.DISCUSSION_LOADED,
                    requestId,
                    discussion: await this.timelines.discussion(request.discussion),
                };
        }
    }
}
