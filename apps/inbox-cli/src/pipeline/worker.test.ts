import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FetchError, RequestType, ResponseType, UnknownNotificationError } from '@inboxterm/model';
import type { PipelineResponse } from '@inboxterm/model';
import { createInboxApp } from '../app';
import type { InboxApp } from '../app';
import { loadConfig } from '../config';
import { FakeGateway, makeStub } from '../testing/gateway';

describe('PipelineWorker', () => {
    let gateway: FakeGateway;
    let app: InboxApp;
    let responses: PipelineResponse[];

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        gateway = new FakeGateway();
        gateway.setInbox([
            makeStub('42', 'CheckSuite', { updatedAt: '2024-05-02T00:00:00Z' }),
            makeStub('7', 'CheckSuite', { updatedAt: '2024-05-01T00:00:00Z' }),
        ], 50);
        app = createInboxApp(loadConfig({}), gateway);
        responses = [];
        app.worker.on('response', response => responses.push(response));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('answers requests in submission order with their request ids', async () => {
        const refreshId = app.worker.submit({ type: RequestType.REFRESH });
        const markId = app.worker.submit({ type: RequestType.MARK_AS_READ, notificationId: '42' });
        await app.worker.whenIdle();

        expect(refreshId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(responses.map(r => [r.type, r.requestId])).toEqual([
            [ResponseType.NOTIFICATIONS_REPLACED, refreshId],
            [ResponseType.NOTIFICATION_REMOVED, markId],
        ]);
        expect(app.cache.snapshot().map(n => n.stub.id)).toEqual(['7']);
    });

    it('never runs two requests at once', async () => {
        app.worker.submit({ type: RequestType.REFRESH });
        app.worker.submit({ type: RequestType.MARK_AS_READ, notificationId: '42' });
        app.worker.submit({ type: RequestType.REFRESH });
        await app.worker.whenIdle();

        // The mark lands between the two page fetches, never alongside one
        expect(gateway.calls).toEqual(['list:1:50', 'mark:42', 'list:1:50']);
    });

    it('turns failures into responses and keeps going', async () => {
        gateway.markFailures.set('42', new FetchError('Not Found', 404));

        app.worker.submit({ type: RequestType.REFRESH });
        app.worker.submit({ type: RequestType.MARK_AS_READ, notificationId: '42' });
        app.worker.submit({ type: RequestType.RESOLVE_OPEN_URL, notificationId: 'missing' });
        app.worker.submit({ type: RequestType.MARK_AS_READ, notificationId: '7' });
        await app.worker.whenIdle();

        expect(responses.map(r => r.type)).toEqual([
            ResponseType.NOTIFICATIONS_REPLACED,
            ResponseType.OPERATION_FAILED,
            ResponseType.OPERATION_FAILED,
            ResponseType.NOTIFICATION_REMOVED,
        ]);

        const [, markFailed, openFailed] = responses;
        expect(markFailed.type === ResponseType.OPERATION_FAILED && markFailed.error).toBeInstanceOf(FetchError);
        expect(openFailed.type === ResponseType.OPERATION_FAILED && openFailed.error).toBeInstanceOf(UnknownNotificationError);
        expect(app.cache.snapshot().map(n => n.stub.id)).toEqual(['42']);
    });

    it('signals busy while requests are outstanding', async () => {
        const busy: boolean[] = [];
        app.worker.on('busy', value => busy.push(value));

        app.worker.submit({ type: RequestType.REFRESH });
        app.worker.submit({ type: RequestType.REFRESH });
        expect(app.worker.isBusy()).toBe(true);

        await app.worker.whenIdle();

        expect(app.worker.isBusy()).toBe(false);
        expect(busy).toEqual([true, false]);
    });

    it('reports batch mark-as-read', async () => {
        app.worker.submit({ type: RequestType.REFRESH });
        app.worker.submit({ type: RequestType.MARK_MANY_AS_READ, notificationIds: ['42', '7'] });
        await app.worker.whenIdle();

        const last = responses[1];
        expect(last.type === ResponseType.NOTIFICATIONS_REMOVED && last.notificationIds).toEqual(['42', '7']);
        expect(app.cache.size).toBe(0);
    });

    it('clears loaded timelines on refresh', async () => {
        const clear = vi.spyOn(app.timelines, 'clear');

        app.worker.submit({ type: RequestType.REFRESH });
        await app.worker.whenIdle();

        expect(clear).toHaveBeenCalledTimes(1);
    });

    it('survives a listener that throws and stops calling removed listeners', async () => {
        const faulty = () => {
            throw new Error('listener bug');
        };
        const removed = vi.fn();
        app.worker.on('response', faulty);
        app.worker.on('response', removed);
        app.worker.off('response', removed);

        app.worker.submit({ type: RequestType.REFRESH });
        await app.worker.whenIdle();

        expect(responses).toHaveLength(1);
        expect(removed).not.toHaveBeenCalled();
        expect(console.error).toHaveBeenCalledWith('[worker] response listener threw: listener bug');
    });
});
