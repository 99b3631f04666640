import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createInboxApp } from './app';
import type { InboxApp } from './app';
import { loadConfig } from './config';
import { HELP, InboxShell } from './shell';
import { FakeGateway, makeStub } from './testing/gateway';

describe('InboxShell', () => {
    let gateway: FakeGateway;
    let app: InboxApp;
    let shell: InboxShell;
    let lines: string[];

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        gateway = new FakeGateway();
        gateway.resources.set('https://api.test/repos/octo/inbox/issues/3', {
            number: 3,
            title: 'Crash on start',
            closed_at: null,
            html_url: 'https://github.test/octo/inbox/issues/3',
        });
        gateway.setInbox([
            makeStub('31', 'Issue', {
                title: 'Crash on start',
                detailUrl: 'https://api.test/repos/octo/inbox/issues/3',
                updatedAt: '2024-05-02T00:00:00Z',
            }),
            makeStub('32', 'CheckSuite', { title: 'CI failed', updatedAt: '2024-05-01T00:00:00Z' }),
        ], 50);

        app = createInboxApp(loadConfig({}), gateway);
        lines = [];
        shell = new InboxShell(app, line => lines.push(line));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    const run = async (line: string) => {
        const keepGoing = await shell.execute(line);
        await app.worker.whenIdle();
        return keepGoing;
    };

    it('prints the inbox after a refresh', async () => {
        await run('refresh');

        expect(lines).toEqual([
            '2 notification(s)',
            '1. octo/inbox#3: [issue/open] Crash on start',
            '2. octo/inbox: [ci] CI failed',
        ]);
    });

    it('lists and counts with filters', async () => {
        await run('refresh');
        lines.length = 0;

        await run('list issue open');
        await run('count open');
        await run('list pr');

        expect(lines).toEqual(['1. octo/inbox#3: [issue/open] Crash on start', '1', 'No notifications']);
    });

    it('prints the browser url for open', async () => {
        await run('refresh');
        lines.length = 0;

        await run('open 1');

        expect(lines).toEqual(['https://github.test/octo/inbox/issues/3']);
    });

    it('marks notifications done', async () => {
        await run('refresh');
        lines.length = 0;

        await run('done 2');
        await run('list');

        expect(gateway.markedRead).toEqual(['32']);
        expect(lines).toEqual(['Marked 32 as read', '1. octo/inbox#3: [issue/open] Crash on start']);
    });

    it('reports failures on the status line', async () => {
        await run('refresh');
        lines.length = 0;

        await run('open 2');

        expect(lines).toEqual(['Error: notification 32 has no browsable url']);
    });

    it('explains bad input without failing', async () => {
        await run('refresh');
        lines.length = 0;

        expect(await run('done 9')).toBe(true);
        expect(await run('list bogus')).toBe(true);
        expect(await run('frobnicate')).toBe(true);

        expect(lines).toEqual([
            'No notification numbered "9"',
            'Unknown filter "bogus"',
            'Unknown command "frobnicate"; try "help"',
        ]);
    });

    it('prints help and stops on quit', async () => {
        expect(await run('help')).toBe(true);
        expect(lines).toEqual([HELP]);
        expect(await run('quit')).toBe(false);
    });
});
