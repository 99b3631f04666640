import { describe, it, expect } from 'vitest';
import {
    IssueState,
    PullRequestState,
    TargetKind,
    UNKNOWN_TARGET,
    sameNotification,
    targetNumber,
    targetState,
} from './notifications';
import type { Notification, NotificationStub, NotificationTarget } from './notifications';

const repo = { owner: 'acme', name: 'widgets' };

function stub(id: string, title: string): NotificationStub {
    return {
        id,
        unread: true,
        reason: 'subscribed',
        subject: { type: 'Issue', title },
        repository: repo,
        lastUpdatedAt: '2024-01-01T00:00:00Z',
        threadUrl: `https://api.test/notifications/threads/${id}`,
    };
}

const issue: NotificationTarget = {
    kind: TargetKind.ISSUE,
    issue: {
        repo,
        number: 42,
        title: 'Crash on start',
        body: 'It crashes',
        author: 'octo',
        state: IssueState.OPEN,
        createdAt: '2024-01-01T00:00:00Z',
        htmlUrl: 'https://web.test/acme/widgets/issues/42',
    },
};

describe('notification identity', () => {
    it('compares by stub id only', () => {
        const a: Notification = { stub: stub('42', 'old title'), target: issue };
        const b: Notification = { stub: stub('42', 'new title'), target: UNKNOWN_TARGET };
        const c: Notification = { stub: stub('43', 'old title'), target: issue };
        expect(sameNotification(a, b)).toBe(true);
        expect(sameNotification(a, c)).toBe(false);
    });
});

describe('target helpers', () => {
    it('exposes number and state for numbered targets', () => {
        expect(targetNumber(issue)).toBe(42);
        expect(targetState(issue)).toBe('open');

        const pr: NotificationTarget = {
            kind: TargetKind.PULL_REQUEST,
            pullRequest: {
                repo,
                number: 7,
                title: 'Fix crash',
                body: '',
                author: 'octo',
                state: PullRequestState.MERGED,
                draft: false,
                createdAt: '2024-01-01T00:00:00Z',
                htmlUrl: 'https://web.test/acme/widgets/pull/7',
            },
        };
        expect(targetNumber(pr)).toBe(7);
        expect(targetState(pr)).toBe('merged');
    });

    it('returns undefined for targets without a number', () => {
        expect(targetNumber({ kind: TargetKind.CI_BUILD })).toBeUndefined();
        expect(targetState(UNKNOWN_TARGET)).toBeUndefined();
    });
});
