import { TargetKind, targetNumber, targetState } from '@inboxterm/model';
import type { Notification, NotificationTarget, TimelineEvent } from '@inboxterm/model';

/**
 * Bad arguments to a command; reported to the user, never fatal
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

const KIND_FILTERS: ReadonlyMap<string, TargetKind> = new Map([
    ['pr', TargetKind.PULL_REQUEST],
    ['issue', TargetKind.ISSUE],
    ['release', TargetKind.RELEASE],
    ['discussion', TargetKind.DISCUSSION],
]);

const STATE_FILTERS = new Set(['open', 'closed', 'merged']);

const KIND_LABELS: Record<TargetKind, string> = {
    [TargetKind.ISSUE]: 'issue',
    [TargetKind.PULL_REQUEST]: 'pr',
    [TargetKind.RELEASE]: 'release',
    [TargetKind.DISCUSSION]: 'discussion',
    [TargetKind.CI_BUILD]: 'ci',
    [TargetKind.UNKNOWN]: 'unknown',
};

/**
 * Indices of the notifications matching every filter, e.g. `pr open`.
 * At most one kind and one state may be given.
 */
export function filterNotifications(notifications: readonly Notification[], args: readonly string[]): number[] {
    let kind: TargetKind | undefined;
    let state: string | undefined;

    for (const arg of args) {
        const kindFilter = KIND_FILTERS.get(arg);
        if (kindFilter !== undefined) {
            if (kind !== undefined && kind !== kindFilter) {
                throw new UsageError(`Only one of ${[...KIND_FILTERS.keys()].join(', ')} may be given`);
            }
            kind = kindFilter;
        } else if (STATE_FILTERS.has(arg)) {
            if (state !== undefined && state !== arg) {
                throw new UsageError(`Only one of ${[...STATE_FILTERS].join(', ')} may be given`);
            }
            state = arg;
        } else {
            throw new UsageError(`Unknown filter "${arg}"`);
        }
    }

    const matches: number[] = [];
    notifications.forEach((notification, index) => {
        if (kind !== undefined && notification.target.kind !== kind) return;
        if (state !== undefined && targetState(notification.target) !== state) return;
        matches.push(index);
    });
    return matches;
}

function kindLabel(target: NotificationTarget): string {
    const state = targetState(target);
    return state ? `${KIND_LABELS[target.kind]}/${state}` : KIND_LABELS[target.kind];
}

/**
 * One list line: `3. octo/repo#12: [pr/open] Fix the thing`. Display indices start at 1.
 */
export function formatNotification(index: number, notification: Notification): string {
    const { repository, subject } = notification.stub;
    const number = targetNumber(notification.target);
    const ref = number === undefined ? `${repository.owner}/${repository.name}` : `${repository.owner}/${repository.name}#${number}`;
    return `${index + 1}. ${ref}: [${kindLabel(notification.target)}] ${subject.title}`;
}

/**
 * Parse 1-based display indices into 0-based cache positions
 */
export function parseIndices(args: readonly string[], size: number): number[] {
    if (args.length === 0) {
        throw new UsageError('Expected at least one notification number');
    }
    return args.map(arg => {
        const value = Number(arg);
        if (!Number.isInteger(value) || value < 1 || value > size) {
            throw new UsageError(`No notification numbered "${arg}"`);
        }
        return value - 1;
    });
}

/**
 * Short description of one timeline entry
 */
export function formatEvent(event: TimelineEvent): string {
    const kind = event.kind;
    let detail: string;
    switch (kind.type) {
        case 'commented':
            detail = `commented: ${kind.body.split('\n')[0]}`;
            break;
        case 'labeled':
        case 'unlabeled':
            detail = `${kind.type} ${kind.label}`;
            break;
        case 'assigned':
        case 'unassigned':
            detail = `${kind.type} ${kind.assignee}`;
            break;
        case 'renamed':
            detail = `renamed "${kind.from}" to "${kind.to}"`;
            break;
        case 'merged':
            detail = `merged into ${kind.baseBranch}`;
            break;
        case 'reviewed':
            detail = `reviewed (${kind.state})`;
            break;
        case 'review_requested':
            detail = `requested review from ${kind.reviewer}`;
            break;
        case 'committed':
            detail = `committed ${kind.abbreviatedOid} ${kind.headline}`;
            break;
        case 'cross_referenced':
        case 'connected':
            detail = `${kind.type.replace('_', ' ')} #${kind.source.number} ${kind.source.title}`;
            break;
        case 'unknown':
            detail = kind.typename;
            break;
        default:
            detail = kind.type.replace(/_/g, ' ');
    }

    const who = event.actor ? `@${event.actor} ` : '';
    const when = event.createdAt ? `${event.createdAt} ` : '';
    return `${when}${who}${detail}`;
}
