import { LockReason, ReviewState } from '@inboxterm/model';
import type {
    IssueOrPullRequestRef,
    TimelineEvent,
    TimelineEventKind,
    TimelineRepository,
} from '@inboxterm/model';
import { isRecord, readBoolean, readLogin, readOptionalString, readPath } from '../gateway/wire';
import type { JsonObject } from '../gateway/wire';

const LOCK_REASONS: Record<string, LockReason> = {
    OFF_TOPIC: LockReason.OFF_TOPIC,
    RESOLVED: LockReason.RESOLVED,
    SPAM: LockReason.SPAM,
    TOO_HEATED: LockReason.TOO_HEATED,
};

const REVIEW_STATES: Record<string, ReviewState> = {
    APPROVED: ReviewState.APPROVED,
    CHANGES_REQUESTED: ReviewState.CHANGES_REQUESTED,
    COMMENTED: ReviewState.COMMENTED,
    DISMISSED: ReviewState.DISMISSED,
    PENDING: ReviewState.PENDING,
};

function text(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

function refOf(value: unknown): IssueOrPullRequestRef | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const kind = value.__typename === 'Issue' ? 'issue' : value.__typename === 'PullRequest' ? 'pull_request' : undefined;
    if (!kind || typeof value.number !== 'number') {
        return undefined;
    }
    return { kind, number: value.number, title: text(value.title) };
}

function repositoryOf(value: unknown): TimelineRepository | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    return { owner: text(readPath(value, 'owner', 'login')), name: text(value.name) };
}

function closerOf(value: unknown): { commit: string } | { pullRequest: number } | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    if (value.__typename === 'Commit') {
        return { commit: text(value.abbreviatedOid) };
    }
    if (value.__typename === 'PullRequest' && typeof value.number === 'number') {
        return { pullRequest: value.number };
    }
    return undefined;
}

function kindOf(node: JsonObject, typename: string): TimelineEventKind {
    switch (typename) {
        case 'IssueComment':
            return { type: 'commented', body: text(node.body) };
        case 'ClosedEvent':
            return { type: 'closed', closer: closerOf(node.closer) };
        case 'ReopenedEvent':
            return { type: 'reopened' };
        case 'MergedEvent':
            return { type: 'merged', baseBranch: text(node.mergeRefName) };
        case 'LabeledEvent':
            return { type: 'labeled', label: text(readPath(node, 'label', 'name')) };
        case 'UnlabeledEvent':
            return { type: 'unlabeled', label: text(readPath(node, 'label', 'name')) };
        case 'AssignedEvent':
            return { type: 'assigned', assignee: readLogin(node, 'assignee') };
        case 'UnassignedEvent':
            return { type: 'unassigned', assignee: readLogin(node, 'assignee') };
        case 'RenamedTitleEvent':
            return { type: 'renamed', from: text(node.previousTitle), to: text(node.currentTitle) };
        case 'PullRequestReview':
            return {
                type: 'reviewed',
                state: REVIEW_STATES[text(node.state)] ?? ReviewState.OTHER,
                body: readOptionalString(node, 'body') || undefined,
            };
        case 'ReviewRequestedEvent': {
            const reviewer = node.requestedReviewer;
            const name = isRecord(reviewer) ? text(reviewer.login) || text(reviewer.name) : '';
            return { type: 'review_requested', reviewer: name };
        }
        case 'PullRequestCommit':
            return {
                type: 'committed',
                headline: text(readPath(node, 'commit', 'messageHeadline')),
                abbreviatedOid: text(readPath(node, 'commit', 'abbreviatedOid')),
            };
        case 'ReferencedEvent':
            return {
                type: 'referenced',
                commitHeadline: text(readPath(node, 'commit', 'messageHeadline')),
                crossRepository: readBoolean(node, 'isCrossRepository') ? repositoryOf(node.commitRepository) : undefined,
            };
        case 'CrossReferencedEvent': {
            const source = refOf(node.source);
            if (!source) {
                return { type: 'unknown', typename };
            }
            return {
                type: 'cross_referenced',
                source,
                crossRepository: readBoolean(node, 'isCrossRepository')
                    ? repositoryOf(readPath(node, 'source', 'repository'))
                    : undefined,
            };
        }
        case 'ConnectedEvent': {
            const source = refOf(node.source);
            return source ? { type: 'connected', source } : { type: 'unknown', typename };
        }
        case 'LockedEvent': {
            const reason = readOptionalString(node, 'lockReason');
            return { type: 'locked', reason: reason === undefined ? undefined : LOCK_REASONS[reason] ?? LockReason.OTHER };
        }
        case 'UnlockedEvent':
            return { type: 'unlocked' };
        case 'MilestonedEvent':
            return { type: 'milestoned', title: text(node.milestoneTitle) };
        case 'PinnedEvent':
            return { type: 'pinned' };
        case 'UnpinnedEvent':
            return { type: 'unpinned' };
        case 'MarkedAsDuplicateEvent':
            return { type: 'marked_as_duplicate', original: refOf(node.canonical) };
        case 'UnmarkedAsDuplicateEvent':
            return { type: 'unmarked_as_duplicate' };
        case 'ConvertToDraftEvent':
            return { type: 'converted_to_draft' };
        case 'ReadyForReviewEvent':
            return { type: 'ready_for_review' };
        case 'HeadRefDeletedEvent':
            return { type: 'head_ref_deleted', branch: text(node.headRefName) };
        case 'HeadRefForcePushedEvent':
            return {
                type: 'head_ref_force_pushed',
                beforeOid: text(readPath(node, 'beforeCommit', 'abbreviatedOid')),
                afterOid: text(readPath(node, 'afterCommit', 'abbreviatedOid')),
            };
        case 'SubscribedEvent':
            return { type: 'subscribed' };
        case 'MentionedEvent':
            return { type: 'mentioned' };
        default:
            return { type: 'unknown', typename };
    }
}

// Comment-like nodes name their user `author`; events use `actor`
const AUTHORED = new Set(['IssueComment', 'PullRequestReview']);
const ANONYMOUS = new Set(['subscribed', 'mentioned', 'unknown']);

/**
 * Convert one `timelineItems` node into a timeline event
 */
export function toTimelineEvent(node: JsonObject): TimelineEvent {
    const typename = readOptionalString(node, '__typename') ?? 'Unknown';
    const kind = kindOf(node, typename);
    if (ANONYMOUS.has(kind.type)) {
        return { kind };
    }

    if (typename === 'PullRequestCommit') {
        return {
            kind,
            actor: text(readPath(node, 'commit', 'author', 'user', 'login')) || undefined,
            createdAt: text(readPath(node, 'commit', 'committedDate')) || undefined,
        };
    }

    return {
        kind,
        actor: readLogin(node, AUTHORED.has(typename) ? 'author' : 'actor') || undefined,
        createdAt: readOptionalString(node, 'createdAt'),
    };
}
