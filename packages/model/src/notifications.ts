/**
 * Repository a notification belongs to
 */
export interface RepoMeta {
    owner: string;
    name: string;
}

/**
 * Subject of a notification thread as returned by the list endpoint
 */
export interface NotificationSubject {
    /** Raw subject type tag, e.g. "Issue", "PullRequest", "CheckSuite" */
    type: string;
    title: string;
    /** REST url of the subject; absent for discussions and CI builds */
    detailUrl?: string;
    latestCommentUrl?: string;
}

/**
 * Unhydrated notification record. Immutable once fetched.
 */
export interface NotificationStub {
    id: string;
    unread: boolean;
    reason: string;
    subject: NotificationSubject;
    repository: RepoMeta;
    lastUpdatedAt: string; // ISO timestamp
    threadUrl: string;
}

export const NO_DESCRIPTION = 'No description provided.';

export enum IssueState {
    OPEN = 'open',
    CLOSED = 'closed',
}

export enum IssueClosedReason {
    COMPLETED = 'completed',
    NOT_PLANNED = 'not_planned',
}

export enum PullRequestState {
    OPEN = 'open',
    CLOSED = 'closed',
    MERGED = 'merged',
}

export enum DiscussionState {
    ANSWERED = 'answered',
    UNANSWERED = 'unanswered',
}

export interface IssueMeta {
    repo: RepoMeta;
    number: number;
    title: string;
    body: string;
    author: string;
    state: IssueState;
    closedReason?: IssueClosedReason;
    createdAt: string;
    htmlUrl: string;
}

export interface PullRequestMeta {
    repo: RepoMeta;
    number: number;
    title: string;
    body: string;
    author: string;
    state: PullRequestState;
    draft: boolean;
    createdAt: string;
    htmlUrl: string;
}

export interface ReleaseMeta {
    repo: RepoMeta;
    title: string;
    body: string;
    author: string;
    tagName: string;
    htmlUrl: string;
}

export interface DiscussionMeta {
    repo: RepoMeta;
    number: number;
    title: string;
    body: string;
    author: string;
    state: DiscussionState;
    htmlUrl: string;
}

export enum TargetKind {
    ISSUE = 'issue',
    PULL_REQUEST = 'pull_request',
    RELEASE = 'release',
    DISCUSSION = 'discussion',
    CI_BUILD = 'ci_build',
    UNKNOWN = 'unknown',
}

export type NotificationTarget =
    | { kind: TargetKind.ISSUE; issue: IssueMeta }
    | { kind: TargetKind.PULL_REQUEST; pullRequest: PullRequestMeta }
    | { kind: TargetKind.RELEASE; release: ReleaseMeta }
    | { kind: TargetKind.DISCUSSION; discussion: DiscussionMeta }
    | { kind: TargetKind.CI_BUILD }
    | { kind: TargetKind.UNKNOWN };

/**
 * Hydrated notification. Identity is `stub.id`.
 */
export interface Notification {
    stub: NotificationStub;
    target: NotificationTarget;
}

export const UNKNOWN_TARGET: NotificationTarget = Object.freeze({ kind: TargetKind.UNKNOWN });

/**
 * Compare two notifications by thread id only; target payloads can differ between syncs.
 */
export function sameNotification(a: Notification, b: Notification): boolean {
    return a.stub.id === b.stub.id;
}

/**
 * Issue, pull request or discussion number of a target, if it has one
 */
export function targetNumber(target: NotificationTarget): number | undefined {
    switch (target.kind) {
        case TargetKind.ISSUE:
            return target.issue.number;
        case TargetKind.PULL_REQUEST:
            return target.pullRequest.number;
        case TargetKind.DISCUSSION:
            return target.discussion.number;
        default:
            return undefined;
    }
}

/**
 * Short state label used in list output, e.g. "open" or "merged"
 */
export function targetState(target: NotificationTarget): string | undefined {
    switch (target.kind) {
        case TargetKind.ISSUE:
            return target.issue.state;
        case TargetKind.PULL_REQUEST:
            return target.pullRequest.state;
        case TargetKind.DISCUSSION:
            return target.discussion.state;
        default:
            return undefined;
    }
}
