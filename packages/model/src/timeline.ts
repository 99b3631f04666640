import type { DiscussionMeta, IssueMeta, PullRequestMeta } from './notifications';

/**
 * Repository reference inside a timeline event (cross-repository references only)
 */
export interface TimelineRepository {
    owner: string;
    name: string;
}

/**
 * Issue or pull request referenced from a timeline event
 */
export interface IssueOrPullRequestRef {
    kind: 'issue' | 'pull_request';
    number: number;
    title: string;
}

export enum LockReason {
    OFF_TOPIC = 'off_topic',
    RESOLVED = 'resolved',
    SPAM = 'spam',
    TOO_HEATED = 'too_heated',
    OTHER = 'other',
}

export enum ReviewState {
    APPROVED = 'approved',
    CHANGES_REQUESTED = 'changes_requested',
    COMMENTED = 'commented',
    DISMISSED = 'dismissed',
    PENDING = 'pending',
    OTHER = 'other',
}

/**
 * What closed an issue or pull request: a commit (abbreviated oid) or a pull request number
 */
export type Closer = { commit: string } | { pullRequest: number };

export type TimelineEventKind =
    | { type: 'commented'; body: string }
    | { type: 'closed'; closer?: Closer }
    | { type: 'reopened' }
    | { type: 'merged'; baseBranch: string }
    | { type: 'labeled'; label: string }
    | { type: 'unlabeled'; label: string }
    | { type: 'assigned'; assignee: string }
    | { type: 'unassigned'; assignee: string }
    | { type: 'renamed'; from: string; to: string }
    | { type: 'reviewed'; state: ReviewState; body?: string }
    | { type: 'review_requested'; reviewer: string }
    | { type: 'committed'; headline: string; abbreviatedOid: string }
    | { type: 'referenced'; commitHeadline: string; crossRepository?: TimelineRepository }
    | { type: 'cross_referenced'; source: IssueOrPullRequestRef; crossRepository?: TimelineRepository }
    | { type: 'connected'; source: IssueOrPullRequestRef }
    | { type: 'locked'; reason?: LockReason }
    | { type: 'unlocked' }
    | { type: 'milestoned'; title: string }
    | { type: 'pinned' }
    | { type: 'unpinned' }
    | { type: 'marked_as_duplicate'; original?: IssueOrPullRequestRef }
    | { type: 'unmarked_as_duplicate' }
    | { type: 'converted_to_draft' }
    | { type: 'ready_for_review' }
    | { type: 'head_ref_deleted'; branch: string }
    | { type: 'head_ref_force_pushed'; beforeOid: string; afterOid: string }
    | { type: 'subscribed' }
    | { type: 'mentioned' }
    | { type: 'unknown'; typename: string };

/**
 * One entry of an issue or pull request timeline. Anonymous events
 * (subscribed, mentioned, unknown) carry no actor or timestamp.
 */
export interface TimelineEvent {
    kind: TimelineEventKind;
    actor?: string;
    createdAt?: string;
}

export interface Issue {
    meta: IssueMeta;
    events: TimelineEvent[];
}

export interface PullRequest {
    meta: PullRequestMeta;
    events: TimelineEvent[];
}

export interface DiscussionReply {
    author: string;
    body: string;
    createdAt: string;
}

export interface DiscussionAnswer {
    author: string;
    isAnswer: boolean;
    upvotes: number;
    body: string;
    createdAt: string;
    replies: DiscussionReply[];
}

export interface Discussion {
    meta: DiscussionMeta;
    author: string;
    upvotes: number;
    body: string;
    createdAt: string;
    suggestedAnswers: DiscussionAnswer[];
}
