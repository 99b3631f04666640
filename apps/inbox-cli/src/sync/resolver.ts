import {
    AuthenticationError,
    DiscussionState,
    FetchError,
    IssueClosedReason,
    IssueState,
    NO_DESCRIPTION,
    PullRequestState,
    RateLimitError,
    ResolveError,
    TargetKind,
    UNKNOWN_TARGET,
} from '@inboxterm/model';
import type {
    DiscussionMeta,
    IssueMeta,
    NotificationStub,
    NotificationTarget,
    PullRequestMeta,
    ReleaseMeta,
    RepoMeta,
} from '@inboxterm/model';
import type { RemoteGateway } from '../gateway/client';
import { DISCUSSION_SEARCH_QUERY } from '../gateway/queries';
import { isRecord, readBoolean, readLogin, readOptionalString } from '../gateway/wire';
import type { JsonObject } from '../gateway/wire';

/**
 * Subject type tags the resolver knows how to hydrate
 */
export enum SubjectKind {
    ISSUE = 'Issue',
    PULL_REQUEST = 'PullRequest',
    RELEASE = 'Release',
    DISCUSSION = 'Discussion',
    CHECK_SUITE = 'CheckSuite',
    UNKNOWN = 'Unknown',
}

const KNOWN_SUBJECTS: ReadonlyMap<string, SubjectKind> = new Map([
    ['Issue', SubjectKind.ISSUE],
    ['PullRequest', SubjectKind.PULL_REQUEST],
    ['Release', SubjectKind.RELEASE],
    ['Discussion', SubjectKind.DISCUSSION],
    ['CheckSuite', SubjectKind.CHECK_SUITE],
]);

/**
 * Map a raw subject type onto a known kind. Case-sensitive; anything unrecognised is UNKNOWN.
 */
export function classify(type: string): SubjectKind {
    return KNOWN_SUBJECTS.get(type) ?? SubjectKind.UNKNOWN;
}

function optionalNumber(obj: JsonObject, key: string): number | undefined {
    const value = obj[key];
    return typeof value === 'number' ? value : undefined;
}

// Trailing path segment of a REST url, e.g. .../issues/42 -> 42
function numberFromUrl(url: string): number {
    const match = /\/(\d+)\/?$/.exec(url);
    return match ? Number(match[1]) : 0;
}

function bodyOf(obj: JsonObject): string {
    return readOptionalString(obj, 'body') ?? NO_DESCRIPTION;
}

export function issueMetaFrom(detail: JsonObject, stub: NotificationStub, url: string): IssueMeta {
    const closed = readOptionalString(detail, 'closed_at') !== undefined;
    const meta: IssueMeta = {
        repo: stub.repository,
        number: optionalNumber(detail, 'number') ?? numberFromUrl(url),
        title: readOptionalString(detail, 'title') ?? stub.subject.title,
        body: bodyOf(detail),
        author: readLogin(detail, 'user'),
        state: closed ? IssueState.CLOSED : IssueState.OPEN,
        createdAt: readOptionalString(detail, 'created_at') ?? '',
        htmlUrl: readOptionalString(detail, 'html_url') ?? '',
    };
    if (closed) {
        meta.closedReason = readOptionalString(detail, 'state_reason') === 'completed'
            ? IssueClosedReason.COMPLETED
            : IssueClosedReason.NOT_PLANNED;
    }
    return meta;
}

export function pullRequestMetaFrom(detail: JsonObject, stub: NotificationStub, url: string): PullRequestMeta {
    let state = PullRequestState.OPEN;
    if (readOptionalString(detail, 'merged_at') !== undefined) {
        state = PullRequestState.MERGED;
    } else if (readOptionalString(detail, 'closed_at') !== undefined) {
        state = PullRequestState.CLOSED;
    }

    return {
        repo: stub.repository,
        number: optionalNumber(detail, 'number') ?? numberFromUrl(url),
        title: readOptionalString(detail, 'title') ?? stub.subject.title,
        body: bodyOf(detail),
        author: readLogin(detail, 'user'),
        state,
        draft: readBoolean(detail, 'draft'),
        createdAt: readOptionalString(detail, 'created_at') ?? '',
        htmlUrl: readOptionalString(detail, 'html_url') ?? '',
    };
}

export function releaseMetaFrom(detail: JsonObject, stub: NotificationStub): ReleaseMeta {
    const tagName = readOptionalString(detail, 'tag_name') ?? '';
    const name = readOptionalString(detail, 'name');
    return {
        repo: stub.repository,
        title: name ? name : tagName || stub.subject.title,
        body: bodyOf(detail),
        author: readLogin(detail, 'author'),
        tagName,
        htmlUrl: readOptionalString(detail, 'html_url') ?? '',
    };
}

/**
 * Search string locating a discussion by repository and exact title
 */
export function discussionSearchString(repo: RepoMeta, title: string): string {
    // Search syntax has no escape for double quotes inside a phrase
    return `repo:${repo.owner}/${repo.name} in:title "${title.replace(/"/g, ' ')}"`;
}

function searchNodes(data: unknown): JsonObject[] {
    if (!isRecord(data) || !isRecord(data.search) || !Array.isArray(data.search.edges)) {
        return [];
    }
    return data.search.edges
        .filter(isRecord)
        .map(edge => edge.node)
        .filter(isRecord);
}

/**
 * Turns notification stubs into typed targets, issuing whatever secondary lookup each subject kind needs
 */
export class TargetResolver {
    constructor(private gateway: RemoteGateway) {}

    /**
     * Resolve a single stub.
     * Detail fetch failures for issues, pull requests and releases reject with ResolveError;
     * discussion lookups degrade to an Unknown target instead.
     */
    public async resolve(stub: NotificationStub): Promise<NotificationTarget> {
        const kind = classify(stub.subject.type);
        switch (kind) {
            case SubjectKind.ISSUE: {
                const found = await this.fetchDetail(stub);
                return found ? { kind: TargetKind.ISSUE, issue: issueMetaFrom(found.detail, stub, found.url) } : UNKNOWN_TARGET;
            }
            case SubjectKind.PULL_REQUEST: {
                const found = await this.fetchDetail(stub);
                return found
                    ? { kind: TargetKind.PULL_REQUEST, pullRequest: pullRequestMetaFrom(found.detail, stub, found.url) }
                    : UNKNOWN_TARGET;
            }
            case SubjectKind.RELEASE: {
                const found = await this.fetchDetail(stub);
                return found ? { kind: TargetKind.RELEASE, release: releaseMetaFrom(found.detail, stub) } : UNKNOWN_TARGET;
            }
            case SubjectKind.DISCUSSION:
                return this.resolveDiscussion(stub);
            case SubjectKind.CHECK_SUITE:
                return { kind: TargetKind.CI_BUILD };
            case SubjectKind.UNKNOWN:
                return UNKNOWN_TARGET;
        }
    }

    private async fetchDetail(stub: NotificationStub): Promise<{ detail: JsonObject; url: string } | undefined> {
        const url = stub.subject.detailUrl;
        if (!url) {
            return undefined;
        }

        let detail: unknown;
        try {
            detail = await this.gateway.getResource(url);
        } catch (error) {
            throw this.wrapFailure(stub, error);
        }

        if (!isRecord(detail)) {
            throw new ResolveError(stub.id, `unexpected detail payload from ${url}`);
        }
        return { detail, url };
    }

    private async resolveDiscussion(stub: NotificationStub): Promise<NotificationTarget> {
        let data: unknown;
        try {
            data = await this.gateway.graphql(DISCUSSION_SEARCH_QUERY, {
                search: discussionSearchString(stub.repository, stub.subject.title),
            });
        } catch (error) {
            if (error instanceof FetchError) {
                console.warn(`Discussion search failed for notification ${stub.id}: ${error.message}`);
                return UNKNOWN_TARGET;
            }
            throw error;
        }

        const matches = searchNodes(data).filter(node => node.title === stub.subject.title);
        if (matches.length !== 1) {
            return UNKNOWN_TARGET;
        }

        const node = matches[0];
        const discussion: DiscussionMeta = {
            repo: stub.repository,
            number: optionalNumber(node, 'number') ?? 0,
            title: stub.subject.title,
            body: readOptionalString(node, 'bodyText') ?? NO_DESCRIPTION,
            author: readLogin(node, 'author'),
            state: readBoolean(node, 'isAnswered') ? DiscussionState.ANSWERED : DiscussionState.UNANSWERED,
            htmlUrl: readOptionalString(node, 'url') ?? '',
        };
        return { kind: TargetKind.DISCUSSION, discussion };
    }

    // Session-level errors pass through untouched so the UI can tell them apart
    private wrapFailure(stub: NotificationStub, error: unknown): unknown {
        if (error instanceof AuthenticationError || error instanceof RateLimitError) {
            return error;
        }
        if (error instanceof FetchError) {
            return new ResolveError(stub.id, error.message, { cause: error });
        }
        return error;
    }
}
