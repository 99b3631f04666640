import { LRUCache } from 'lru-cache';
import { FetchError, NO_DESCRIPTION } from '@inboxterm/model';
import type {
    Discussion,
    DiscussionAnswer,
    DiscussionMeta,
    Issue,
    IssueMeta,
    PullRequest,
    PullRequestMeta,
    RepoMeta,
} from '@inboxterm/model';
import type { RemoteGateway } from '../gateway/client';
import { DISCUSSION_QUERY, ISSUE_TIMELINE_QUERY, PULL_REQUEST_TIMELINE_QUERY } from '../gateway/queries';
import { isRecord, readLogin, readNodes, readOptionalString, readPath } from '../gateway/wire';
import type { JsonObject } from '../gateway/wire';
import { toTimelineEvent } from './events';

function itemKey(repo: RepoMeta, number: number): string {
    return `${repo.owner}/${repo.name}#${number}`;
}

function upvotes(node: JsonObject): number {
    return typeof node.upvoteCount === 'number' ? node.upvoteCount : 0;
}

/**
 * Loads timelines and discussion threads on demand, when the user opens an item.
 * Results are kept in small LRU caches until the next refresh clears them.
 */
export class TimelineService {
    private issues: LRUCache<string, Issue>;
    private pullRequests: LRUCache<string, PullRequest>;
    private discussions: LRUCache<string, Discussion>;

    constructor(
        private gateway: RemoteGateway,
        cacheSize: number,
    ) {
        this.issues = new LRUCache<string, Issue>({ max: cacheSize });
        this.pullRequests = new LRUCache<string, PullRequest>({ max: cacheSize });
        this.discussions = new LRUCache<string, Discussion>({ max: cacheSize });
    }

    async issue(meta: IssueMeta): Promise<Issue> {
        const key = itemKey(meta.repo, meta.number);
        const cached = this.issues.get(key);
        if (cached) {
            return cached;
        }

        const issue = await this.query(ISSUE_TIMELINE_QUERY, meta.repo, meta.number, 'issue', key);
        const result: Issue = {
            meta,
            events: readNodes(readPath(issue, 'timelineItems', 'nodes')).map(toTimelineEvent),
        };
        this.issues.set(key, result);
        return result;
    }

    async pullRequest(meta: PullRequestMeta): Promise<PullRequest> {
        const key = itemKey(meta.repo, meta.number);
        const cached = this.pullRequests.get(key);
        if (cached) {
            return cached;
        }

        const pullRequest = await this.query(PULL_REQUEST_TIMELINE_QUERY, meta.repo, meta.number, 'pullRequest', key);
        const result: PullRequest = {
            meta,
            events: readNodes(readPath(pullRequest, 'timelineItems', 'nodes')).map(toTimelineEvent),
        };
        this.pullRequests.set(key, result);
        return result;
    }

    async discussion(meta: DiscussionMeta): Promise<Discussion> {
        const key = itemKey(meta.repo, meta.number);
        const cached = this.discussions.get(key);
        if (cached) {
            return cached;
        }

        const discussion = await this.query(DISCUSSION_QUERY, meta.repo, meta.number, 'discussion', key);
        const answerId = readPath(discussion, 'answer', 'id');

        const suggestedAnswers: DiscussionAnswer[] = readNodes(readPath(discussion, 'comments', 'nodes')).map(comment => ({
            author: readLogin(comment, 'author'),
            isAnswer: answerId !== undefined && answerId !== null && comment.id === answerId,
            upvotes: upvotes(comment),
            body: readOptionalString(comment, 'body') ?? '',
            createdAt: readOptionalString(comment, 'createdAt') ?? '',
            replies: readNodes(readPath(comment, 'replies', 'nodes')).map(reply => ({
                author: readLogin(reply, 'author'),
                body: readOptionalString(reply, 'body') ?? '',
                createdAt: readOptionalString(reply, 'createdAt') ?? '',
            })),
        }));

        const result: Discussion = {
            meta,
            author: readLogin(discussion, 'author'),
            upvotes: upvotes(discussion),
            body: readOptionalString(discussion, 'body') || NO_DESCRIPTION,
            createdAt: readOptionalString(discussion, 'createdAt') ?? '',
            suggestedAnswers,
        };
        this.discussions.set(key, result);
        return result;
    }

    /** Forget everything loaded so far */
    clear(): void {
        this.issues.clear();
        this.pullRequests.clear();
        this.discussions.clear();
    }

    private async query(document: string, repo: RepoMeta, number: number, field: string, key: string): Promise<JsonObject> {
        const data = await this.gateway.graphql(document, { owner: repo.owner, name: repo.name, number });
        const item = readPath(data, 'repository', field);
        if (!isRecord(item)) {
            throw new FetchError(`${key} was not found`, undefined, '/graphql');
        }
        return item;
    }
}
