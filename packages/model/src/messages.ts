import type { PipelineError } from './errors';
import type { DiscussionMeta, IssueMeta, Notification, PullRequestMeta } from './notifications';
import type { Discussion, Issue, PullRequest } from './timeline';

/**
 * Requests the UI submits to the pipeline worker
 */
export enum RequestType {
    REFRESH = 0x01,
    MARK_AS_READ = 0x02,
    RESOLVE_OPEN_URL = 0x03,
    MARK_MANY_AS_READ = 0x04,
    OPEN_ISSUE = 0x10,
    OPEN_PULL_REQUEST = 0x11,
    OPEN_DISCUSSION = 0x12,
}

/**
 * Responses the pipeline worker emits back to the UI
 */
export enum ResponseType {
    NOTIFICATIONS_REPLACED = 0x01,
    NOTIFICATION_REMOVED = 0x02,
    OPEN_URL_RESOLVED = 0x03,
    NOTIFICATIONS_REMOVED = 0x04,
    ISSUE_LOADED = 0x10,
    PULL_REQUEST_LOADED = 0x11,
    DISCUSSION_LOADED = 0x12,
    OPERATION_FAILED = 0xfe,
}

export interface RefreshRequest {
    type: RequestType.REFRESH;
}

export interface MarkAsReadRequest {
    type: RequestType.MARK_AS_READ;
    notificationId: string;
}

export interface ResolveOpenUrlRequest {
    type: RequestType.RESOLVE_OPEN_URL;
    notificationId: string;
}

export interface MarkManyAsReadRequest {
    type: RequestType.MARK_MANY_AS_READ;
    notificationIds: string[];
}

export interface OpenIssueRequest {
    type: RequestType.OPEN_ISSUE;
    issue: IssueMeta;
}

export interface OpenPullRequestRequest {
    type: RequestType.OPEN_PULL_REQUEST;
    pullRequest: PullRequestMeta;
}

export interface OpenDiscussionRequest {
    type: RequestType.OPEN_DISCUSSION;
    discussion: DiscussionMeta;
}

export type PipelineRequest =
    | RefreshRequest
    | MarkAsReadRequest
    | ResolveOpenUrlRequest
    | MarkManyAsReadRequest
    | OpenIssueRequest
    | OpenPullRequestRequest
    | OpenDiscussionRequest;

export interface NotificationsReplacedResponse {
    type: ResponseType.NOTIFICATIONS_REPLACED;
    requestId: string;
    notifications: readonly Notification[];
}

export interface NotificationRemovedResponse {
    type: ResponseType.NOTIFICATION_REMOVED;
    requestId: string;
    notificationId: string;
}

export interface OpenUrlResolvedResponse {
    type: ResponseType.OPEN_URL_RESOLVED;
    requestId: string;
    notificationId: string;
    url: string;
}

export interface NotificationsRemovedResponse {
    type: ResponseType.NOTIFICATIONS_REMOVED;
    requestId: string;
    notificationIds: string[];
}

export interface IssueLoadedResponse {
    type: ResponseType.ISSUE_LOADED;
    requestId: string;
    issue: Issue;
}

export interface PullRequestLoadedResponse {
    type: ResponseType.PULL_REQUEST_LOADED;
    requestId: string;
    pullRequest: PullRequest;
}

export interface DiscussionLoadedResponse {
    type: ResponseType.DISCUSSION_LOADED;
    requestId: string;
    discussion: Discussion;
}

export interface OperationFailedResponse {
    type: ResponseType.OPERATION_FAILED;
    requestId: string;
    request: PipelineRequest;
    error: PipelineError | Error;
}

export type PipelineResponse =
    | NotificationsReplacedResponse
    | NotificationRemovedResponse
    | OpenUrlResolvedResponse
    | NotificationsRemovedResponse
    | IssueLoadedResponse
    | PullRequestLoadedResponse
    | DiscussionLoadedResponse
    | OperationFailedResponse;
