import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { authHeaders } from '@inboxterm/auth';
import { AuthenticationError, FetchError, RateLimitError } from '@inboxterm/model';
import type { NotificationStub } from '@inboxterm/model';
import { trackRemoteRequest } from '../metrics';
import { MalformedPayloadError, isRecord, parseStub } from './wire';

export interface NotificationPage {
    stubs: NotificationStub[];
    /** Total number of pages, known from the first page's Link header */
    pageCount: number;
}

/**
 * Authenticated handle to the remote service. Constructed once and passed to
 * every pipeline component; tests substitute a fake.
 */
export interface RemoteGateway {
    listNotifications(page: number, perPage: number): Promise<NotificationPage>;
    /** GET an absolute REST url and return its JSON body */
    getResource(url: string): Promise<unknown>;
    /** POST a GraphQL query and return its `data` field */
    graphql(query: string, variables: Record<string, unknown>): Promise<unknown>;
    markThreadRead(threadId: string): Promise<void>;
}

export interface GatewayOptions {
    baseUrl: string;
    token: string;
    timeoutMs: number;
    /** Replaces the HTTP transport; used to serve responses in-process */
    adapter?: AxiosAdapter;
}

function headerValue(headers: unknown, name: string): string | undefined {
    if (!isRecord(headers)) {
        return undefined;
    }
    const value = headers[name];
    if (typeof value === 'string') {
        return value;
    }
    return typeof value === 'number' ? String(value) : undefined;
}

/**
 * Page number of the rel="last" entry in a Link header
 */
export function lastPageFromLink(link: string | undefined): number | undefined {
    if (!link) {
        return undefined;
    }
    for (const part of link.split(',')) {
        const match = /<([^>]+)>\s*;\s*rel="last"/.exec(part);
        if (match) {
            const page = /[?&]page=(\d+)/.exec(match[1]);
            return page ? Number(page[1]) : undefined;
        }
    }
    return undefined;
}

function messageOf(data: unknown): string | undefined {
    if (isRecord(data) && typeof data.message === 'string') {
        return data.message;
    }
    return undefined;
}

/**
 * Map a failed axios call onto the pipeline error taxonomy
 */
export function toPipelineError(error: unknown): Error {
    if (!axios.isAxiosError(error)) {
        return error instanceof Error ? error : new Error(String(error));
    }

    const url = error.config?.url;
    const response = error.response;
    if (!response) {
        // Network error or timeout
        return new FetchError(error.message, undefined, url, { cause: error });
    }

    const status = response.status;
    const message = messageOf(response.data) ?? error.message;

    if (status === 401) {
        return new AuthenticationError(message, { cause: error });
    }

    if (status === 403 || status === 429) {
        const remaining = headerValue(response.headers, 'x-ratelimit-remaining');
        if (remaining === '0' || /rate limit/i.test(message)) {
            const reset = headerValue(response.headers, 'x-ratelimit-reset');
            const resetAt = reset ? new Date(Number(reset) * 1000) : undefined;
            return new RateLimitError(message, resetAt, { cause: error });
        }
    }

    return new FetchError(message, status, url, { cause: error });
}

function graphqlErrors(body: unknown): Error | undefined {
    if (!isRecord(body) || !Array.isArray(body.errors) || body.errors.length === 0) {
        return undefined;
    }
    const errors = body.errors.filter(isRecord);
    const message = errors.map(e => (typeof e.message === 'string' ? e.message : 'unknown error')).join('; ');
    if (errors.some(e => e.type === 'RATE_LIMITED')) {
        return new RateLimitError(message);
    }
    return new FetchError(message, undefined, '/graphql');
}

/**
 * Remote gateway backed by a single configured axios instance
 */
export class GitHubGateway implements RemoteGateway {
    private http: AxiosInstance;

    constructor(options: GatewayOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: {
                ...authHeaders(options.token),
                Accept: 'application/vnd.github+json',
                'X-GitHub-Api-Version': '2022-11-28',
            },
        });

        // Translate every failure before it reaches the pipeline
        this.http.interceptors.response.use(
            response => response,
            (error: unknown) => Promise.reject(toPipelineError(error)),
        );
    }

    async listNotifications(page: number, perPage: number): Promise<NotificationPage> {
        const response = await this.track('list_notifications', this.http.get<unknown>('/notifications', {
            params: { page, per_page: perPage },
        }));

        if (!Array.isArray(response.data)) {
            throw new FetchError('Malformed notification page', response.status, '/notifications');
        }

        let stubs: NotificationStub[];
        try {
            stubs = response.data.map(parseStub);
        } catch (error) {
            if (error instanceof MalformedPayloadError) {
                throw new FetchError(`Malformed notification page: ${error.message}`, response.status, '/notifications', { cause: error });
            }
            throw error;
        }

        return {
            stubs,
            pageCount: lastPageFromLink(headerValue(response.headers, 'link')) ?? page,
        };
    }

    async getResource(url: string): Promise<unknown> {
        const response = await this.track('get_resource', this.http.get<unknown>(url));
        return response.data;
    }

    async graphql(query: string, variables: Record<string, unknown>): Promise<unknown> {
        const response = await this.track('graphql', this.http.post<unknown>('/graphql', { query, variables }));
        const failure = graphqlErrors(response.data);
        if (failure) {
            trackRemoteRequest('graphql_errors', false);
            throw failure;
        }
        return isRecord(response.data) ? response.data.data ?? null : null;
    }

    async markThreadRead(threadId: string): Promise<void> {
        await this.track('mark_thread_read', this.http.patch(`/notifications/threads/${encodeURIComponent(threadId)}`));
    }

    private async track<T>(operation: string, request: Promise<T>): Promise<T> {
        try {
            const result = await request;
            trackRemoteRequest(operation, true);
            return result;
        } catch (error) {
            trackRemoteRequest(operation, false);
            throw error;
        }
    }
}
