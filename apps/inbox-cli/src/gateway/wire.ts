import type { NotificationStub } from '@inboxterm/model';

/**
 * Thrown by the readers below when a remote payload does not have the expected shape
 */
export class MalformedPayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedPayloadError';
    }
}

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, what: string): JsonObject {
    if (!isRecord(value)) {
        throw new MalformedPayloadError(`${what} is not an object`);
    }
    return value;
}

export function readString(obj: JsonObject, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string') {
        throw new MalformedPayloadError(`expected string at "${key}"`);
    }
    return value;
}

export function readOptionalString(obj: JsonObject, key: string): string | undefined {
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
}

export function readNumber(obj: JsonObject, key: string): number {
    const value = obj[key];
    if (typeof value !== 'number') {
        throw new MalformedPayloadError(`expected number at "${key}"`);
    }
    return value;
}

export function readBoolean(obj: JsonObject, key: string): boolean {
    return obj[key] === true;
}

/**
 * Login of a nested user object such as `user`, `author` or `actor`; empty when absent
 */
export function readLogin(obj: JsonObject, key: string): string {
    const user = obj[key];
    return isRecord(user) ? readOptionalString(user, 'login') ?? '' : '';
}

/**
 * Walk nested objects, e.g. readPath(data, 'repository', 'issue'); undefined as soon as a step is missing
 */
export function readPath(value: unknown, ...keys: string[]): unknown {
    let current = value;
    for (const key of keys) {
        if (!isRecord(current)) {
            return undefined;
        }
        current = current[key];
    }
    return current;
}

/**
 * Object elements of a GraphQL `nodes` list
 */
export function readNodes(value: unknown): JsonObject[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Convert one element of the notification list endpoint into a stub
 */
export function parseStub(raw: unknown): NotificationStub {
    const obj = asRecord(raw, 'notification');
    const subject = asRecord(obj.subject, 'notification subject');
    const repository = asRecord(obj.repository, 'notification repository');

    const id = obj.id;
    if (typeof id !== 'string' && typeof id !== 'number') {
        throw new MalformedPayloadError('expected notification id');
    }

    return {
        id: String(id),
        unread: readBoolean(obj, 'unread'),
        reason: readOptionalString(obj, 'reason') ?? '',
        subject: {
            type: readString(subject, 'type'),
            title: readString(subject, 'title'),
            detailUrl: readOptionalString(subject, 'url'),
            latestCommentUrl: readOptionalString(subject, 'latest_comment_url'),
        },
        repository: {
            owner: readLogin(repository, 'owner'),
            name: readString(repository, 'name'),
        },
        lastUpdatedAt: readString(obj, 'updated_at'),
        threadUrl: readOptionalString(obj, 'url') ?? '',
    };
}
