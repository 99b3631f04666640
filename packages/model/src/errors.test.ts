import { describe, it, expect } from 'vitest';
import {
    AuthenticationError,
    ErrorCode,
    FetchError,
    HydrationError,
    RateLimitError,
    ResolveError,
    TaskAggregationError,
    describeError,
    isPipelineError,
} from './errors';

describe('pipeline errors', () => {
    it('carries a code and the concrete class name', () => {
        const error = new FetchError('Not Found', 404, 'https://api.test/notifications/threads/42');
        expect(error.code).toBe(ErrorCode.FETCH);
        expect(error.name).toBe('FetchError');
        expect(error.status).toBe(404);
        expect(error.url).toBe('https://api.test/notifications/threads/42');
        expect(isPipelineError(error)).toBe(true);
        expect(isPipelineError(new Error('plain'))).toBe(false);
    });

    it('prefixes resolve errors with the stub id', () => {
        const error = new ResolveError('7', 'detail fetch failed');
        expect(error.message).toBe('notification 7: detail fetch failed');
        expect(error.stubId).toBe('7');
    });

    it('aggregates resolve failures into a hydration error', () => {
        const failures = [new ResolveError('1', 'boom'), new ResolveError('2', 'boom')];
        const error = new HydrationError(failures);
        expect(error.message).toBe('2 notification(s) failed to load');
        expect(error.failures).toBe(failures);
        expect(error.cause).toBe(failures[0]);
    });

    it('counts crashed tasks', () => {
        const error = new TaskAggregationError([new TypeError('x')]);
        expect(error.code).toBe(ErrorCode.TASK_AGGREGATION);
        expect(error.message).toBe('1 hydration task(s) crashed');
    });
});

describe('describeError', () => {
    it('renders a distinct rate limit message', () => {
        expect(describeError(new RateLimitError('API rate limit exceeded'))).toBe('Rate limited by the remote service');
        expect(describeError(new RateLimitError('API rate limit exceeded', new Date('2024-05-01T10:00:00Z')))).toBe(
            'Rate limited by the remote service until 2024-05-01T10:00:00.000Z',
        );
    });

    it('renders authentication and fetch errors', () => {
        expect(describeError(new AuthenticationError('Bad credentials'))).toBe('Authentication failed: Bad credentials');
        expect(describeError(new FetchError('Not Found', 404))).toBe('Request failed (404): Not Found');
        expect(describeError(new FetchError('socket hang up'))).toBe('Request failed: socket hang up');
    });

    it('falls back for unknown values', () => {
        expect(describeError(new Error('plain'))).toBe('plain');
        expect(describeError('nope')).toBe('An unexpected error occurred.');
    });
});
