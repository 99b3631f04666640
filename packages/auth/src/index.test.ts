import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import { AuthenticationError } from '@inboxterm/model';
import { authHeaders, redactToken, resolveCredential } from './index';

// Mock fs module so token files never touch the disk
vi.mock('fs', () => ({
    default: {
        readFileSync: vi.fn((path: string) => {
            if (path.endsWith('token.txt')) {
                return '\n  test-file-token  \nsecond line\n';
            }
            if (path.endsWith('empty.txt')) {
                return '\n\n';
            }
            throw new Error(`Unexpected path: ${path}`);
        }),
    },
}));

describe('resolveCredential', () => {
    const saved = { ...process.env };

    beforeEach(() => {
        delete process.env.GITHUB_TOKEN;
        delete process.env.GH_TOKEN;
        delete process.env.INBOXTERM_TOKEN_PATH;
    });

    afterEach(() => {
        process.env = { ...saved };
        vi.clearAllMocks();
    });

    it('prefers an explicitly configured token', () => {
        process.env.GITHUB_TOKEN = 'test-env-token';
        expect(resolveCredential({ token: ' test-token ' })).toEqual({ token: 'test-token', source: 'config' });
    });

    it('reads the first matching environment variable', () => {
        process.env.GH_TOKEN = 'test-gh-token';
        expect(resolveCredential()).toEqual({ token: 'test-gh-token', source: 'env' });

        process.env.GITHUB_TOKEN = 'test-github-token';
        expect(resolveCredential()).toEqual({ token: 'test-github-token', source: 'env' });
    });

    it('falls back to the token file', () => {
        process.env.INBOXTERM_TOKEN_PATH = '/secrets/token.txt';
        expect(resolveCredential()).toEqual({ token: 'test-file-token', source: 'file' });
        expect(fs.readFileSync).toHaveBeenCalledWith(expect.stringContaining('token.txt'), 'utf-8');
    });

    it('rejects an empty token file', () => {
        expect(() => resolveCredential({ tokenPath: '/secrets/empty.txt' })).toThrow(AuthenticationError);
    });

    it('wraps unreadable token files', () => {
        expect(() => resolveCredential({ tokenPath: '/secrets/missing.key' })).toThrow(
            'Could not read token file /secrets/missing.key',
        );
    });

    it('throws an authentication error when nothing is configured', () => {
        expect(() => resolveCredential()).toThrow('No token found; set GITHUB_TOKEN or GH_TOKEN');
    });
});

describe('auth helpers', () => {
    it('builds a bearer header', () => {
        expect(authHeaders('test-token')).toEqual({ Authorization: 'Bearer test-token' });
    });

    it('redacts tokens', () => {
        expect(redactToken('short')).toBe('****');
        expect(redactToken('test-secret-1234')).toBe('****1234');
    });
});
