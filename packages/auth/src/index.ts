import fs from 'fs';
import path from 'path';
import { AuthenticationError } from '@inboxterm/model';

export interface AuthConfig {
    /** Personal access token; takes precedence over everything else */
    token?: string;
    /** File holding the token on its first line */
    tokenPath?: string;
    /** Environment variables checked in order when no token is configured */
    envVars: string[];
}

export interface Credential {
    token: string;
    source: 'config' | 'env' | 'file';
}

function defaultConfig(): AuthConfig {
    return {
        token: undefined,
        tokenPath: process.env.INBOXTERM_TOKEN_PATH,
        envVars: ['GITHUB_TOKEN', 'GH_TOKEN'],
    };
}

/**
 * Read the token file, keeping only the first non-empty line
 * @throws AuthenticationError if the file cannot be read or is empty
 */
function readTokenFile(tokenPath: string): string {
    let contents: string;
    try {
        contents = fs.readFileSync(path.resolve(tokenPath), 'utf-8').toString();
    } catch (error) {
        throw new AuthenticationError(`Could not read token file ${tokenPath}`, { cause: error });
    }

    const token = contents.split('\n').map(line => line.trim()).find(line => line.length > 0);
    if (!token) {
        throw new AuthenticationError(`Token file ${tokenPath} is empty`);
    }
    return token;
}

/**
 * Resolve the credential used for every remote call
 * @param configOverride - optional config override
 * @throws AuthenticationError when no token can be found
 */
export function resolveCredential(configOverride?: Partial<AuthConfig>): Credential {
    const config = { ...defaultConfig(), ...configOverride };

    if (config.token?.trim()) {
        return { token: config.token.trim(), source: 'config' };
    }

    for (const name of config.envVars) {
        const value = process.env[name]?.trim();
        if (value) {
            return { token: value, source: 'env' };
        }
    }

    if (config.tokenPath) {
        return { token: readTokenFile(config.tokenPath), source: 'file' };
    }

    throw new AuthenticationError(`No token found; set ${config.envVars.join(' or ')}`);
}

/**
 * Headers that authenticate a request with the given token
 */
export function authHeaders(token: string): Record<string, string> {
    return { Authorization: `Bearer ${token}` };
}

/**
 * Mask a token for log output, keeping the last four characters
 */
export function redactToken(token: string): string {
    if (token.length <= 8) {
        return '****';
    }
    return `****${token.slice(-4)}`;
}
