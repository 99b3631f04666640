#!/usr/bin/env tsx
import { createInterface } from 'readline';
import { redactToken, resolveCredential } from '@inboxterm/auth';
import { RequestType, describeError } from '@inboxterm/model';
import { createInboxApp } from './app';
import { loadConfig } from './config';
import { GitHubGateway } from './gateway/client';
import { InboxShell } from './shell';

async function main(): Promise<void> {
    const config = loadConfig();
    const credential = resolveCredential();
    console.log(`Using token ${redactToken(credential.token)} from ${credential.source}`);

    const gateway = new GitHubGateway({
        baseUrl: config.apiBaseUrl,
        token: credential.token,
        timeoutMs: config.requestTimeoutMs,
    });
    const app = createInboxApp(config, gateway);
    const shell = new InboxShell(app);

    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'inbox> ' });
    app.worker.on('busy', busy => {
        rl.setPrompt(busy ? 'inbox (loading)> ' : 'inbox> ');
        if (!busy) rl.prompt();
    });

    app.worker.submit({ type: RequestType.REFRESH });
    rl.prompt();

    for await (const line of rl) {
        let keepGoing = true;
        try {
            keepGoing = await shell.execute(line);
        } catch (error) {
            console.error('Error running command:', error);
        }
        if (!keepGoing) break;
        rl.prompt();
    }
    rl.close();
}

main().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
});
