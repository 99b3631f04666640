import { RequestType, ResponseType, TargetKind, describeError } from '@inboxterm/model';
import type { Discussion, PipelineResponse, TimelineEvent } from '@inboxterm/model';
import type { InboxApp } from './app';
import { UsageError, filterNotifications, formatEvent, formatNotification, parseIndices } from './commands';
import { register } from './metrics';

export const HELP = [
    'refresh               reload the inbox',
    'list [filters]        show notifications, e.g. "list pr open"',
    'count [filters]       count notifications',
    'open <n>              print the browser url of a notification',
    'done <n...>           mark notifications as read',
    'show <n>              load the timeline of an issue, pull request or discussion',
    'metrics               print collected metrics',
    'quit                  exit',
].join('\n');

type Print = (line: string) => void;

/**
 * Line-oriented front end over the pipeline worker.
 * Reads come straight from the cache snapshot; everything touching the
 * remote service is submitted to the worker and printed when it responds.
 */
export class InboxShell {
    constructor(
        private app: InboxApp,
        private print: Print = line => console.log(line),
    ) {
        app.worker.on('response', response => this.render(response));
    }

    /**
     * Run one command line
     * @returns false once the user asked to quit
     */
    async execute(line: string): Promise<boolean> {
        const [command, ...args] = line.trim().split(/\s+/);
        try {
            switch (command) {
                case '':
                    break;
                case 'refresh':
                    this.app.worker.submit({ type: RequestType.REFRESH });
                    break;
                case 'list':
                    this.list(args);
                    break;
                case 'count':
                    this.print(String(filterNotifications(this.app.cache.snapshot(), args).length));
                    break;
                case 'open':
                    this.app.worker.submit({ type: RequestType.RESOLVE_OPEN_URL, notificationId: this.idsAt(args)[0] });
                    break;
                case 'done':
                    this.done(args);
                    break;
                case 'show':
                    this.show(args);
                    break;
                case 'metrics':
                    this.print(await register.metrics());
                    break;
                case 'help':
                    this.print(HELP);
                    break;
                case 'quit':
                case 'exit':
                    await this.app.worker.whenIdle();
                    return false;
                default:
                    this.print(`Unknown command "${command}"; try "help"`);
            }
        } catch (error) {
            if (!(error instanceof UsageError)) {
                throw error;
            }
            this.print(error.message);
        }
        return true;
    }

    private list(args: string[]): void {
        const snapshot = this.app.cache.snapshot();
        const indices = filterNotifications(snapshot, args);
        if (indices.length === 0) {
            this.print('No notifications');
            return;
        }
        for (const index of indices) {
            this.print(formatNotification(index, snapshot[index]));
        }
    }

    private idsAt(args: string[]): string[] {
        const snapshot = this.app.cache.snapshot();
        return parseIndices(args, snapshot.length).map(index => snapshot[index].stub.id);
    }

    private done(args: string[]): void {
        const ids = [...new Set(this.idsAt(args))];
        if (ids.length === 1) {
            this.app.worker.submit({ type: RequestType.MARK_AS_READ, notificationId: ids[0] });
        } else {
            this.app.worker.submit({ type: RequestType.MARK_MANY_AS_READ, notificationIds: ids });
        }
    }

    private show(args: string[]): void {
        const [index] = parseIndices(args.slice(0, 1), this.app.cache.size);
        const notification = this.app.cache.get(index);
        if (!notification) {
            return;
        }

        const target = notification.target;
        switch (target.kind) {
            case TargetKind.ISSUE:
                this.app.worker.submit({ type: RequestType.OPEN_ISSUE, issue: target.issue });
                break;
            case TargetKind.PULL_REQUEST:
                this.app.worker.submit({ type: RequestType.OPEN_PULL_REQUEST, pullRequest: target.pullRequest });
                break;
            case TargetKind.DISCUSSION:
                this.app.worker.submit({ type: RequestType.OPEN_DISCUSSION, discussion: target.discussion });
                break;
            case TargetKind.RELEASE:
                this.print(`${target.release.title} (${target.release.tagName})`);
                this.print(target.release.body);
                break;
            default:
                this.print(formatNotification(index, notification));
        }
    }

    private render(response: PipelineResponse): void {
        switch (response.type) {
            case ResponseType.NOTIFICATIONS_REPLACED:
                this.print(`${response.notifications.length} notification(s)`);
                response.notifications.forEach((notification, index) => this.print(formatNotification(index, notification)));
                break;
            case ResponseType.NOTIFICATION_REMOVED:
                this.print(`Marked ${response.notificationId} as read`);
                break;
            case ResponseType.NOTIFICATIONS_REMOVED:
                this.print(`Marked ${response.notificationIds.length} notification(s) as read`);
                break;
            case ResponseType.OPEN_URL_RESOLVED:
                this.print(response.url);
                break;
            case ResponseType.ISSUE_LOADED: {
                const { meta, events } = response.issue;
                this.printThread(`#${meta.number} ${meta.title} [${meta.state}]`, meta.author, meta.body, events);
                break;
            }
            case ResponseType.PULL_REQUEST_LOADED: {
                const { meta, events } = response.pullRequest;
                const state = meta.draft ? `${meta.state}, draft` : meta.state;
                this.printThread(`#${meta.number} ${meta.title} [${state}]`, meta.author, meta.body, events);
                break;
            }
            case ResponseType.DISCUSSION_LOADED:
                this.printDiscussion(response.discussion);
                break;
            case ResponseType.OPERATION_FAILED:
                this.print(`Error: ${describeError(response.error)}`);
                break;
        }
    }

    private printThread(header: string, author: string, body: string, events: TimelineEvent[]): void {
        this.print(header);
        this.print(`opened by @${author}`);
        this.print(body);
        for (const event of events) {
            this.print(`  ${formatEvent(event)}`);
        }
    }

    private printDiscussion(discussion: Discussion): void {
        this.print(`#${discussion.meta.number} ${discussion.meta.title} [${discussion.meta.state}]`);
        this.print(`opened by @${discussion.author}, ${discussion.upvotes} upvote(s)`);
        this.print(discussion.body);
        for (const answer of discussion.suggestedAnswers) {
            const marker = answer.isAnswer ? '* ' : '';
            this.print(`  ${marker}@${answer.author} (${answer.upvotes}): ${answer.body.split('\n')[0]}`);
            for (const reply of answer.replies) {
                this.print(`    @${reply.author}: ${reply.body.split('\n')[0]}`);
            }
        }
    }
}
