import { MailboxClient, MailboxCredentials, MessageId } from '@/models/mailbox';
import { buildRawHeaders, HeaderFields } from './raw-headers';

interface StoredMessage {
    raw: Buffer;
    unseen: boolean;
    deleted: boolean;
}

/**
 * In-process mailbox shared by every client it hands out, so a reconnect sees the
 * same messages and flags.
 */
export class FakeMailboxServer {
    readonly messages = new Map<MessageId, StoredMessage>();
    readonly clients: FakeMailboxClient[] = [];
    readonly calls: string[] = [];
    readonly expunged: MessageId[] = [];

    authFailures = 0;
    searchFailures = 0;
    probeFailures = 0;
    readonly fetchFailures = new Map<MessageId, number>();
    readonly flagFailures = new Set<MessageId>();
    commitError: Error | null = null;
    /** Failing probes also make reconnecting impossible. */
    unreachable = false;
    onFetch: ((id: MessageId) => void) | null = null;

    addMessage(id: MessageId, fields: HeaderFields, unseen = true): this {
        this.messages.set(id, { raw: buildRawHeaders(fields), unseen, deleted: false });
        return this;
    }

    createClient = (credentials?: MailboxCredentials): FakeMailboxClient => {
        const client = new FakeMailboxClient(this, credentials?.user ?? 'unknown');
        this.clients.push(client);
        return client;
    };

    count(call: string): number {
        return this.calls.filter(entry => entry === call).length;
    }

    flagged(): MessageId[] {
        return [...this.messages.entries()].filter(([, message]) => message.deleted).map(([id]) => id);
    }
}

export class FakeMailboxClient implements MailboxClient {
    loggedIn = false;
    selected: string | null = null;

    constructor(private server: FakeMailboxServer, readonly user: string) {}

    async authenticate(credentials: MailboxCredentials): Promise<void> {
        this.server.calls.push('authenticate');
        if (this.server.unreachable) {
            throw new Error('connect ECONNREFUSED');
        }
        if (this.server.authFailures > 0) {
            this.server.authFailures--;
            throw new Error(`AUTHENTICATIONFAILED for ${credentials.user}`);
        }
        this.loggedIn = true;
    }

    async selectMailbox(name: string): Promise<void> {
        this.server.calls.push(`select:${name}`);
        this.selected = name;
    }

    async searchUnread(): Promise<MessageId[]> {
        this.server.calls.push('search');
        if (this.server.searchFailures > 0) {
            this.server.searchFailures--;
            throw new Error('search timed out');
        }
        return [...this.server.messages.entries()].filter(([, message]) => message.unseen).map(([id]) => id);
    }

    async fetchHeaders(id: MessageId): Promise<Buffer> {
        this.server.calls.push(`fetch:${id}`);
        this.server.onFetch?.(id);

        const remaining = this.server.fetchFailures.get(id) ?? 0;
        if (remaining > 0) {
            this.server.fetchFailures.set(id, remaining - 1);
            throw new Error(`fetch of ${id} failed`);
        }

        const message = this.server.messages.get(id);
        if (!message) {
            throw new Error(`no message ${id}`);
        }
        return message.raw;
    }

    async setDeletedFlag(id: MessageId): Promise<void> {
        this.server.calls.push(`store:${id}`);
        const message = this.server.messages.get(id);
        if (!message || this.server.flagFailures.has(id)) {
            throw new Error(`cannot flag ${id}`);
        }
        message.deleted = true;
    }

    async commitDeletions(): Promise<void> {
        this.server.calls.push('expunge');
        if (this.server.commitError) {
            throw this.server.commitError;
        }
        for (const id of this.server.flagged()) {
            this.server.messages.delete(id);
            this.server.expunged.push(id);
        }
    }

    async probe(): Promise<void> {
        this.server.calls.push('probe');
        if (!this.loggedIn) {
            throw new Error('not connected');
        }
        if (this.server.unreachable || this.server.probeFailures > 0) {
            this.server.probeFailures = Math.max(0, this.server.probeFailures - 1);
            this.loggedIn = false;
            throw new Error('connection reset');
        }
    }

    async unselect(): Promise<void> {
        this.server.calls.push('unselect');
        this.selected = null;
    }

    async logout(): Promise<void> {
        this.server.calls.push('logout');
        this.loggedIn = false;
    }
}
