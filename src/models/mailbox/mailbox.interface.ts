// UIDs as strings; opaque outside the IMAP client
export type MessageId = string;

export interface MailboxCredentials {
    user: string;
    password: string;
}

/**
 * The protocol surface the cleanup pipeline needs. Implementations must tolerate
 * being called strictly sequentially on one connection and nothing more.
 */
export interface MailboxClient {
    authenticate(credentials: MailboxCredentials): Promise<void>;
    selectMailbox(name: string): Promise<void>;
    searchUnread(): Promise<MessageId[]>;
    fetchHeaders(id: MessageId): Promise<Buffer>;
    setDeletedFlag(id: MessageId): Promise<void>;
    commitDeletions(): Promise<void>;
    probe(): Promise<void>;
    unselect(): Promise<void>;
    logout(): Promise<void>;
}

export type MailboxClientFactory = (credentials: MailboxCredentials) => MailboxClient;

export interface MailboxSession {
    readonly generation: number;
    readonly client: MailboxClient;
    readonly mailbox: string;
    readonly user: string;
    readonly openedAt: Date;
}
