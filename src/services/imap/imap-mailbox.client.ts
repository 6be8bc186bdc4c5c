import { EventEmitter } from 'events';
import Imap from 'imap';
import { MailboxClient, MailboxCredentials, MessageId } from '@/models/mailbox';
import { MailboxOperation, MailboxOperationError } from '@/models/errors';
import { logger } from '@/utils';

export interface ImapClientSettings {
    host: string;
    port: number;
    tls: boolean;
    rejectUnauthorized: boolean;
    connTimeoutMs: number;
    authTimeoutMs: number;
    socketTimeoutMs: number;
}

// node-imap reports success to callbacks with a null error
export interface ImapConnection extends EventEmitter {
    state: string;
    connect(): void;
    end(): void;
    destroy(): void;
    openBox(name: string, readOnly: boolean, callback: (error: Error | null) => void): void;
    search(criteria: unknown[], callback: (error: Error | null, uids: number[]) => void): void;
    fetch(source: string, options: Imap.FetchOptions): EventEmitter;
    addFlags(source: string, flags: string[], callback: (error: Error | null) => void): void;
    expunge(callback: (error: Error | null) => void): void;
    closeBox(autoExpunge: boolean, callback: (error: Error | null) => void): void;
}

export type ImapConnectionConfig = Imap.Config & { socketTimeout: number };

export type ImapConnectionFactory = (config: ImapConnectionConfig) => ImapConnection;

type InFlightCall = (reason: string) => void;

const DISCONNECT_TIMEOUT_MS = 5000;

/**
 * {@link MailboxClient} over one `imap` connection. Message ids are UIDs, so they
 * stay valid when the connection is re-established against the same mailbox.
 */
export class ImapMailboxClient implements MailboxClient {
    private imap: ImapConnection | null = null;
    private isConnected: boolean = false;
    // node-imap never answers requests queued on a socket that went away
    private inFlight: Set<InFlightCall> = new Set();

    constructor(
        private settings: ImapClientSettings,
        private createConnection: ImapConnectionFactory = config => new Imap(config)
    ) {}

    async authenticate(credentials: MailboxCredentials): Promise<void> {
        if (this.isConnected) {
            logger.debug('IMAP connection already established');
            return;
        }

        return new Promise((resolve, reject) => {
            let settled = false;
            const settle = (error?: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timeout);
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            };

            const timeout = setTimeout(() => {
                this.dropConnection('connection timeout expired');
                settle(new MailboxOperationError('connect', 'IMAP connection timeout expired'));
            }, this.settings.connTimeoutMs + this.settings.authTimeoutMs);

            try {
                const imap = this.createConnection(this.createImapConfig(credentials));
                this.imap = imap;

                imap.once('ready', () => {
                    this.isConnected = true;
                    logger.info(`IMAP connection established for ${credentials.user}`);
                    settle();
                });

                imap.on('error', (err: Error) => {
                    if (!settled) {
                        this.isConnected = false;
                        this.imap = null;
                        settle(this.describeConnectError(err));
                        return;
                    }
                    logger.warn('IMAP connection error:', err);
                    if (this.imap !== imap) return;
                    this.isConnected = false;
                    this.failInFlight(err.message || 'connection error');
                });

                imap.once('close', () => {
                    logger.debug('IMAP socket closed');
                    if (this.imap !== imap) return;
                    this.isConnected = false;
                    this.failInFlight('connection closed');
                });

                imap.connect();
            } catch (error) {
                this.imap = null;
                settle(new MailboxOperationError('connect', this.messageOf(error), error));
            }
        });
    }

    async selectMailbox(name: string): Promise<void> {
        return this.track<void>('select', (imap, resolve, reject) => {
            imap.openBox(name, false, error => {
                if (error) {
                    reject(new MailboxOperationError('select', `${name}: ${error.message}`, error));
                    return;
                }
                logger.debug(`Selected mailbox ${name}`);
                resolve();
            });
        });
    }

    async searchUnread(): Promise<MessageId[]> {
        return this.track<MessageId[]>('search', (imap, resolve, reject) => {
            imap.search(['UNSEEN'], (error, uids) => {
                if (error) {
                    reject(new MailboxOperationError('search', error.message, error));
                    return;
                }
                resolve(uids.map(uid => String(uid)));
            });
        });
    }

    async fetchHeaders(id: MessageId): Promise<Buffer> {
        return this.track<Buffer>('fetch', (imap, resolve, reject) => {
            const chunks: Buffer[] = [];
            let bodyDone: Promise<void> | null = null;

            const fetch = imap.fetch(id, { bodies: 'HEADER', markSeen: false });

            fetch.on('message', (msg: EventEmitter) => {
                msg.on('body', (stream: NodeJS.ReadableStream) => {
                    bodyDone = new Promise(done => {
                        stream.on('data', (chunk: Buffer) => chunks.push(chunk));
                        stream.once('end', () => done());
                    });
                });
            });

            fetch.once('error', (error: Error) => {
                reject(new MailboxOperationError('fetch', `message ${id}: ${error.message}`, error));
            });

            fetch.once('end', () => {
                if (!bodyDone) {
                    reject(new MailboxOperationError('fetch', `message ${id} returned no header data`));
                    return;
                }
                bodyDone.then(() => resolve(Buffer.concat(chunks)), reject);
            });
        });
    }

    async setDeletedFlag(id: MessageId): Promise<void> {
        return this.track<void>('store', (imap, resolve, reject) => {
            imap.addFlags(id, ['\\Deleted'], error => {
                if (error) {
                    reject(new MailboxOperationError('store', `message ${id}: ${error.message}`, error));
                    return;
                }
                resolve();
            });
        });
    }

    async commitDeletions(): Promise<void> {
        return this.track<void>('expunge', (imap, resolve, reject) => {
            imap.expunge(error => {
                if (error) {
                    reject(new MailboxOperationError('expunge', error.message, error));
                    return;
                }
                resolve();
            });
        });
    }

    async probe(): Promise<void> {
        return this.track<void>('probe', (imap, resolve, reject) => {
            if (imap.state !== 'authenticated') {
                reject(new MailboxOperationError('probe', `connection state is ${imap.state}`));
                return;
            }

            // UID * matches only the newest message, the cheapest round trip the client exposes
            imap.search([['UID', '*']], error => {
                if (error) {
                    reject(new MailboxOperationError('probe', error.message, error));
                    return;
                }
                resolve();
            });
        });
    }

    async unselect(): Promise<void> {
        return this.track<void>('unselect', (imap, resolve, reject) => {
            imap.closeBox(false, error => {
                if (error) {
                    reject(new MailboxOperationError('unselect', error.message, error));
                    return;
                }
                resolve();
            });
        });
    }

    async logout(): Promise<void> {
        const imap = this.imap;
        if (!imap) return;

        return new Promise((resolve) => {
            const timeout = setTimeout(() => {
                logger.warn('IMAP logout timeout, forcing close');
                this.dropConnection('logout timed out');
                resolve();
            }, DISCONNECT_TIMEOUT_MS);

            imap.once('end', () => {
                clearTimeout(timeout);
                this.isConnected = false;
                this.imap = null;
                logger.info('IMAP connection closed');
                resolve();
            });

            try {
                imap.end();
            } catch (error) {
                clearTimeout(timeout);
                logger.warn('Error during IMAP end:', error);
                this.dropConnection('logout failed');
                resolve();
            }
        });
    }

    private track<T>(
        operation: MailboxOperation,
        start: (imap: ImapConnection, resolve: (value: T) => void, reject: (error: Error) => void) => void
    ): Promise<T> {
        const imap = this.requireConnection(operation);

        return new Promise<T>((resolve, reject) => {
            let settled = false;
            const settle = (finish: () => void) => {
                if (settled) return;
                settled = true;
                this.inFlight.delete(abort);
                finish();
            };
            const abort: InFlightCall = reason =>
                settle(() => reject(new MailboxOperationError(operation, reason)));

            this.inFlight.add(abort);
            try {
                start(imap, value => settle(() => resolve(value)), error => settle(() => reject(error)));
            } catch (error) {
                settle(() => reject(new MailboxOperationError(operation, this.messageOf(error), error)));
            }
        });
    }

    private failInFlight(reason: string): void {
        if (this.inFlight.size === 0) return;

        logger.warn(`Failing ${this.inFlight.size} pending IMAP request(s): ${reason}`);
        for (const abort of [...this.inFlight]) {
            abort(reason);
        }
    }

    private requireConnection(operation: MailboxOperation): ImapConnection {
        if (!this.imap || !this.isConnected) {
            throw new MailboxOperationError(operation, 'IMAP connection unavailable');
        }
        return this.imap;
    }

    private dropConnection(reason: string): void {
        const imap = this.imap;
        this.isConnected = false;
        this.imap = null;
        this.failInFlight(reason);
        if (!imap) return;

        try {
            imap.destroy();
        } catch (error) {
            logger.debug('IMAP destroy failed:', error);
        }
    }

    private describeConnectError(err: Error): MailboxOperationError {
        const message = err.message || '';
        if (message.includes('AUTHENTICATIONFAILED') ||
            message.includes('Invalid credentials') ||
            message.includes('LOGIN failed')) {
            return new MailboxOperationError('connect', 'authentication rejected by server', err);
        }
        if (message.includes('timed out')) {
            return new MailboxOperationError('connect', 'mail server connection timeout', err);
        }
        return new MailboxOperationError('connect', message, err);
    }

    private messageOf(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }

    private createImapConfig(credentials: MailboxCredentials): ImapConnectionConfig {
        const imapConfig: ImapConnectionConfig = {
            user: credentials.user,
            password: credentials.password,
            host: this.settings.host,
            port: this.settings.port,
            tls: this.settings.tls,
            tlsOptions: {
                rejectUnauthorized: this.settings.rejectUnauthorized,
                servername: this.settings.host
            },
            authTimeout: this.settings.authTimeoutMs,
            connTimeout: this.settings.connTimeoutMs,
            socketTimeout: this.settings.socketTimeoutMs,
            keepalive: {
                interval: 10000,
                idleInterval: 30000,
                forceNoop: true
            }
        };

        logger.debug('IMAP config:', {
            host: imapConfig.host,
            port: imapConfig.port,
            user: imapConfig.user
        });

        return imapConfig;
    }
}
