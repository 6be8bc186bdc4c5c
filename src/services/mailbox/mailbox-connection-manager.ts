import {
    MailboxClient,
    MailboxClientFactory,
    MailboxCredentials,
    MailboxSession
} from '@/models/mailbox';
import { ConnectFailure } from '@/models/errors';
import { Outcome, failure, success } from '@/models/shared';
import { RetryPolicy, RetryUtils, logger, sleep } from '@/utils';

/**
 * Owns the single mailbox session of a run. Other services borrow the session for one
 * call and must go through {@link ensureLive} before touching the network.
 */
export class MailboxConnectionManager {
    private current: MailboxSession | null = null;
    private credentials: MailboxCredentials | null = null;
    private generation: number = 0;
    private connectionLock: Promise<Outcome<MailboxSession, ConnectFailure>> | null = null;

    constructor(
        private createClient: MailboxClientFactory,
        private mailbox: string,
        private retryPolicy: RetryPolicy,
        private wait: (ms: number) => Promise<void> = sleep
    ) {}

    public get currentSession(): MailboxSession | null {
        return this.current;
    }

    public async connect(credentials: MailboxCredentials): Promise<Outcome<MailboxSession, ConnectFailure>> {
        const existingLock = this.connectionLock;
        if (existingLock) {
            logger.debug(`Waiting for existing connection attempt for: ${credentials.user}`);
            return existingLock;
        }

        this.credentials = credentials;
        const connectionPromise = this.openSession(credentials);
        this.connectionLock = connectionPromise;

        try {
            return await connectionPromise;
        } finally {
            this.connectionLock = null;
        }
    }

    public async ensureLive(session: MailboxSession): Promise<Outcome<MailboxSession, ConnectFailure>> {
        const active = this.current;

        if (active) {
            if (active !== session) {
                logger.debug(`Session #${session.generation} was replaced by #${active.generation}`);
            }
            try {
                await active.client.probe();
                return success(active);
            } catch (error) {
                logger.warn('Connection lost, attempting to reconnect...', error);
            }
        }

        if (!this.credentials) {
            return failure(new ConnectFailure('Cannot reconnect: no credentials were supplied', 0));
        }

        return this.connect(this.credentials);
    }

    public async close(session: MailboxSession | null = this.current): Promise<void> {
        if (!session) return;

        try {
            await session.client.unselect();
        } catch (error) {
            logger.debug(`Unselect failed for session #${session.generation}:`, error);
        }
        await this.safeLogout(session.client);

        if (this.current === session) {
            this.current = null;
        }
        logger.info(`Disconnected session #${session.generation} for ${session.user}`);
    }

    private async openSession(credentials: MailboxCredentials): Promise<Outcome<MailboxSession, ConnectFailure>> {
        const maxAttempts = this.retryPolicy.maxAttempts;

        const result = await RetryUtils.run(
            this.retryPolicy,
            async attempt => {
                await this.teardownCurrent();

                if (attempt > 1) {
                    logger.info(`Connection retry attempt ${attempt}/${maxAttempts}`);
                }
                logger.info(`Connecting to ${this.mailbox} for ${credentials.user}`);

                const client = this.createClient(credentials);
                try {
                    await client.authenticate(credentials);
                    await client.selectMailbox(this.mailbox);
                } catch (error) {
                    await this.safeLogout(client);
                    throw error;
                }
                return client;
            },
            { label: `Connection to ${this.mailbox}`, sleep: this.wait }
        );

        if (!result.ok) {
            const lastError = result.error.errors[result.error.errors.length - 1];
            logger.error(`All ${result.error.attempts} connection attempts failed`, lastError);
            return failure(new ConnectFailure(
                `Could not connect after ${result.error.attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
                result.error.attempts,
                result.error.errors
            ));
        }

        this.generation += 1;
        const session: MailboxSession = {
            generation: this.generation,
            client: result.value,
            mailbox: this.mailbox,
            user: credentials.user,
            openedAt: new Date()
        };
        this.current = session;
        logger.info(`Session #${session.generation} ready on ${this.mailbox}`);

        return success(session);
    }

    private async teardownCurrent(): Promise<void> {
        const previous = this.current;
        if (!previous) return;

        this.current = null;
        logger.debug(`Tearing down session #${previous.generation}`);
        await this.safeLogout(previous.client);
    }

    private async safeLogout(client: MailboxClient): Promise<void> {
        try {
            await client.logout();
        } catch (error) {
            logger.warn('Safe disconnect warning:', error);
        }
    }
}
