import { MailboxConnectionManager } from '@/services/mailbox/mailbox-connection-manager';
import { DeletionProgress, DeletionReport } from '@/models/deletion';
import { MailboxSession } from '@/models/mailbox';
import { DeletionCandidate } from '@/models/scan';
import { logger, toError } from '@/utils';

export class DeletionExecutorService {
    constructor(
        private connections: MailboxConnectionManager,
        private batchSize: number
    ) {}

    /**
     * Flags every candidate as deleted in sub-batches, then expunges once.
     * A failed flag is counted and skipped. If the connection cannot be restored
     * the remaining candidates count as failed and nothing is expunged.
     */
    async deleteAll(
        session: MailboxSession,
        candidates: DeletionCandidate[],
        onProgress?: (progress: DeletionProgress) => void
    ): Promise<DeletionReport> {
        const total = candidates.length;
        if (total === 0) {
            return { requested: 0, successful: 0, failed: 0, committed: false };
        }

        const batchSize = Math.max(1, this.batchSize);
        let current = session;
        let successful = 0;
        let failed = 0;

        for (let start = 0; start < total; start += batchSize) {
            const live = await this.connections.ensureLive(current);
            if (!live.ok) {
                failed += total - start;
                logger.error(`Connection lost with ${total - start} deletions outstanding`, live.error);
                return {
                    requested: total,
                    successful,
                    failed,
                    committed: false,
                    commitError: `Connection lost before commit: ${live.error.message}`
                };
            }
            current = live.value;

            for (const candidate of candidates.slice(start, start + batchSize)) {
                try {
                    await current.client.setDeletedFlag(candidate.id);
                    successful++;
                    onProgress?.({ successful, failed, total });
                } catch (error) {
                    failed++;
                    logger.warn(`Failed to flag message ${candidate.id} for deletion`, error);
                    onProgress?.({ successful, failed, total, failedSubject: candidate.subject });
                }
            }
        }

        const live = await this.connections.ensureLive(current);
        if (!live.ok) {
            logger.error('Connection lost before expunge', live.error);
            return {
                requested: total,
                successful,
                failed,
                committed: false,
                commitError: `Connection lost before commit: ${live.error.message}`
            };
        }

        try {
            await live.value.client.commitDeletions();
            logger.info(`Expunged ${successful} flagged messages`);
            return { requested: total, successful, failed, committed: true };
        } catch (error) {
            const err = toError(error);
            logger.error('Expunge failed, flagged messages stay marked as deleted', err);
            return { requested: total, successful, failed, committed: false, commitError: err.message };
        }
    }
}
