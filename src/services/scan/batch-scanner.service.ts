import { MailboxConnectionManager } from '@/services/mailbox/mailbox-connection-manager';
import { MailboxSession, MessageId } from '@/models/mailbox';
import {
    Classification,
    DeletionCandidate,
    MessageSummary,
    REASON_TOO_RECENT_OR_NO_DATE,
    ScanEvent,
    ScanResult,
    ScanStopReason
} from '@/models/scan';
import { CancellationToken, RetryPolicy, RetryUtils, logger, sleep } from '@/utils';
import { EmailClassifierService } from './email-classifier.service';
import { DateParserService } from './date-parser.service';
import { HeaderDecoderService } from './header-decoder.service';

export interface BatchScannerOptions {
    batchSize: number;
    searchRetry: RetryPolicy;
    messageRetry: RetryPolicy;
}

type MessageOutcome =
    | { kind: 'recorded'; session: MailboxSession; summary: MessageSummary; classification: Classification }
    | { kind: 'skipped'; session: MailboxSession }
    | { kind: 'connection-lost' };

type SearchOutcome =
    | { ok: true; session: MailboxSession; ids: MessageId[] }
    | { ok: false };

export class BatchScannerService {
    constructor(
        private connections: MailboxConnectionManager,
        private classifier: EmailClassifierService,
        private headerDecoder: HeaderDecoderService,
        private dateParser: DateParserService,
        private options: BatchScannerOptions,
        private clock: () => number = Date.now,
        private wait: (ms: number) => Promise<void> = sleep
    ) {}

    async scan(
        session: MailboxSession,
        cutoff: Date,
        cancellation: CancellationToken,
        onEvent?: (event: ScanEvent) => void
    ): Promise<ScanResult> {
        const iterator = this.iterate(session, cutoff, cancellation);
        let step = await iterator.next();

        while (!step.done) {
            onEvent?.(step.value);
            step = await iterator.next();
        }

        return step.value;
    }

    /**
     * Searches for unread messages, then fetches and classifies them batch by batch.
     * Yields progress as it goes and returns the final tally. Counters are consistent
     * after every batch even when the run stops early.
     */
    async *iterate(
        session: MailboxSession,
        cutoff: Date,
        cancellation: CancellationToken
    ): AsyncGenerator<ScanEvent, ScanResult, void> {
        const search = await this.searchUnread(session);
        if (!search.ok) {
            return this.emptyResult('search-failed');
        }

        const ids = search.ids;
        const total = ids.length;
        const batchSize = Math.max(1, this.options.batchSize);
        const batchCount = Math.ceil(total / batchSize);
        const startedAt = this.clock();

        logger.info(`Found ${total} unread messages, ${batchCount} batches of ${batchSize}`);
        yield { type: 'search-completed', totalUnread: total, batchCount, batchSize };

        const deleted: DeletionCandidate[] = [];
        let current = search.session;
        let processed = 0;
        let keptCount = 0;
        let skippedCount = 0;
        let stopReason: ScanStopReason = 'completed';

        for (let index = 0; index < batchCount; index++) {
            if (cancellation.isCancellationRequested) {
                stopReason = 'cancelled';
                break;
            }

            const batch = ids.slice(index * batchSize, (index + 1) * batchSize);
            const batchNumber = index + 1;
            yield { type: 'batch-started', batchNumber, batchCount, size: batch.length };

            for (const id of batch) {
                if (cancellation.isCancellationRequested) {
                    stopReason = 'cancelled';
                    break;
                }

                const outcome = await this.processMessage(current, id, cutoff);
                if (outcome.kind === 'connection-lost') {
                    stopReason = 'connection-lost';
                    break;
                }

                current = outcome.session;
                if (outcome.kind === 'skipped') {
                    skippedCount++;
                    continue;
                }

                processed++;
                if (outcome.classification.action === 'delete') {
                    const candidate: DeletionCandidate = { ...outcome.summary, reason: outcome.classification.reason };
                    deleted.push(candidate);
                    yield { type: 'candidate-found', ordinal: deleted.length, candidate };
                } else {
                    keptCount++;
                }
            }

            const elapsedMs = this.clock() - startedAt;
            const messagesPerSecond = elapsedMs > 0 ? processed / (elapsedMs / 1000) : 0;
            const remaining = total - processed - skippedCount;

            yield {
                type: 'batch-completed',
                batchNumber,
                batchCount,
                total,
                processed,
                deletedCount: deleted.length,
                keptCount,
                skippedCount,
                elapsedMs,
                messagesPerSecond,
                etaSeconds: messagesPerSecond > 0 ? remaining / messagesPerSecond : 0
            };

            if (stopReason !== 'completed') break;
        }

        if (stopReason === 'cancelled') {
            logger.warn(`Scan cancelled: ${cancellation.cancellationReason ?? 'stop requested'}`);
        }

        return {
            totalUnread: total,
            processed,
            deleted,
            keptCount,
            skippedCount,
            stopReason,
            elapsedMs: this.clock() - startedAt
        };
    }

    private async searchUnread(session: MailboxSession): Promise<SearchOutcome> {
        let current = session;

        const result = await RetryUtils.run(
            this.options.searchRetry,
            async () => {
                const live = await this.connections.ensureLive(current);
                if (!live.ok) throw live.error;

                current = live.value;
                return current.client.searchUnread();
            },
            { label: 'Unread search', sleep: this.wait }
        );

        if (!result.ok) {
            logger.error(`Unread search failed after ${result.error.attempts} attempts`,
                result.error.errors[result.error.errors.length - 1]);
            return { ok: false };
        }

        return { ok: true, session: current, ids: result.value };
    }

    private async processMessage(session: MailboxSession, id: MessageId, cutoff: Date): Promise<MessageOutcome> {
        const policy = this.options.messageRetry;
        const maxAttempts = Math.max(1, policy.maxAttempts);
        let current = session;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const live = await this.connections.ensureLive(current);
            if (!live.ok) {
                logger.error(`Could not re-establish connection while reading message ${id}`, live.error);
                return { kind: 'connection-lost' };
            }
            current = live.value;

            try {
                const raw = await current.client.fetchHeaders(id);
                const summary = await this.summarize(id, raw);
                return { kind: 'recorded', session: current, summary, classification: this.evaluate(summary, cutoff) };
            } catch (error) {
                if (attempt < maxAttempts) {
                    logger.warn(`Reading message ${id} failed (attempt ${attempt}/${maxAttempts}), retrying`, error);
                    await this.wait(RetryUtils.delayAfter(policy, attempt));
                } else {
                    logger.warn(`Skipping message ${id} after ${maxAttempts} attempts`, error);
                }
            }
        }

        return { kind: 'skipped', session: current };
    }

    private async summarize(id: MessageId, raw: Buffer): Promise<MessageSummary> {
        const headers = await this.headerDecoder.decodeHeaders(raw);

        return {
            id,
            sender: headers.sender,
            senderFull: headers.senderFull,
            subject: headers.subject,
            date: this.dateParser.parse(headers.date)
        };
    }

    private evaluate(summary: MessageSummary, cutoff: Date): Classification {
        if (!summary.date || summary.date.getTime() >= cutoff.getTime()) {
            return { action: 'keep', reason: REASON_TOO_RECENT_OR_NO_DATE };
        }
        return this.classifier.classify(summary.sender, summary.subject, summary.senderFull);
    }

    private emptyResult(stopReason: ScanStopReason): ScanResult {
        return {
            totalUnread: 0,
            processed: 0,
            deleted: [],
            keptCount: 0,
            skippedCount: 0,
            stopReason,
            elapsedMs: 0
        };
    }
}
