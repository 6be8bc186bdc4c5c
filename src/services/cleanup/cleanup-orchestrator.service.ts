import { MailboxConnectionManager } from '@/services/mailbox/mailbox-connection-manager';
import { BatchScannerService } from '@/services/scan/batch-scanner.service';
import { DeletionExecutorService } from '@/services/deletion/deletion-executor.service';
import { ConfirmationPrompt, CredentialSource } from '@/models/auth';
import { CleanupRunReport, ReportSink, ScanSummary } from '@/models/report';
import { ScanResult } from '@/models/scan';
import { CancellationToken, logger, toError } from '@/utils';

export interface CleanupRunSettings {
    mailbox: string;
    cutoff: Date;
    dryRun: boolean;
    sampleSize: number;
}

export interface CleanupRunOptions {
    dryRun?: boolean;
}

export class CleanupOrchestratorService {
    constructor(
        private connections: MailboxConnectionManager,
        private scanner: BatchScannerService,
        private deletionExecutor: DeletionExecutorService,
        private credentialSource: CredentialSource,
        private confirmation: ConfirmationPrompt,
        private report: ReportSink,
        private cancellation: CancellationToken,
        private settings: CleanupRunSettings
    ) {}

    public async run(options: CleanupRunOptions = {}): Promise<CleanupRunReport> {
        const { mailbox, cutoff } = this.settings;
        const dryRun = options.dryRun ?? this.settings.dryRun;
        let summary: ScanSummary | null = null;
        const unsubscribe = this.cancellation.onCancel(reason => {
            logger.info(`Cleanup run stopping: ${reason}`);
        });

        try {
            const credentials = await this.credentialSource.getCredentials();
            this.report.onRunStarted({ user: credentials.user, mailbox, cutoff, dryRun });

            const connected = await this.connections.connect(credentials);
            if (!connected.ok) {
                this.report.onNotice('error', connected.error.message);
                return { status: 'connect-failed', summary: null, deletion: null, error: connected.error.message };
            }

            const scan = await this.scanner.scan(connected.value, cutoff, this.cancellation,
                event => this.report.onScanEvent(event));
            summary = this.buildSummary(scan, dryRun);

            if (scan.stopReason === 'search-failed') {
                this.report.onNotice('warn', 'Could not search the mailbox for unread emails.');
                return { status: 'nothing-to-do', summary, deletion: null };
            }
            if (scan.totalUnread === 0) {
                this.report.onNotice('info', 'No unread emails found.');
                return { status: 'nothing-to-do', summary, deletion: null };
            }

            this.report.onSummary(summary);

            // a partial scan must not look like a clean one, dry run or not
            if (scan.stopReason === 'connection-lost') {
                this.report.onNotice('error', 'Connection lost during the scan; nothing was deleted.');
                return { status: 'aborted', summary, deletion: null, error: 'connection lost' };
            }
            if (scan.deleted.length === 0) {
                return { status: 'no-candidates', summary, deletion: null };
            }
            if (dryRun) {
                return { status: 'dry-run', summary, deletion: null };
            }

            const count = scan.deleted.length;
            const confirmed = await this.confirmation.confirm(`Proceed with deletion of ${count} emails? (yes/no): `);
            if (!confirmed) {
                this.report.onNotice('info', 'Deletion cancelled.');
                return { status: 'declined', summary, deletion: null };
            }

            this.report.onNotice('info', `Deleting ${count} emails...`);
            const session = this.connections.currentSession ?? connected.value;
            const deletion = await this.deletionExecutor.deleteAll(session, scan.deleted,
                progress => this.report.onDeletionProgress(progress));
            this.report.onDeletionReport(deletion);

            return { status: 'deleted', summary, deletion };
        } catch (error) {
            const err = toError(error);
            logger.error('Cleanup run failed:', err);
            this.report.onNotice('error', err.message);
            return { status: 'aborted', summary, deletion: null, error: err.message };
        } finally {
            unsubscribe();
            await this.connections.close();
        }
    }

    private buildSummary(scan: ScanResult, dryRun: boolean): ScanSummary {
        const sampleSize = Math.max(0, this.settings.sampleSize);
        const sample = scan.deleted.slice(0, sampleSize).map(candidate => ({
            subject: candidate.subject,
            sender: candidate.senderFull || candidate.sender,
            reason: candidate.reason
        }));

        return {
            totalUnread: scan.totalUnread,
            processed: scan.processed,
            deletedCount: scan.deleted.length,
            keptCount: scan.keptCount,
            skippedCount: scan.skippedCount,
            remaining: Math.max(0, scan.totalUnread - scan.processed - scan.skippedCount),
            stopReason: scan.stopReason,
            dryRun,
            sample,
            moreCount: scan.deleted.length - sample.length
        };
    }
}
