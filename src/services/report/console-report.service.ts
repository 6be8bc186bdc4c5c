import { DeletionProgress, DeletionReport } from '@/models/deletion';
import { NoticeLevel, ReportSink, RunBanner, ScanSummary } from '@/models/report';
import { ScanEvent, ScanStopReason } from '@/models/scan';
import { emailUtils } from '@/utils';

const RULE = '='.repeat(70);
const FEED_HEAD = 20;
const FEED_EVERY = 50;
const DELETION_PROGRESS_EVERY = 100;
const SHOWN_FAILURES = 5;

const STOP_LABELS: Record<ScanStopReason, string> = {
    'completed': 'ANALYSIS COMPLETE',
    'cancelled': 'ANALYSIS STOPPED EARLY (cancelled)',
    'connection-lost': 'ANALYSIS STOPPED EARLY (connection lost)',
    'search-failed': 'ANALYSIS FAILED (search failed)'
};

export type LineWriter = (line: string) => void;

export class ConsoleReportService implements ReportSink {
    constructor(private writeLine: LineWriter = line => console.log(line)) {}

    onRunStarted(banner: RunBanner): void {
        this.writeLine(RULE);
        this.writeLine(`Unread mail cleanup for ${banner.user} (${banner.mailbox})`);
        this.writeLine(banner.dryRun
            ? 'Mode: DRY RUN - nothing will be deleted'
            : 'Mode: DELETE - confirmed candidates will be removed');
        this.writeLine(`Target: unread emails dated before ${banner.cutoff.toISOString().slice(0, 10)}`);
        this.writeLine('Press Ctrl+C to stop after the current message');
        this.writeLine(RULE);
    }

    onScanEvent(event: ScanEvent): void {
        switch (event.type) {
            case 'search-completed':
                this.writeLine(`Found ${event.totalUnread} unread emails (${event.batchCount} batches of ${event.batchSize})`);
                break;
            case 'batch-started':
                this.writeLine(`Batch ${event.batchNumber}/${event.batchCount}: fetching ${event.size} emails...`);
                break;
            case 'candidate-found':
                if (event.ordinal <= FEED_HEAD || event.ordinal % FEED_EVERY === 0) {
                    const { candidate } = event;
                    this.writeLine(`  [${event.ordinal}] ${emailUtils.truncate(candidate.subject, 50)} (${candidate.reason})`);
                }
                break;
            case 'batch-completed':
                this.writeLine(
                    `Batch ${event.batchNumber}/${event.batchCount}: processed ${event.processed}/${event.total}` +
                    ` | ${event.messagesPerSecond.toFixed(1)} msg/s` +
                    ` | ETA ${(event.etaSeconds / 60).toFixed(1)}m`
                );
                break;
        }
    }

    onSummary(summary: ScanSummary): void {
        this.writeLine(RULE);
        this.writeLine(STOP_LABELS[summary.stopReason]);
        this.writeLine(RULE);
        this.writeLine(`Emails processed: ${summary.processed}/${summary.totalUnread}`);
        this.writeLine(`Identified for deletion: ${summary.deletedCount}`);
        this.writeLine(`To keep: ${summary.keptCount}`);
        if (summary.skippedCount > 0) {
            this.writeLine(`Skipped (unreadable): ${summary.skippedCount}`);
        }
        if (summary.stopReason !== 'completed') {
            this.writeLine(`Remaining: ${summary.remaining}`);
        }

        if (summary.deletedCount === 0) {
            this.writeLine('No emails identified for deletion.');
            return;
        }

        if (summary.dryRun) {
            this.writeLine('DRY RUN MODE - no emails were deleted');
            this.writeLine('Sample emails that would be deleted:');
        } else {
            this.writeLine('Emails identified for deletion:');
        }

        summary.sample.forEach((entry, index) => {
            this.writeLine(`  ${index + 1}. ${emailUtils.truncate(entry.subject, 60)}`);
            this.writeLine(`     From: ${emailUtils.truncate(entry.sender, 50)}`);
            this.writeLine(`     Reason: ${entry.reason}`);
        });
        if (summary.moreCount > 0) {
            this.writeLine(`  ... and ${summary.moreCount} more`);
        }
    }

    onDeletionProgress(progress: DeletionProgress): void {
        if (progress.failedSubject !== undefined) {
            if (progress.failed <= SHOWN_FAILURES) {
                this.writeLine(`  Failed: ${emailUtils.truncate(progress.failedSubject, 30)}`);
            }
            return;
        }
        if (progress.successful % DELETION_PROGRESS_EVERY === 0) {
            this.writeLine(`  Deleted: ${progress.successful}/${progress.total}`);
        }
    }

    onDeletionReport(report: DeletionReport): void {
        this.writeLine('='.repeat(50));
        this.writeLine(`Successfully flagged: ${report.successful}`);
        this.writeLine(`Failed deletions: ${report.failed}`);
        if (report.committed) {
            this.writeLine('Flagged emails permanently removed.');
        } else if (report.commitError) {
            this.writeLine(`WARNING: commit failed (${report.commitError}); flagged emails stay marked as deleted until the next expunge.`);
        }
        this.writeLine('='.repeat(50));
    }

    onNotice(level: NoticeLevel, message: string): void {
        if (level === 'error') {
            this.writeLine(`Error: ${message}`);
        } else if (level === 'warn') {
            this.writeLine(`Warning: ${message}`);
        } else {
            this.writeLine(message);
        }
    }
}
