import { DeletionProgress, DeletionReport } from '../deletion/deletion.interface';
import { ScanEvent, ScanStopReason } from '../scan/scan.interface';

export interface SummarySampleEntry {
    subject: string;
    sender: string;
    reason: string;
}

export interface ScanSummary {
    totalUnread: number;
    processed: number;
    deletedCount: number;
    keptCount: number;
    skippedCount: number;
    remaining: number;
    stopReason: ScanStopReason;
    dryRun: boolean;
    sample: SummarySampleEntry[];
    moreCount: number;
}

export interface RunBanner {
    user: string;
    mailbox: string;
    cutoff: Date;
    dryRun: boolean;
}

export type NoticeLevel = 'info' | 'warn' | 'error';

export interface ReportSink {
    onRunStarted(banner: RunBanner): void;
    onScanEvent(event: ScanEvent): void;
    onSummary(summary: ScanSummary): void;
    onDeletionProgress(progress: DeletionProgress): void;
    onDeletionReport(report: DeletionReport): void;
    onNotice(level: NoticeLevel, message: string): void;
}

export type CleanupRunStatus =
    | 'connect-failed'
    | 'nothing-to-do'
    | 'no-candidates'
    | 'dry-run'
    | 'declined'
    | 'deleted'
    | 'aborted';

export interface CleanupRunReport {
    status: CleanupRunStatus;
    summary: ScanSummary | null;
    deletion: DeletionReport | null;
    error?: string;
}
