import { DeletionProgress, DeletionReport } from '@/models/deletion';
import { NoticeLevel, ReportSink, RunBanner, ScanSummary } from '@/models/report';
import { ScanEvent } from '@/models/scan';
import { logger } from '@/utils';

export class CompositeReportService implements ReportSink {
    constructor(private sinks: ReportSink[]) {}

    onRunStarted(banner: RunBanner): void {
        this.each(sink => sink.onRunStarted(banner));
    }

    onScanEvent(event: ScanEvent): void {
        this.each(sink => sink.onScanEvent(event));
    }

    onSummary(summary: ScanSummary): void {
        this.each(sink => sink.onSummary(summary));
    }

    onDeletionProgress(progress: DeletionProgress): void {
        this.each(sink => sink.onDeletionProgress(progress));
    }

    onDeletionReport(report: DeletionReport): void {
        this.each(sink => sink.onDeletionReport(report));
    }

    onNotice(level: NoticeLevel, message: string): void {
        this.each(sink => sink.onNotice(level, message));
    }

    private each(call: (sink: ReportSink) => void): void {
        for (const sink of this.sinks) {
            try {
                call(sink);
            } catch (error) {
                logger.error('Report sink failed:', error);
            }
        }
    }
}
