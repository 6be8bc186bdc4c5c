import { describe, test, expect } from '@jest/globals';
import { CompositeReportService } from '@/services/report/composite-report.service';
import { RecordingReportSink } from '../../../fixtures/recording-report';

describe('CompositeReportService', () => {
    test('forwards every call to each sink', () => {
        const first = new RecordingReportSink();
        const second = new RecordingReportSink();
        const composite = new CompositeReportService([first, second]);

        composite.onNotice('info', 'hello');
        composite.onScanEvent({ type: 'batch-started', batchNumber: 1, batchCount: 1, size: 3 });

        for (const sink of [first, second]) {
            expect(sink.notices).toEqual([{ level: 'info', message: 'hello' }]);
            expect(sink.events).toEqual([{ type: 'batch-started', batchNumber: 1, batchCount: 1, size: 3 }]);
        }
    });

    test('a failing sink does not stop the others', () => {
        const failing = new RecordingReportSink();
        failing.onNotice = () => {
            throw new Error('sink broke');
        };
        const healthy = new RecordingReportSink();

        new CompositeReportService([failing, healthy]).onNotice('warn', 'still delivered');

        expect(healthy.notices).toEqual([{ level: 'warn', message: 'still delivered' }]);
    });
});
