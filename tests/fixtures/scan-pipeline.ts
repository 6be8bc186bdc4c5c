import { MailboxConnectionManager } from '@/services/mailbox/mailbox-connection-manager';
import { BatchScannerService } from '@/services/scan/batch-scanner.service';
import { DateParserService } from '@/services/scan/date-parser.service';
import { EmailClassifierService } from '@/services/scan/email-classifier.service';
import { HeaderDecoderService } from '@/services/scan/header-decoder.service';
import { FakeMailboxServer } from './fake-mailbox';
import { immediate, noWait } from './policies';

export const CUTOFF = new Date('2025-06-01T00:00:00Z');
export const CREDENTIALS = { user: 'user@example.com', password: 'test-secret' };

/** The four messages of the classification scenarios, ids 1 to 4. */
export const addScenarioMessages = (server: FakeMailboxServer): FakeMailboxServer =>
    server
        .addMessage('1', { from: 'newsletter@updates.com', subject: 'Weekly Digest', date: 'Wed, 01 Jan 2025 10:00:00 +0000' })
        .addMessage('2', { from: 'Friend <friend@gmail.com>', subject: 'Dinner Friday?', date: 'Wed, 01 Jan 2025 18:00:00 +0000' })
        .addMessage('3', { from: 'promo@shop.com', subject: '50% off today!', date: 'Tue, 01 Jul 2025 09:00:00 +0000' })
        .addMessage('4', { from: 'promo@shop.com', subject: 'Undated offer' });

export interface ScanPipeline {
    connections: MailboxConnectionManager;
    classifier: EmailClassifierService;
    scanner: BatchScannerService;
}

export const createScanPipeline = (
    server: FakeMailboxServer,
    batchSize: number,
    clock: () => number = () => 0
): ScanPipeline => {
    const connections = new MailboxConnectionManager(server.createClient, 'INBOX', immediate(3), noWait);
    const classifier = new EmailClassifierService();
    const scanner = new BatchScannerService(
        connections,
        classifier,
        new HeaderDecoderService(),
        new DateParserService(),
        { batchSize, searchRetry: immediate(3), messageRetry: immediate(2) },
        clock,
        noWait
    );
    return { connections, classifier, scanner };
};
