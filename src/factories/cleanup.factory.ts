import { AppConfig } from '@/config/app.config';
import { imapProviderService } from '@/config/imap-providers.config';
import { getDefaultRules, loadRulesFile } from '@/config/rules.config';
import { ConfirmationPrompt, TextPrompt } from '@/models/auth';
import { MailboxClientFactory } from '@/models/mailbox';
import { ReportSink } from '@/models/report';
import { CredentialsService } from '@/services/auth/credentials.service';
import { CleanupOrchestratorService } from '@/services/cleanup/cleanup-orchestrator.service';
import { DeletionExecutorService } from '@/services/deletion/deletion-executor.service';
import { ImapMailboxClient } from '@/services/imap/imap-mailbox.client';
import { MailboxConnectionManager } from '@/services/mailbox/mailbox-connection-manager';
import { BatchScannerService } from '@/services/scan/batch-scanner.service';
import { dateParser } from '@/services/scan/date-parser.service';
import { EmailClassifierService } from '@/services/scan/email-classifier.service';
import { headerDecoder } from '@/services/scan/header-decoder.service';
import { CancellationToken, logger } from '@/utils';

export interface CleanupRuntime {
    cancellation: CancellationToken;
    report: ReportSink;
    prompt: TextPrompt & ConfirmationPrompt;
    /** Replaces the IMAP client, mainly for tests. */
    createClient?: MailboxClientFactory;
}

export class CleanupFactory {
    public static createMailboxClientFactory(config: AppConfig): MailboxClientFactory {
        const { imap } = config;

        return credentials => {
            const provider = imapProviderService.resolve(credentials.user, imap.host, imap.port);
            return new ImapMailboxClient({
                host: provider.imapHost,
                port: provider.imapPort,
                tls: imap.tls,
                rejectUnauthorized: imap.rejectUnauthorized,
                connTimeoutMs: imap.connTimeoutMs,
                authTimeoutMs: imap.authTimeoutMs,
                socketTimeoutMs: imap.socketTimeoutMs
            });
        };
    }

    public static createOrchestrator(config: AppConfig, runtime: CleanupRuntime): CleanupOrchestratorService {
        try {
            const { imap, cleanup, retry } = config;
            const rules = cleanup.rulesFile ? loadRulesFile(cleanup.rulesFile) : getDefaultRules();

            const connections = new MailboxConnectionManager(
                runtime.createClient ?? CleanupFactory.createMailboxClientFactory(config),
                imap.mailbox,
                retry.connect
            );
            const scanner = new BatchScannerService(
                connections,
                new EmailClassifierService(rules),
                headerDecoder,
                dateParser,
                { batchSize: cleanup.fetchBatchSize, searchRetry: retry.search, messageRetry: retry.message }
            );
            const deletionExecutor = new DeletionExecutorService(connections, cleanup.deleteBatchSize);
            const credentials = new CredentialsService({ user: imap.user, password: imap.password }, runtime.prompt);

            const orchestrator = new CleanupOrchestratorService(
                connections,
                scanner,
                deletionExecutor,
                credentials,
                runtime.prompt,
                runtime.report,
                runtime.cancellation,
                {
                    mailbox: imap.mailbox,
                    cutoff: cleanup.cutoff,
                    dryRun: cleanup.dryRun,
                    sampleSize: cleanup.reportSampleSize
                }
            );

            logger.info('Cleanup orchestrator created');
            return orchestrator;
        } catch (error) {
            logger.error('Failed to create cleanup orchestrator:', error);
            throw error;
        }
    }
}
