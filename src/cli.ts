#!/usr/bin/env node
import './preload';
import { parseArgs } from 'util';
import { AppConfig, ConfigOverrides, applyOverrides, loadAppConfig } from '@/config/app.config';
import { CleanupFactory } from '@/factories/cleanup.factory';
import { ConfigError } from '@/models/errors';
import { CleanupRunStatus, ReportSink } from '@/models/report';
import { PromptService } from '@/services/prompt/prompt.service';
import { CompositeReportService } from '@/services/report/composite-report.service';
import { ConsoleReportService } from '@/services/report/console-report.service';
import { ProgressWebSocketService } from '@/services/websocket/progress-websocket.service';
import { CancellationToken, logger } from '@/utils';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: unread-mail-sweeper [options]

Deletes old unread bulk mail (newsletters, notifications, promotions) from an IMAP mailbox.

Options:
  --dry-run            Scan and report without deleting anything
  --user <address>     Mailbox address (default: IMAP_USER, or asked)
  --cutoff <date>      Only consider mail dated before this ISO date (default: CUTOFF_DATE)
  --mailbox <name>     Mailbox to scan (default: IMAP_MAILBOX or INBOX)
  --batch-size <n>     Messages fetched per batch (default: FETCH_BATCH_SIZE or 100)
  --rules <file>       JSON rules file replacing the built-in rules
  -h, --help           Show this help`;

export interface CliOptions {
    help: boolean;
    overrides: ConfigOverrides;
}

export const parseCliArgs = (argv: string[]): CliOptions => {
    try {
        const { values } = parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                'dry-run': { type: 'boolean' },
                'user': { type: 'string' },
                'cutoff': { type: 'string' },
                'mailbox': { type: 'string' },
                'batch-size': { type: 'string' },
                'rules': { type: 'string' },
                'help': { type: 'boolean', short: 'h' }
            }
        });

        return {
            help: values.help ?? false,
            overrides: {
                dryRun: values['dry-run'],
                user: values.user,
                cutoff: values.cutoff,
                mailbox: values.mailbox,
                batchSize: values['batch-size'],
                rulesFile: values.rules
            }
        };
    } catch (error) {
        throw new ConfigError([error instanceof Error ? error.message : String(error)]);
    }
};

export const exitCodeFor = (status: CleanupRunStatus): number =>
    status === 'connect-failed' || status === 'aborted' ? EXIT_FAILURE : EXIT_OK;

const startProgressFeed = async (config: AppConfig, sinks: ReportSink[]): Promise<ProgressWebSocketService | null> => {
    if (config.progressWsPort === undefined) return null;

    const feed = new ProgressWebSocketService();
    const port = await feed.start(config.progressWsPort);
    console.log(`Progress feed: ws://127.0.0.1:${port}/ws/progress`);
    sinks.push(feed);
    return feed;
};

export const main = async (argv: string[]): Promise<number> => {
    let config: AppConfig;

    try {
        const options = parseCliArgs(argv);
        if (options.help) {
            console.log(USAGE);
            return EXIT_OK;
        }
        config = applyOverrides(loadAppConfig(), options.overrides);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message);
            console.error('Run with --help for usage.');
            return EXIT_FAILURE;
        }
        throw error;
    }

    logger.setLevel(config.logLevel);

    const cancellation = new CancellationToken();
    const prompt = new PromptService();
    const sinks: ReportSink[] = [new ConsoleReportService()];
    const progressFeed = await startProgressFeed(config, sinks);
    const report = new CompositeReportService(sinks);

    let interrupts = 0;
    const onSigint = () => {
        interrupts++;
        if (interrupts > 1) {
            process.exit(EXIT_INTERRUPTED);
        }
        report.onNotice('warn', 'Stop requested, finishing the current message... (Ctrl+C again to force quit)');
        cancellation.cancel('interrupted by user');
    };
    process.on('SIGINT', onSigint);

    try {
        const orchestrator = CleanupFactory.createOrchestrator(config, { cancellation, report, prompt });
        const result = await orchestrator.run();
        logger.info(`Cleanup finished with status ${result.status}`);
        return exitCodeFor(result.status);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message);
            return EXIT_FAILURE;
        }
        throw error;
    } finally {
        process.off('SIGINT', onSigint);
        await progressFeed?.stop();
    }
};

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch(error => {
            logger.error('Fatal error:', error);
            console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = EXIT_FAILURE;
        });
}
