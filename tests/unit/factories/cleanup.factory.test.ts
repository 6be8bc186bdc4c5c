import { describe, test, expect } from '@jest/globals';
import { loadAppConfig } from '@/config/app.config';
import { CleanupFactory } from '@/factories/cleanup.factory';
import { ImapMailboxClient } from '@/services/imap/imap-mailbox.client';
import { CancellationToken } from '@/utils';
import { FakeMailboxServer } from '../../fixtures/fake-mailbox';
import { RecordingReportSink } from '../../fixtures/recording-report';
import { addScenarioMessages } from '../../fixtures/scan-pipeline';
import { ScriptedPrompt } from '../../fixtures/scripted-prompt';

const testEnv = {
    IMAP_USER: 'user@example.com',
    IMAP_PASSWORD: 'test-secret',
    CONNECT_BACKOFF_MS: '0',
    SEARCH_BACKOFF_MS: '0',
    MESSAGE_BACKOFF_MS: '0'
};

describe('CleanupFactory', () => {
    test('wires a complete run from configuration', async () => {
        const server = addScenarioMessages(new FakeMailboxServer());
        const report = new RecordingReportSink();
        const prompt = new ScriptedPrompt([], true);

        const orchestrator = CleanupFactory.createOrchestrator(loadAppConfig(testEnv), {
            cancellation: new CancellationToken(),
            report,
            prompt,
            createClient: server.createClient
        });
        const result = await orchestrator.run();

        expect(result.status).toBe('deleted');
        expect(server.expunged).toEqual(['1']);
        expect(server.clients[0].user).toBe('user@example.com');
        expect(prompt.questions).toEqual(['Proceed with deletion of 1 emails? (yes/no): ']);
    });

    test('asks for missing credentials', async () => {
        const server = addScenarioMessages(new FakeMailboxServer());
        const prompt = new ScriptedPrompt(['asked@example.com', 'test-secret']);

        const orchestrator = CleanupFactory.createOrchestrator(loadAppConfig({ DRY_RUN: 'true' }), {
            cancellation: new CancellationToken(),
            report: new RecordingReportSink(),
            prompt,
            createClient: server.createClient
        });
        const result = await orchestrator.run();

        expect(result.status).toBe('dry-run');
        expect(prompt.questions).toEqual(['Email address: ', 'Password (or app password) for asked@example.com: ']);
    });

    test('builds IMAP clients for the configured mailbox', () => {
        const createClient = CleanupFactory.createMailboxClientFactory(loadAppConfig({}));
        expect(createClient({ user: 'someone@example.com', password: 'test-secret' })).toBeInstanceOf(ImapMailboxClient);
    });
});
