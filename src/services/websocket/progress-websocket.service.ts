import { WebSocket, WebSocketServer } from 'ws';
import { DeletionProgress, DeletionReport } from '@/models/deletion';
import { NoticeLevel, ReportSink, RunBanner, ScanSummary } from '@/models/report';
import { ScanEvent } from '@/models/scan';
import { logger } from '@/utils';

export const PROGRESS_PATH = '/ws/progress';

export type ProgressMessageType =
    | 'run-started'
    | 'scan-event'
    | 'summary'
    | 'deletion-progress'
    | 'deletion-report'
    | 'notice';

/**
 * Optional live feed of a cleanup run for WebSocket clients. Every message is
 * `{ type, data }` JSON; dates travel as ISO strings.
 */
export class ProgressWebSocketService implements ReportSink {
    private wss: WebSocketServer | null = null;
    private clients: Set<WebSocket> = new Set();

    public start(port: number, host: string = '127.0.0.1'): Promise<number> {
        if (this.wss) {
            return Promise.reject(new Error('Progress feed is already running'));
        }

        return new Promise((resolve, reject) => {
            const wss = new WebSocketServer({ port, host, path: PROGRESS_PATH });
            this.wss = wss;

            wss.on('connection', (ws: WebSocket) => {
                logger.info('Progress client connected');
                this.clients.add(ws);

                ws.on('close', () => {
                    logger.info('Progress client disconnected');
                    this.clients.delete(ws);
                });

                ws.on('error', (error: Error) => {
                    logger.error('Progress client error:', error);
                    this.clients.delete(ws);
                });
            });

            wss.once('error', (error: Error) => {
                this.wss = null;
                reject(error);
            });

            wss.once('listening', () => {
                const address = wss.address();
                const boundPort = typeof address === 'object' && address !== null ? address.port : port;
                logger.info(`Progress feed listening on ws://${host}:${boundPort}${PROGRESS_PATH}`);
                resolve(boundPort);
            });
        });
    }

    public stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) return Promise.resolve();

        this.wss = null;
        this.clients.forEach(client => client.terminate());
        this.clients.clear();

        return new Promise((resolve, reject) => {
            wss.close(error => (error ? reject(error) : resolve()));
        });
    }

    public getConnectedClientsCount(): number {
        return this.clients.size;
    }

    onRunStarted(banner: RunBanner): void {
        this.broadcast('run-started', banner);
    }

    onScanEvent(event: ScanEvent): void {
        this.broadcast('scan-event', event);
    }

    onSummary(summary: ScanSummary): void {
        this.broadcast('summary', summary);
    }

    onDeletionProgress(progress: DeletionProgress): void {
        this.broadcast('deletion-progress', progress);
    }

    onDeletionReport(report: DeletionReport): void {
        this.broadcast('deletion-report', report);
    }

    onNotice(level: NoticeLevel, message: string): void {
        this.broadcast('notice', { level, message });
    }

    private broadcast(type: ProgressMessageType, data: unknown): void {
        if (!this.wss || this.clients.size === 0) {
            return;
        }

        const message = JSON.stringify({ type, data });
        const deadClients: WebSocket[] = [];

        this.clients.forEach(client => {
            if (client.readyState === WebSocket.OPEN) {
                try {
                    client.send(message);
                } catch (error) {
                    logger.error('Error sending progress message:', error);
                    deadClients.push(client);
                }
            } else {
                deadClients.push(client);
            }
        });

        deadClients.forEach(client => this.clients.delete(client));
    }
}
