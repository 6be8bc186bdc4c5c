import { MessageId } from '../mailbox/mailbox.interface';

export type ClassificationAction = 'keep' | 'delete';

export interface Classification {
    action: ClassificationAction;
    reason: string;
}

export interface MessageSummary {
    readonly id: MessageId;
    readonly sender: string;
    readonly senderFull: string;
    readonly subject: string;
    readonly date: Date | null;
}

export interface DeletionCandidate extends MessageSummary {
    readonly reason: string;
}

export type ScanStopReason = 'completed' | 'cancelled' | 'connection-lost' | 'search-failed';

export interface ScanResult {
    totalUnread: number;
    processed: number;
    deleted: DeletionCandidate[];
    keptCount: number;
    skippedCount: number;
    stopReason: ScanStopReason;
    elapsedMs: number;
}

export interface ScanTally {
    processed: number;
    deletedCount: number;
    keptCount: number;
    skippedCount: number;
}

export interface SearchCompletedEvent {
    type: 'search-completed';
    totalUnread: number;
    batchCount: number;
    batchSize: number;
}

export interface BatchStartedEvent {
    type: 'batch-started';
    batchNumber: number;
    batchCount: number;
    size: number;
}

export interface CandidateFoundEvent {
    type: 'candidate-found';
    ordinal: number;
    candidate: DeletionCandidate;
}

export interface BatchCompletedEvent extends ScanTally {
    type: 'batch-completed';
    batchNumber: number;
    batchCount: number;
    total: number;
    elapsedMs: number;
    messagesPerSecond: number;
    etaSeconds: number;
}

export type ScanEvent =
    | SearchCompletedEvent
    | BatchStartedEvent
    | CandidateFoundEvent
    | BatchCompletedEvent;
