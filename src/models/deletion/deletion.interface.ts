export interface DeletionReport {
    requested: number;
    successful: number;
    failed: number;
    committed: boolean;
    commitError?: string;
}

export interface DeletionProgress {
    successful: number;
    failed: number;
    total: number;
    failedSubject?: string;
}
