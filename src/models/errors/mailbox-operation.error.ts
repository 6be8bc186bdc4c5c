export type MailboxOperation =
    | 'connect'
    | 'select'
    | 'search'
    | 'fetch'
    | 'store'
    | 'expunge'
    | 'probe'
    | 'unselect'
    | 'logout';

export class MailboxOperationError extends Error {
    constructor(
        public readonly operation: MailboxOperation,
        message: string,
        public readonly cause?: unknown
    ) {
        super(`${operation} failed: ${message}`);
        this.name = 'MailboxOperationError';
    }
}
