export type CancellationListener = (reason: string) => void;

export class CancellationToken {
    private requested = false;
    private reason: string | null = null;
    private listeners: Set<CancellationListener> = new Set();

    public cancel(reason: string = 'cancellation requested'): void {
        if (this.requested) return;

        this.requested = true;
        this.reason = reason;
        for (const listener of this.listeners) {
            listener(reason);
        }
    }

    public get isCancellationRequested(): boolean {
        return this.requested;
    }

    public get cancellationReason(): string | null {
        return this.reason;
    }

    public onCancel(listener: CancellationListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
}
