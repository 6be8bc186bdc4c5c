export class ConnectFailure extends Error {
    constructor(
        message: string,
        public readonly attempts: number,
        public readonly causes: Error[] = []
    ) {
        super(message);
        this.name = 'ConnectFailure';
    }

    get lastCause(): Error | undefined {
        return this.causes[this.causes.length - 1];
    }
}
