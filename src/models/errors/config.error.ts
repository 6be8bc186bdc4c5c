export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigError';
    }
}
