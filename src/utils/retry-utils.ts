import { Outcome, failure, success } from '@/models/shared';
import { logger } from './logger';

export type BackoffStrategy = 'fixed' | 'linear';

export interface RetryPolicy {
    maxAttempts: number;
    backoffMs: number;
    strategy: BackoffStrategy;
}

export interface RetryFailure {
    attempts: number;
    errors: Error[];
}

export interface RetryOptions {
    label: string;
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (attempt: number, error: Error) => Promise<void> | void;
}

export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => {
        if (ms <= 0) {
            resolve();
            return;
        }
        setTimeout(resolve, ms);
    });

export const toError = (error: unknown): Error =>
    error instanceof Error ? error : new Error(String(error));

export class RetryUtils {
    // failedAttempt is 1-based
    public static delayAfter(policy: RetryPolicy, failedAttempt: number): number {
        if (policy.strategy === 'linear') {
            return policy.backoffMs * failedAttempt;
        }
        return policy.backoffMs;
    }

    public static async run<T>(
        policy: RetryPolicy,
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions
    ): Promise<Outcome<T, RetryFailure>> {
        const wait = options.sleep ?? sleep;
        const maxAttempts = Math.max(1, policy.maxAttempts);
        const errors: Error[] = [];

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                return success(await operation(attempt));
            } catch (error) {
                const err = toError(error);
                errors.push(err);
                logger.warn(`${options.label}: attempt ${attempt}/${maxAttempts} failed`, err);

                if (attempt < maxAttempts) {
                    await options.onRetry?.(attempt, err);
                    await wait(RetryUtils.delayAfter(policy, attempt));
                }
            }
        }

        return failure({ attempts: maxAttempts, errors });
    }
}
