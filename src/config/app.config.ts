import { z } from 'zod';
import { ConfigError } from '@/models/errors';
import { RetryPolicy, validationUtils } from '@/utils';

export const DEFAULT_CUTOFF_DATE = '2025-06-01';
export const DEFAULT_FETCH_BATCH_SIZE = 100;
export const DEFAULT_DELETE_BATCH_SIZE = 50;

const TRUTHY = ['true', '1', 'yes', 'on'] as const;
const FALSY = ['false', '0', 'no', 'off'] as const;

const emptyToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
    z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
    z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const flag = (fallback: boolean) =>
    z.preprocess(
        value => {
            const normalized = emptyToUndefined(value);
            return typeof normalized === 'string' ? normalized.trim().toLowerCase() : normalized;
        },
        z.enum([...TRUTHY, ...FALSY]).optional()
    ).transform(value => (value === undefined ? fallback : TRUTHY.some(truthy => truthy === value)));

const cutoffDate = z.preprocess(
    emptyToUndefined,
    z.string().default(DEFAULT_CUTOFF_DATE)
).transform((value, ctx) => {
    const parsed = validationUtils.parseCutoffDate(value);
    if (!parsed) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${value}" is not an ISO date (YYYY-MM-DD) or date-time`
        });
        return z.NEVER;
    }
    return parsed;
});

export const envSchema = z.object({
    IMAP_USER: optionalString,
    IMAP_PASSWORD: z.preprocess(emptyToUndefined, z.string().optional()),
    IMAP_HOST: optionalString,
    IMAP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).optional()),
    IMAP_TLS: flag(true),
    IMAP_TLS_REJECT_UNAUTHORIZED: flag(true),
    IMAP_MAILBOX: z.preprocess(emptyToUndefined, z.string().trim().default('INBOX')),
    IMAP_CONN_TIMEOUT_MS: positiveInt(15000),
    IMAP_AUTH_TIMEOUT_MS: positiveInt(15000),
    IMAP_SOCKET_TIMEOUT_MS: positiveInt(60000),
    CUTOFF_DATE: cutoffDate,
    FETCH_BATCH_SIZE: positiveInt(DEFAULT_FETCH_BATCH_SIZE),
    DELETE_BATCH_SIZE: positiveInt(DEFAULT_DELETE_BATCH_SIZE),
    CONNECT_MAX_ATTEMPTS: positiveInt(3),
    CONNECT_BACKOFF_MS: nonNegativeInt(2000),
    SEARCH_MAX_ATTEMPTS: positiveInt(3),
    SEARCH_BACKOFF_MS: nonNegativeInt(3000),
    MESSAGE_MAX_ATTEMPTS: positiveInt(2),
    MESSAGE_BACKOFF_MS: nonNegativeInt(1000),
    CLEANUP_RULES_FILE: optionalString,
    DRY_RUN: flag(false),
    REPORT_SAMPLE_SIZE: nonNegativeInt(5),
    PROGRESS_WS_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).optional()),
    LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(['error', 'warn', 'info', 'debug']).default('warn'))
});

export interface ImapSettings {
    user?: string;
    password?: string;
    host?: string;
    port?: number;
    tls: boolean;
    rejectUnauthorized: boolean;
    mailbox: string;
    connTimeoutMs: number;
    authTimeoutMs: number;
    socketTimeoutMs: number;
}

export interface CleanupSettings {
    cutoff: Date;
    fetchBatchSize: number;
    deleteBatchSize: number;
    rulesFile?: string;
    dryRun: boolean;
    reportSampleSize: number;
}

export interface RetrySettings {
    connect: RetryPolicy;
    search: RetryPolicy;
    message: RetryPolicy;
}

export interface AppConfig {
    imap: ImapSettings;
    cleanup: CleanupSettings;
    retry: RetrySettings;
    progressWsPort?: number;
    logLevel: string;
}

export interface ConfigOverrides {
    user?: string;
    cutoff?: string;
    mailbox?: string;
    batchSize?: string;
    rulesFile?: string;
    dryRun?: boolean;
}

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const values = parsed.data;
    return {
        imap: {
            user: values.IMAP_USER,
            password: values.IMAP_PASSWORD,
            host: values.IMAP_HOST,
            port: values.IMAP_PORT,
            tls: values.IMAP_TLS,
            rejectUnauthorized: values.IMAP_TLS_REJECT_UNAUTHORIZED,
            mailbox: values.IMAP_MAILBOX,
            connTimeoutMs: values.IMAP_CONN_TIMEOUT_MS,
            authTimeoutMs: values.IMAP_AUTH_TIMEOUT_MS,
            socketTimeoutMs: values.IMAP_SOCKET_TIMEOUT_MS
        },
        cleanup: {
            cutoff: values.CUTOFF_DATE,
            fetchBatchSize: values.FETCH_BATCH_SIZE,
            deleteBatchSize: values.DELETE_BATCH_SIZE,
            rulesFile: values.CLEANUP_RULES_FILE,
            dryRun: values.DRY_RUN,
            reportSampleSize: values.REPORT_SAMPLE_SIZE
        },
        retry: {
            connect: { maxAttempts: values.CONNECT_MAX_ATTEMPTS, backoffMs: values.CONNECT_BACKOFF_MS, strategy: 'fixed' },
            search: { maxAttempts: values.SEARCH_MAX_ATTEMPTS, backoffMs: values.SEARCH_BACKOFF_MS, strategy: 'linear' },
            message: { maxAttempts: values.MESSAGE_MAX_ATTEMPTS, backoffMs: values.MESSAGE_BACKOFF_MS, strategy: 'fixed' }
        },
        progressWsPort: values.PROGRESS_WS_PORT,
        logLevel: values.LOG_LEVEL
    };
};

export const applyOverrides = (config: AppConfig, overrides: ConfigOverrides): AppConfig => {
    const issues: string[] = [];
    const imap = { ...config.imap };
    const cleanup = { ...config.cleanup };

    if (overrides.user) imap.user = overrides.user.trim();
    if (overrides.mailbox) imap.mailbox = overrides.mailbox.trim();
    if (overrides.rulesFile) cleanup.rulesFile = overrides.rulesFile;
    if (overrides.dryRun) cleanup.dryRun = true;

    if (overrides.cutoff !== undefined) {
        const cutoff = validationUtils.parseCutoffDate(overrides.cutoff);
        if (cutoff) {
            cleanup.cutoff = cutoff;
        } else {
            issues.push(`--cutoff: "${overrides.cutoff}" is not an ISO date (YYYY-MM-DD) or date-time`);
        }
    }

    if (overrides.batchSize !== undefined) {
        const batchSize = Number(overrides.batchSize);
        if (Number.isInteger(batchSize) && batchSize > 0) {
            cleanup.fetchBatchSize = batchSize;
        } else {
            issues.push(`--batch-size: "${overrides.batchSize}" is not a positive integer`);
        }
    }

    if (imap.user && !validationUtils.isValidEmailAddress(imap.user)) {
        issues.push(`user: "${imap.user}" is not an email address`);
    }

    if (issues.length > 0) {
        throw new ConfigError(issues);
    }

    return { ...config, imap, cleanup };
};
