import fs from 'fs';
import { z } from 'zod';
import defaultRules from './cleanup-rules.json';
import { ConfigError } from '@/models/errors';
import { logger } from '@/utils';

const ruleList = z.array(z.string().trim().min(1)).default([]);

export const cleanupRulesSchema = z.object({
    patterns: ruleList,
    domains: ruleList,
    senderKeywords: ruleList,
    promoKeywords: ruleList
});

export type CleanupRules = z.infer<typeof cleanupRulesSchema>;

const toIssues = (error: z.ZodError, source: string): string[] =>
    error.issues.map(issue => `${source}: ${issue.path.join('.') || '(root)'} ${issue.message}`);

export const parseCleanupRules = (raw: unknown, source: string = 'rules'): CleanupRules => {
    const parsed = cleanupRulesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(toIssues(parsed.error, source));
    }
    return parsed.data;
};

export const getDefaultRules = (): CleanupRules => parseCleanupRules(defaultRules, 'cleanup-rules.json');

export const loadRulesFile = (filePath: string): CleanupRules => {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        logger.error(`Could not read rules file ${filePath}:`, error);
        throw new ConfigError([`CLEANUP_RULES_FILE: cannot read ${filePath}`]);
    }

    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (error) {
        throw new ConfigError([`CLEANUP_RULES_FILE: ${filePath} is not valid JSON`]);
    }

    const rules = parseCleanupRules(json, filePath);
    logger.info(`Loaded cleanup rules from ${filePath}`, {
        patterns: rules.patterns.length,
        domains: rules.domains.length,
        senderKeywords: rules.senderKeywords.length,
        promoKeywords: rules.promoKeywords.length
    });
    return rules;
};
