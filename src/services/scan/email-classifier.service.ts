import { CleanupRules, getDefaultRules } from '@/config/rules.config';
import { Classification, REASON_NOT_UNNECESSARY } from '@/models/scan';
import { emailUtils, logger } from '@/utils';

interface CompiledPattern {
    fragment: string;
    regex: RegExp;
}

const escapeRegex = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export class EmailClassifierService {
    private readonly patterns: CompiledPattern[];
    private readonly domains: string[];
    private readonly senderKeywords: string[];
    private readonly promoKeywords: string[];

    constructor(rules: CleanupRules = getDefaultRules()) {
        this.patterns = rules.patterns.map(fragment => ({ fragment, regex: this.compile(fragment) }));
        this.domains = rules.domains.map(domain => domain.toLowerCase());
        this.senderKeywords = rules.senderKeywords.map(keyword => keyword.toLowerCase());
        this.promoKeywords = rules.promoKeywords.map(keyword => keyword.toLowerCase());
    }

    classify(sender: string, subject: string, senderFull: string): Classification {
        const senderLower = (sender || '').toLowerCase();
        const subjectLower = (subject || '').toLowerCase();
        const fullLower = (senderFull || '').toLowerCase();

        for (const { fragment, regex } of this.patterns) {
            if (regex.test(senderLower) || regex.test(subjectLower) || regex.test(fullLower)) {
                return { action: 'delete', reason: `Contains pattern: ${fragment}` };
            }
        }

        const domain = emailUtils.extractEmailDomain(senderLower);
        if (domain) {
            const matched = this.domains.find(candidate => domain.includes(candidate));
            if (matched) {
                return { action: 'delete', reason: `Sender domain: ${matched}` };
            }
        }

        const localPart = emailUtils.extractLocalPart(senderLower);
        const senderKeyword = this.senderKeywords.find(keyword => localPart.includes(keyword));
        if (senderKeyword) {
            return { action: 'delete', reason: `Sender name contains: ${senderKeyword}` };
        }

        const promoKeyword = this.promoKeywords.find(keyword => subjectLower.includes(keyword));
        if (promoKeyword) {
            return { action: 'delete', reason: `Promotional keyword: ${promoKeyword}` };
        }

        return { action: 'keep', reason: REASON_NOT_UNNECESSARY };
    }

    private compile(fragment: string): RegExp {
        try {
            return new RegExp(fragment, 'i');
        } catch (error) {
            logger.warn(`Pattern "${fragment}" is not a valid regular expression, matching it literally`, error);
            return new RegExp(escapeRegex(fragment), 'i');
        }
    }
}
