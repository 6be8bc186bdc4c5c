import { ParsedMail, simpleParser } from 'mailparser';
import { emailUtils, logger } from '@/utils';

export interface DecodedHeaders {
    sender: string;
    senderFull: string;
    subject: string;
    date: string | null;
}

const REPLACEMENT_CHAR = /\uFFFD/g;

export class HeaderDecoderService {
    // mailparser unfolds continuation lines and decodes RFC 2047 words
    async decodeHeaders(raw: Buffer | string): Promise<DecodedHeaders> {
        try {
            const parsed = await simpleParser(raw);
            const from = parsed.from?.value[0];

            return {
                sender: this.decode(from?.address),
                senderFull: this.decode(emailUtils.formatAddress(from)),
                subject: this.decode(parsed.subject),
                date: this.headerValue(parsed.headerLines, 'date')
            };
        } catch (error) {
            logger.warn('Could not parse header block:', error);
            return { sender: '', senderFull: '', subject: '', date: null };
        }
    }

    decode(value: string | null | undefined): string {
        if (value === null || value === undefined) return '';
        return value.replace(REPLACEMENT_CHAR, '').trim();
    }

    private headerValue(lines: ParsedMail['headerLines'], name: string): string | null {
        const entry = lines.find(line => line.key === name);
        if (!entry) return null;

        const value = entry.line.slice(entry.line.indexOf(':') + 1).replace(/\s+/g, ' ').trim();
        return value || null;
    }
}

export const headerDecoder = new HeaderDecoderService();
