const COMMENTS = /\([^)]*\)/g;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d/i;
const KNOWN_ZONE = /(?:\s|\d|gmt|utc?)[+-]\d{2}:?\d{2}$|(?:\s|\d)(?:z|ut|utc|gmt|[ecmp][sd]t)$/i;
const UNKNOWN_ZONE = /(\d{1,2}:\d{2}(?::\d{2})?)\s+[a-z]{1,5}$/i;

export class DateParserService {
    /**
     * Reads a Date header into an absolute instant, or `null` when it cannot be read.
     * A value without a zone is taken as UTC, and so is an unrecognised zone name.
     */
    parse(raw: string | null | undefined): Date | null {
        if (!raw) return null;

        const text = raw.replace(COMMENTS, ' ').replace(/\s+/g, ' ').trim();
        if (!/\d/.test(text)) return null;

        const timestamp = Date.parse(this.withZone(text));
        return Number.isNaN(timestamp) ? null : new Date(timestamp);
    }

    private withZone(text: string): string {
        if (KNOWN_ZONE.test(text)) return text;
        if (ISO_DATE_ONLY.test(text)) return `${text}T00:00:00Z`;
        if (ISO_DATE_TIME.test(text)) return `${text}Z`;
        return `${text.replace(UNKNOWN_ZONE, '$1')} GMT`;
    }
}

export const dateParser = new DateParserService();
