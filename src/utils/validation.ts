const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T[\d:.]+$/;

export class ValidationUtils {
    isAffirmative(answer: string): boolean {
        return answer.trim().toLowerCase() === 'yes';
    }

    parseCutoffDate(value: string): Date | null {
        if (!value) return null;

        const trimmed = value.trim();
        let normalized = trimmed;
        if (ISO_DATE.test(trimmed)) {
            normalized = `${trimmed}T00:00:00Z`;
        } else if (ISO_LOCAL_DATE_TIME.test(trimmed)) {
            normalized = `${trimmed}Z`;
        }

        const timestamp = Date.parse(normalized);

        return Number.isNaN(timestamp) ? null : new Date(timestamp);
    }

    isValidEmailAddress(address: string): boolean {
        return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(address);
    }
}

export const validationUtils = new ValidationUtils();
