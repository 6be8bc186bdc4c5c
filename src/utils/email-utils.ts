import { EmailAddress } from 'mailparser';

export class EmailUtilsService {
    formatAddress(address: EmailAddress | undefined): string {
        if (!address) return '';

        const mailbox = address.address ?? '';
        const name = address.name.trim();
        if (!name) return mailbox;
        return mailbox ? `${name} <${mailbox}>` : name;
    }

    extractEmailDomain(address: string): string {
        const at = address.lastIndexOf('@');
        return at === -1 ? '' : address.slice(at + 1).toLowerCase();
    }

    extractLocalPart(address: string): string {
        const at = address.indexOf('@');
        return (at === -1 ? address : address.slice(0, at)).toLowerCase();
    }

    truncate(text: string, maxLength: number): string {
        if (text.length <= maxLength) return text;
        return `${text.slice(0, maxLength)}...`;
    }
}

export const emailUtils = new EmailUtilsService();
