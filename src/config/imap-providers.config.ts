import { logger } from '@/utils';

export interface ImapProviderConfig {
    imapHost: string;
    imapPort: number;
}

const gmail: ImapProviderConfig = { imapHost: 'imap.gmail.com', imapPort: 993 };
const outlook: ImapProviderConfig = { imapHost: 'outlook.office365.com', imapPort: 993 };
const icloud: ImapProviderConfig = { imapHost: 'imap.mail.me.com', imapPort: 993 };

const imapProvidersConfig: { [domain: string]: ImapProviderConfig } = {
    'gmail.com': gmail,
    'googlemail.com': gmail,
    'outlook.com': outlook,
    'hotmail.com': outlook,
    'live.com': outlook,
    'yahoo.com': { imapHost: 'imap.mail.yahoo.com', imapPort: 993 },
    'icloud.com': icloud,
    'me.com': icloud,
    'mail.ru': { imapHost: 'imap.mail.ru', imapPort: 993 },
    'yandex.ru': { imapHost: 'imap.yandex.ru', imapPort: 993 }
};

export const DEFAULT_IMAP_PROVIDER: ImapProviderConfig = gmail;

export class ImapProviderService {
    public getProviderConfig(email: string): ImapProviderConfig | null {
        const domain = email.split('@')[1]?.toLowerCase();
        if (!domain) return null;

        const config = imapProvidersConfig[domain];
        if (config) {
            logger.debug(`IMAP preset for ${domain}: ${config.imapHost}:${config.imapPort}`);
            return config;
        }

        logger.debug(`No IMAP preset for domain: ${domain}`);
        return null;
    }

    public resolve(email: string, host?: string, port?: number): ImapProviderConfig {
        if (host) {
            return { imapHost: host, imapPort: port ?? 993 };
        }

        const preset = this.getProviderConfig(email) ?? DEFAULT_IMAP_PROVIDER;
        return { imapHost: preset.imapHost, imapPort: port ?? preset.imapPort };
    }
}

export const imapProviderService = new ImapProviderService();
