import { CredentialSource, TextPrompt } from '@/models/auth';
import { ConfigError } from '@/models/errors';
import { MailboxCredentials } from '@/models/mailbox';
import { logger, validationUtils } from '@/utils';

export interface KnownCredentials {
    user?: string;
    password?: string;
}

export class CredentialsService implements CredentialSource {
    constructor(
        private known: KnownCredentials,
        private prompt: TextPrompt
    ) {}

    public async getCredentials(): Promise<MailboxCredentials> {
        const user = (this.known.user ?? (await this.prompt.ask('Email address: '))).trim();
        if (!validationUtils.isValidEmailAddress(user)) {
            throw new ConfigError([`IMAP_USER: "${user}" is not a valid email address`]);
        }

        const password = this.known.password ?? (await this.prompt.askHidden(`Password (or app password) for ${user}: `));
        if (!password) {
            throw new ConfigError(['IMAP_PASSWORD: a password is required']);
        }

        logger.debug(`Credentials ready for ${user}`);
        return { user, password };
    }
}
