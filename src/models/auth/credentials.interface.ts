import { MailboxCredentials } from '../mailbox/mailbox.interface';

export interface CredentialSource {
    getCredentials(): Promise<MailboxCredentials>;
}

export interface ConfirmationPrompt {
    confirm(question: string): Promise<boolean>;
}

export interface TextPrompt {
    ask(question: string): Promise<string>;
    askHidden(question: string): Promise<string>;
}
