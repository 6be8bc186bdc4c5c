import readline from 'readline';
import { ConfirmationPrompt, TextPrompt } from '@/models/auth';
import { logger, validationUtils } from '@/utils';

const ENTER = ['\r', '\n', '\u0004'];
const CTRL_C = '\u0003';
const BACKSPACE = ['\u007f', '\b'];

export type PromptInput = NodeJS.ReadableStream & {
    isTTY?: boolean;
    setRawMode?(mode: boolean): unknown;
};

export class PromptService implements TextPrompt, ConfirmationPrompt {
    constructor(
        private input: PromptInput = process.stdin,
        private output: NodeJS.WritableStream = process.stdout
    ) {}

    public ask(question: string): Promise<string> {
        const rl = readline.createInterface({ input: this.input, output: this.output });

        return new Promise(resolve => {
            let answered = false;

            rl.on('SIGINT', () => rl.close());
            rl.once('close', () => {
                if (!answered) {
                    this.output.write('\n');
                    resolve('');
                }
            });
            rl.question(question, answer => {
                answered = true;
                rl.close();
                resolve(answer);
            });
        });
    }

    public askHidden(question: string): Promise<string> {
        const input = this.input;
        const setRawMode = input.setRawMode?.bind(input);
        if (!input.isTTY || !setRawMode) {
            logger.warn('stdin is not a terminal, the password will be read as plain input');
            return this.ask(question);
        }

        return new Promise((resolve, reject) => {
            let secret = '';

            const cleanup = () => {
                input.off('data', onData);
                setRawMode(false);
                input.pause();
                this.output.write('\n');
            };

            const onData = (chunk: Buffer | string) => {
                for (const char of chunk.toString()) {
                    if (ENTER.includes(char)) {
                        cleanup();
                        resolve(secret);
                        return;
                    }
                    if (char === CTRL_C) {
                        cleanup();
                        reject(new Error('Input cancelled'));
                        return;
                    }
                    if (BACKSPACE.includes(char)) {
                        secret = secret.slice(0, -1);
                    } else {
                        secret += char;
                    }
                }
            };

            this.output.write(question);
            setRawMode(true);
            input.resume();
            input.on('data', onData);
        });
    }

    public async confirm(question: string): Promise<boolean> {
        const answer = await this.ask(question);
        return validationUtils.isAffirmative(answer);
    }
}
