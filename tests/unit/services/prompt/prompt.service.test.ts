import { describe, test, expect, beforeEach } from '@jest/globals';
import { PassThrough, Writable } from 'stream';
import { PromptService } from '@/services/prompt/prompt.service';

class FakeTerminalInput extends PassThrough {
    isTTY = true;
    readonly rawModes: boolean[] = [];

    setRawMode(mode: boolean): this {
        this.rawModes.push(mode);
        return this;
    }
}

describe('PromptService', () => {
    let written: string[];
    let output: Writable;

    beforeEach(() => {
        written = [];
        output = new Writable({
            write(chunk: Buffer | string, _encoding, callback) {
                written.push(chunk.toString());
                callback();
            }
        });
    });

    test('ask returns the typed line', async () => {
        const input = new PassThrough();
        const prompt = new PromptService(input, output);

        const answer = prompt.ask('Email address: ');
        input.write('user@example.com\n');

        await expect(answer).resolves.toBe('user@example.com');
        expect(written.join('')).toContain('Email address: ');
    });

    test('confirm accepts only an explicit yes', async () => {
        const input = new PassThrough();
        const prompt = new PromptService(input, output);

        const accepted = prompt.confirm('Proceed? ');
        input.write('  YES \n');
        await expect(accepted).resolves.toBe(true);

        const declined = prompt.confirm('Proceed? ');
        input.write('y\n');
        await expect(declined).resolves.toBe(false);
    });

    test('closed input counts as an empty answer', async () => {
        const input = new PassThrough();
        const prompt = new PromptService(input, output);

        const answer = prompt.confirm('Proceed? ');
        input.end();

        await expect(answer).resolves.toBe(false);
    });

    test('hidden input is read in raw mode without echo', async () => {
        const input = new FakeTerminalInput();
        const prompt = new PromptService(input, output);

        const secret = prompt.askHidden('Password: ');
        input.write('tesx');
        input.write('\u007f');
        input.write('t-secret\r');

        await expect(secret).resolves.toBe('test-secret');
        expect(input.rawModes).toEqual([true, false]);
        expect(written).toEqual(['Password: ', '\n']);
    });

    test('Ctrl-C cancels hidden input', async () => {
        const input = new FakeTerminalInput();
        const prompt = new PromptService(input, output);

        const secret = prompt.askHidden('Password: ');
        input.write('abc\u0003');

        await expect(secret).rejects.toThrow('Input cancelled');
        expect(input.rawModes).toEqual([true, false]);
    });
});
