import * as readline from 'readline';
import { PromptProvider, PromptResult } from './types';

export function isInteractive(): boolean {
    return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function ask(rl: readline.Interface, question: string): Promise<string | null> {
    return new Promise((resolve) => {
        const onClose = () => resolve(null);
        rl.once('close', onClose);
        rl.question(question, (answer) => {
            rl.off('close', onClose);
            resolve(answer);
        });
    });
}

/**
 * Asks for the license key and email on the terminal. An empty key, EOF or
 * Ctrl-C cancels.
 */
export class ConsolePromptProvider implements PromptProvider {
    constructor(
        private readonly input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {}

    async requestLicense(defaultEmail?: string | null): Promise<PromptResult | null> {
        const rl = readline.createInterface({ input: this.input, output: this.output });
        rl.once('SIGINT', () => rl.close());

        try {
            this.output.write('\n=== License Verification ===\n');
            const key = await ask(rl, 'License key: ');
            const licenseKey = key?.trim().toUpperCase();
            if (!licenseKey) {
                return null;
            }

            const email = await ask(rl, `Registered email [${defaultEmail || 'optional'}]: `);
            if (email === null) {
                return null;
            }
            return { licenseKey, email: email.trim() || defaultEmail || '' };
        } finally {
            rl.close();
        }
    }
}

/** For hosts without an interactive surface. */
export class NullPromptProvider implements PromptProvider {
    async requestLicense(): Promise<PromptResult | null> {
        return null;
    }
}
