#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { LicenseManager, LicenseManagerOptions } from './index';
import { loadConfig } from './config';
import { ConfigurationError } from './errors';
import { maskLicenseKey } from './messages';
import { ConsolePromptProvider, NullPromptProvider, isInteractive } from './prompt';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliContext {
    env: NodeJS.ProcessEnv;
    out: (text: string) => void;
    err: (text: string) => void;
    managerOptions?: LicenseManagerOptions;
}

interface VerifyFlags {
    force?: boolean;
    quiet?: boolean;
    cache: boolean;
    persist: boolean;
    stateless?: boolean;
}

interface CheckFlags {
    licenseKey: string;
    email?: string;
}

function createManager(context: CliContext, quiet: boolean = false): LicenseManager {
    const prompt = !quiet && isInteractive() ? new ConsolePromptProvider() : new NullPromptProvider();
    return new LicenseManager(loadConfig(context.env), { prompt, env: context.env, ...context.managerOptions });
}

async function verifyCommand(flags: VerifyFlags, context: CliContext): Promise<number> {
    const skipCache = Boolean(flags.stateless) || !flags.cache;
    const persistCache = !flags.stateless && flags.persist;
    const quiet = Boolean(flags.quiet);

    const manager = createManager(context, quiet);
    const payload = await manager.ensureValidLicense({
        forcePrompt: Boolean(flags.force) || skipCache,
        quiet,
        skipCache,
        persistCache,
    });
    return payload ? EXIT_OK : EXIT_FAILURE;
}

async function checkCommand(flags: CheckFlags, context: CliContext): Promise<number> {
    const licenseKey = flags.licenseKey.trim().toUpperCase();
    if (!licenseKey) {
        context.err('License key cannot be blank.\n');
        return EXIT_USAGE;
    }

    const manager = createManager(context, true);
    const result = await manager.verify(licenseKey, flags.email?.trim() || null);
    if (result.ok) {
        context.out(`${JSON.stringify(result.license, null, 2)}\n`);
        return EXIT_OK;
    }
    context.err(`Verification failed: ${result.error}\n`);
    return EXIT_FAILURE;
}

async function statusCommand(context: CliContext): Promise<number> {
    const manager = createManager(context, true);
    const payload = await manager.loadCachedLicense();
    if (!payload) {
        context.err('No valid cached license found.\n');
        return EXIT_FAILURE;
    }
    context.out(`${JSON.stringify({ ...payload, license_key: maskLicenseKey(payload.license_key) }, null, 2)}\n`);
    return EXIT_OK;
}

/**
 * Runs the command line and resolves to the process exit code:
 * 0 verified, 1 verification failed, 2 bad usage or configuration.
 */
export async function runCli(argv: string[], overrides: Partial<CliContext> = {}): Promise<number> {
    const context: CliContext = {
        env: process.env,
        out: (text) => process.stdout.write(text),
        err: (text) => process.stderr.write(text),
        ...overrides,
    };
    let exitCode = EXIT_OK;

    const program = new Command();
    program
        .name('device-license')
        .description('Activate and verify the license bound to this device')
        .exitOverride()
        .configureOutput({ writeOut: context.out, writeErr: context.err });

    program
        .command('verify', { isDefault: true })
        .description('Verify the license, prompting for a key when none is cached')
        .option('--force', 'Prompt for a license even if a cached activation exists')
        .option('--quiet', 'Never prompt; fail when verification needs input')
        .option('--no-cache', 'Ignore the cached activation and always verify online')
        .option('--no-persist', 'Do not write a verified license to the local cache')
        .option('--stateless', 'Shortcut for --no-cache --no-persist')
        .action(async (flags: VerifyFlags) => {
            exitCode = await verifyCommand(flags, context);
        });

    program
        .command('check')
        .description('Verify a license key directly with the server without touching the cache')
        .requiredOption('--license-key <key>', 'License key to verify')
        .option('--email <email>', 'Registered email address for the license')
        .action(async (flags: CheckFlags) => {
            exitCode = await checkCommand(flags, context);
        });

    program
        .command('status')
        .description('Show the cached activation for this device')
        .action(async () => {
            exitCode = await statusCommand(context);
        });

    try {
        await program.parseAsync(argv, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
        }
        if (error instanceof ConfigurationError) {
            context.err(`Error: ${error.message}\n`);
            return EXIT_USAGE;
        }
        throw error;
    }
    return exitCode;
}

if (require.main === module) {
    loadDotenv();
    runCli(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error('Fatal error:', error instanceof Error ? error.message : error);
            process.exit(1);
        });
}
