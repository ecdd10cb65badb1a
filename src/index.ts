import { SetOnce, applyLicenseEnvironment, processLicense } from './applied';
import { CacheCodec, defaultCachePath } from './cache';
import { CandidateResolver } from './candidates';
import { VerificationClient } from './client';
import { loadConfig } from './config';
import { LicenseRequiredError } from './errors';
import { computeMachineFingerprint } from './fingerprint';
import { LICENSE_REQUIRED_MESSAGE, humanizeError, maskLicenseKey } from './messages';
import { ConsolePromptProvider } from './prompt';
import {
    Clock,
    EnsureLicenseOptions,
    LicenseConfig,
    LicensePayload,
    LicenseVerifier,
    Logger,
    PromptProvider,
    ServerLicense,
    VerificationResult,
} from './types';

export const MAX_ATTEMPTS = 3;

const HOUR = 60 * 60 * 1000;
const OFFLINE_ERRORS = new Set(['network_error', 'invalid_server_response']);

export interface LicenseManagerOptions {
    prompt?: PromptProvider;
    verifier?: LicenseVerifier;
    cache?: CacheCodec;
    machineFingerprint?: string;
    logger?: Logger;
    clock?: Clock;
    appliedLicense?: SetOnce<LicensePayload>;
    env?: NodeJS.ProcessEnv;
    showError?: (message: string) => void;
}

export class LicenseManager {
    readonly machineFingerprint: string;
    private readonly prompt: PromptProvider;
    private readonly verifier: LicenseVerifier;
    private readonly cache: CacheCodec;
    private readonly logger: Logger;
    private readonly clock: Clock;
    private readonly applied: SetOnce<LicensePayload>;
    private readonly env: NodeJS.ProcessEnv;
    private readonly showError: (message: string) => void;

    /**
     * @throws {ConfigurationError} If the license server URL is unusable.
     */
    constructor(
        private readonly config: LicenseConfig,
        options: LicenseManagerOptions = {}
    ) {
        const resolver = new CandidateResolver(config);

        this.logger = options.logger ?? console;
        this.clock = options.clock ?? (() => new Date());
        this.machineFingerprint = options.machineFingerprint ?? computeMachineFingerprint();
        this.prompt = options.prompt ?? new ConsolePromptProvider();
        this.verifier =
            options.verifier ??
            new VerificationClient(resolver, {
                machineFingerprint: this.machineFingerprint,
                appVersion: config.appVersion,
                logger: this.logger,
            });
        this.cache =
            options.cache ??
            new CacheCodec(this.machineFingerprint, config.cachePath ?? defaultCachePath(config.appName), {
                logger: this.logger,
                clock: this.clock,
            });
        this.applied = options.appliedLicense ?? processLicense;
        this.env = options.env ?? process.env;
        this.showError = options.showError ?? ((message) => console.error(`ERROR: ${message}`));
    }

    /**
     * Makes sure this installation holds a verified license, prompting for a
     * key when none is cached and retrying up to three times.
     *
     * When the server cannot be reached, a cached activation for the same key
     * and device is accepted with `offline_mode` set.
     * @returns The license payload, or `null` when verification could not be completed.
     */
    public async ensureValidLicense(options: EnsureLicenseOptions = {}): Promise<LicensePayload | null> {
        const { forcePrompt = false, quiet = false, skipCache = false, persistCache = true } = options;

        const current = this.applied.get();
        if (current && !forcePrompt && !skipCache) {
            this.logger.debug('LicenseManager: Using license already applied to this process.');
            return current;
        }

        const cached = forcePrompt ? null : await this.cache.load();
        let email = cached?.email ?? null;
        if (!persistCache) {
            await this.cache.remove();
        }
        let licenseKey = skipCache ? null : cached?.license_key ?? null;

        let attempts = 0;
        while (attempts < MAX_ATTEMPTS) {
            if (!licenseKey) {
                const entry = quiet ? null : await this.prompt.requestLicense(email);
                if (!entry) {
                    if (!quiet) {
                        this.showError(LICENSE_REQUIRED_MESSAGE);
                    }
                    return null;
                }
                licenseKey = entry.licenseKey;
                email = entry.email || null;
            }

            const result = await this.verifier.verify(licenseKey, email);
            if (result.ok) {
                return this.acceptVerified(result.license, licenseKey, email, persistCache);
            }

            if (!skipCache && cached && this.canFallBack(cached, licenseKey, result.error)) {
                const offline: LicensePayload = { ...cached, offline_mode: true };
                this.apply(offline);
                this.logger.warn(
                    'LicenseManager: License server unreachable; proceeding in offline mode with cached activation.'
                );
                return offline;
            }

            attempts += 1;
            this.logger.debug(`LicenseManager: Verification attempt ${attempts} failed: ${result.error}`);
            if (!quiet) {
                this.showError(humanizeError(result.error));
            }
            licenseKey = null;
        }

        this.logger.error(`LicenseManager: License verification failed after ${MAX_ATTEMPTS} attempts.`);
        return null;
    }

    /**
     * Returns the cached license if it is present, intact, bound to this device and unexpired.
     */
    public async loadCachedLicense(): Promise<LicensePayload | null> {
        return this.cache.load();
    }

    /**
     * One verification round trip, without the cache or the prompt.
     */
    public async verify(licenseKey: string, email?: string | null): Promise<VerificationResult> {
        return this.verifier.verify(licenseKey, email);
    }

    private canFallBack(cached: LicensePayload, licenseKey: string, error: string): boolean {
        return (
            cached.license_key === licenseKey &&
            cached.machine_fingerprint === this.machineFingerprint &&
            !this.cache.isExpired(cached) &&
            OFFLINE_ERRORS.has(error)
        );
    }

    private async acceptVerified(
        license: ServerLicense,
        licenseKey: string,
        email: string | null,
        persistCache: boolean
    ): Promise<LicensePayload> {
        const now = this.clock();
        const payload: LicensePayload = {
            ...license,
            license_key: licenseKey,
            email: email || license.email || null,
            machine_fingerprint: this.machineFingerprint,
            verified_at: now.toISOString(),
            cache_expires_at: new Date(now.getTime() + this.config.cacheMaxHours * HOUR).toISOString(),
            offline_mode: false,
        };

        if (persistCache) {
            await this.cache.persist(payload);
        } else {
            await this.cache.remove();
        }
        this.apply(payload);

        this.logger.info(
            `LicenseManager: License verified (${maskLicenseKey(licenseKey)}) ` +
                `[activation ${payload.activation_count}/${payload.max_activations}]`
        );
        return payload;
    }

    private apply(payload: LicensePayload): void {
        if (this.applied.set(payload)) {
            applyLicenseEnvironment(payload, this.machineFingerprint, this.env, this.config.envPrefix);
        }
    }
}

/**
 * Entry point for command-line hosts: verifies with the console prompt and
 * the environment's configuration.
 * @throws {LicenseRequiredError} If no license could be verified.
 */
export async function ensureCliLicense(
    options: EnsureLicenseOptions = {},
    env: NodeJS.ProcessEnv = process.env
): Promise<LicensePayload> {
    const manager = new LicenseManager(loadConfig(env), { prompt: new ConsolePromptProvider(), env });
    const payload = await manager.ensureValidLicense(options);
    if (!payload) {
        throw new LicenseRequiredError();
    }
    return payload;
}

export * from './types';
export * from './errors';
export { SetOnce, processLicense, applyLicenseEnvironment } from './applied';
export { CacheCodec, resolveDataDir, defaultCachePath } from './cache';
export { CandidateResolver, isLoopbackHost } from './candidates';
export { VerificationClient } from './client';
export { loadConfig } from './config';
export { computeMachineFingerprint } from './fingerprint';
export { humanizeError, maskLicenseKey } from './messages';
export { ConsolePromptProvider, NullPromptProvider } from './prompt';
