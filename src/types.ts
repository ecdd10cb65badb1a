import { z } from 'zod';

export const LICENSE_ERROR_CODES = [
    'invalid_license',
    'license_revoked',
    'license_expired',
    'email_mismatch',
    'activation_limit_reached',
    'network_error',
    'invalid_server_response',
    'missing_license_key',
    'missing_machine_fingerprint',
    'configuration_error',
] as const;

export type LicenseErrorCode = (typeof LICENSE_ERROR_CODES)[number];

export interface LicenseConfig {
    serverUrl: string;
    verifyTls: boolean;
    allowInsecureServer: boolean;
    disableHttpsFallback: boolean;
    disableHttpFallback: boolean;
    cacheMaxHours: number;
    // Reserved: read and validated, not yet consulted by the verification flow.
    offlineGraceHours: number;
    appVersion?: string;
    appName: string;
    cachePath?: string;
    envPrefix: string;
}

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export type Clock = () => Date;

export const serverLicenseSchema = z
    .object({
        activation_count: z.number().int().optional(),
        max_activations: z.number().int().optional(),
        client_name: z.string().nullish(),
        email: z.string().nullish(),
    })
    .passthrough();

export type ServerLicense = z.infer<typeof serverLicenseSchema>;

export const verifyResponseSchema = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), license: serverLicenseSchema }),
    z.object({ ok: z.literal(false), error: z.string() }),
]);

export interface VerificationSuccess {
    ok: true;
    license: ServerLicense;
}

export interface VerificationFailure {
    ok: false;
    error: LicenseErrorCode | string;
    cause?: Error;
}

export type VerificationResult = VerificationSuccess | VerificationFailure;

export interface VerifyRequestBody {
    license_key: string;
    machine_fingerprint: string;
    email: string | null;
    hostname: string;
    platform: string;
    app_version: string | null;
}

export const licensePayloadSchema = z
    .object({
        license_key: z.string().min(1),
        email: z.string().nullish(),
        client_name: z.string().nullish(),
        activation_count: z.number().int().optional(),
        max_activations: z.number().int().optional(),
        machine_fingerprint: z.string(),
        verified_at: z.string().optional(),
        cache_expires_at: z.string().optional(),
        offline_mode: z.boolean().optional(),
    })
    .passthrough();

export type LicensePayload = z.infer<typeof licensePayloadSchema>;

export const CACHE_FORMAT = 'license-cache';
export const CACHE_VERSION = 2;
export const CIPHER_ALGORITHM = 'xor-sha256';

export const encryptedBlobSchema = z.object({
    cipher: z.string().min(1),
    sig: z.string().min(1),
    algo: z.string().optional(),
});

export type EncryptedBlob = z.infer<typeof encryptedBlobSchema>;

export const cacheEnvelopeSchema = z.object({
    _format: z.literal(CACHE_FORMAT),
    version: z.literal(CACHE_VERSION),
    encrypted: z.literal(true),
    data: encryptedBlobSchema,
});

export type CacheEnvelope = z.infer<typeof cacheEnvelopeSchema>;

export interface ServerCandidate {
    url: string;
    verifyTls: boolean;
}

export interface PromptResult {
    licenseKey: string;
    email?: string;
}

/**
 * Collects a license key and email from the user. Resolves to `null` when
 * the user cancels or no interactive surface is available.
 */
export interface PromptProvider {
    requestLicense(defaultEmail?: string | null): Promise<PromptResult | null>;
}

export interface LicenseVerifier {
    verify(licenseKey: string, email?: string | null): Promise<VerificationResult>;
}

export interface EnsureLicenseOptions {
    forcePrompt?: boolean;
    quiet?: boolean;
    skipCache?: boolean;
    persistCache?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
