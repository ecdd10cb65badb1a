import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LicenseConfig } from './types';

export const DEFAULT_LICENSE_SERVER = 'https://license.example.com';
export const DEFAULT_APP_NAME = 'device-license';
export const DEFAULT_ENV_PREFIX = 'APP_LICENSE';

const TRUTHY = new Set(['1', 'true', 'yes']);
const FALSY = new Set(['0', 'false', 'no']);

const optIn = z
    .string()
    .optional()
    .transform((value) => TRUTHY.has((value ?? '').trim().toLowerCase()));

const optOut = z
    .string()
    .optional()
    .transform((value) => !FALSY.has((value ?? '').trim().toLowerCase()));

const optionalText = z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined);

function hours(fallback: number) {
    return z
        .string()
        .optional()
        .transform((value) => value?.trim() || String(fallback))
        .pipe(z.string().regex(/^-?\d+$/, 'must be a whole number of hours'))
        .transform((value) => Math.max(1, parseInt(value, 10)));
}

const EnvSchema = z.object({
    LICENSE_SERVER: z
        .string()
        .optional()
        .transform((value) => value?.trim().replace(/\/+$/, '') || DEFAULT_LICENSE_SERVER),
    LICENSE_VERIFY_SSL: optOut,
    ALLOW_INSECURE_LICENSE_SERVER: optIn,
    LICENSE_DISABLE_HTTPS_FALLBACK: optIn,
    LICENSE_DISABLE_HTTP_FALLBACK: optIn,
    LICENSE_CACHE_MAX_HOURS: hours(72),
    LICENSE_OFFLINE_GRACE_HOURS: hours(12),
    APP_VERSION: optionalText,
    LICENSE_APP_NAME: optionalText,
    LICENSE_CACHE_PATH: optionalText,
    LICENSE_ENV_PREFIX: optionalText,
});

/**
 * Reads the license configuration from environment variables.
 * @throws {ConfigurationError} If a variable holds a value that cannot be used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LicenseConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid license configuration: ${details}`);
    }

    const vars = parsed.data;
    return {
        serverUrl: vars.LICENSE_SERVER,
        verifyTls: vars.LICENSE_VERIFY_SSL,
        allowInsecureServer: vars.ALLOW_INSECURE_LICENSE_SERVER,
        disableHttpsFallback: vars.LICENSE_DISABLE_HTTPS_FALLBACK,
        disableHttpFallback: vars.LICENSE_DISABLE_HTTP_FALLBACK,
        cacheMaxHours: vars.LICENSE_CACHE_MAX_HOURS,
        offlineGraceHours: vars.LICENSE_OFFLINE_GRACE_HOURS,
        appVersion: vars.APP_VERSION,
        appName: vars.LICENSE_APP_NAME ?? DEFAULT_APP_NAME,
        cachePath: vars.LICENSE_CACHE_PATH,
        envPrefix: vars.LICENSE_ENV_PREFIX ?? DEFAULT_ENV_PREFIX,
    };
}
