import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LicenseConfig, LicensePayload, Logger } from '../src/types';

export const NOW = new Date('2026-03-01T12:00:00.000Z');
export const HOUR = 60 * 60 * 1000;

export const FINGERPRINT_A = 'a'.repeat(64);
export const FINGERPRINT_B = 'b'.repeat(64);

export const fixedClock = () => new Date(NOW.getTime());

export function makeLogger(): jest.Mocked<Logger> {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

export function makeConfig(overrides: Partial<LicenseConfig> = {}): LicenseConfig {
    return {
        serverUrl: 'https://license.example.com',
        verifyTls: true,
        allowInsecureServer: false,
        disableHttpsFallback: false,
        disableHttpFallback: false,
        cacheMaxHours: 72,
        offlineGraceHours: 12,
        appName: 'device-license-test',
        envPrefix: 'APP_LICENSE',
        ...overrides,
    };
}

export function makePayload(overrides: Partial<LicensePayload> = {}): LicensePayload {
    return {
        license_key: 'ABCD-1234-EFGH-5678',
        email: 'owner@example.com',
        client_name: 'Example Client',
        activation_count: 1,
        max_activations: 3,
        machine_fingerprint: FINGERPRINT_A,
        verified_at: new Date(NOW.getTime() - HOUR).toISOString(),
        cache_expires_at: new Date(NOW.getTime() + 10 * HOUR).toISOString(),
        offline_mode: false,
        ...overrides,
    };
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'device-license-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
