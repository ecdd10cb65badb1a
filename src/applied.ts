import { createHash } from 'crypto';
import { maskLicenseKey } from './messages';
import { LicensePayload } from './types';

/**
 * A cell that accepts its first value and ignores every later one.
 */
export class SetOnce<T> {
    private value: T | undefined;
    private assigned = false;

    get(): T | undefined {
        return this.value;
    }

    isSet(): boolean {
        return this.assigned;
    }

    /** Returns true only for the call that stored the value. */
    set(value: T): boolean {
        if (this.assigned) {
            return false;
        }
        this.value = value;
        this.assigned = true;
        return true;
    }
}

/** Holds the license applied to this process. */
export const processLicense = new SetOnce<LicensePayload>();

function setDefault(env: NodeJS.ProcessEnv, name: string, value: string): void {
    if (env[name] === undefined) {
        env[name] = value;
    }
}

/**
 * Exposes the verified license to the rest of the process through
 * `<prefix>_*` variables. Variables that are already set are left alone.
 */
export function applyLicenseEnvironment(
    payload: LicensePayload,
    machineFingerprint: string,
    env: NodeJS.ProcessEnv = process.env,
    prefix: string = 'APP_LICENSE'
): void {
    const licenseKey = payload.license_key;
    const clientName = payload.client_name ?? '';

    setDefault(env, `${prefix}_KEY`, licenseKey);
    if (payload.email) {
        setDefault(env, `${prefix}_EMAIL`, payload.email);
    }
    if (clientName) {
        setDefault(env, `${prefix}_CLIENT`, clientName);
    }
    setDefault(env, `${prefix}_TAG`, `${clientName || 'unknown'}::${maskLicenseKey(licenseKey)}`);

    const signatureSource = `${licenseKey}|${machineFingerprint}|${clientName}`;
    setDefault(env, `${prefix}_SIGNATURE`, createHash('sha256').update(signatureSource, 'utf-8').digest('hex'));
}
