import { LicenseErrorCode } from './types';

const ERROR_MESSAGES: Record<LicenseErrorCode, string> = {
    invalid_license: 'The license key you entered is not recognized. Please verify and try again.',
    license_revoked: 'This license has been revoked. Contact support for assistance.',
    license_expired: 'Your license has expired. Contact support to renew your access.',
    email_mismatch: 'The license key does not match the provided email address.',
    activation_limit_reached:
        'This license has reached the maximum number of activations. Contact support to reset it.',
    network_error: 'Could not reach the license server. Check your internet connection and try again.',
    invalid_server_response: 'Received an unexpected response from the license server. Try again later.',
    missing_license_key: 'License key missing from request.',
    missing_machine_fingerprint: 'Machine fingerprint missing from request.',
    configuration_error: 'The license server configuration is invalid. Contact support for assistance.',
};

export const GENERIC_ERROR_MESSAGE = 'Unable to verify your license. Please try again or contact support.';

export const LICENSE_REQUIRED_MESSAGE = 'License verification is required to continue.';

function isKnownCode(code: string): code is LicenseErrorCode {
    return Object.prototype.hasOwnProperty.call(ERROR_MESSAGES, code);
}

export function humanizeError(code?: string | null): string {
    if (code && isKnownCode(code)) {
        return ERROR_MESSAGES[code];
    }
    return GENERIC_ERROR_MESSAGE;
}

export function maskLicenseKey(licenseKey?: string | null): string {
    if (!licenseKey) {
        return 'unknown';
    }
    const key = licenseKey.replace(/-/g, '');
    if (key.length <= 8) {
        return key;
    }
    return `${key.slice(0, 6)}…${key.slice(-4)}`;
}
