import { LicenseErrorCode } from './types';

export class LicenseError extends Error {
    public readonly code: LicenseErrorCode | string;

    constructor(message: string, code: LicenseErrorCode | string = 'license_error') {
        super(message);
        this.name = 'LicenseError';
        this.code = code;

        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ConfigurationError extends LicenseError {
    constructor(message: string = 'Invalid license configuration') {
        super(message, 'configuration_error');
        this.name = 'ConfigurationError';
    }
}

export class NetworkError extends LicenseError {
    originalError?: Error;
    constructor(message: string = 'Network error occurred', originalError?: Error) {
        super(message, 'network_error');
        this.name = 'NetworkError';
        this.originalError = originalError;
    }
}

/**
 * Raised inside the cache codec when an envelope fails to decode or its
 * signature does not match. Callers outside the codec never see it: the
 * cache is reported as absent instead.
 */
export class CacheIntegrityError extends LicenseError {
    constructor(message: string) {
        super(message, 'cache_integrity');
        this.name = 'CacheIntegrityError';
    }
}

export class LicenseRequiredError extends LicenseError {
    constructor(message: string = 'License verification is required to continue.') {
        super(message, 'license_required');
        this.name = 'LicenseRequiredError';
    }
}
