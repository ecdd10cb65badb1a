import { ConfigurationError } from './errors';
import { LicenseConfig, ServerCandidate } from './types';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

type ResolverConfig = Pick<
    LicenseConfig,
    'serverUrl' | 'verifyTls' | 'allowInsecureServer' | 'disableHttpsFallback' | 'disableHttpFallback'
>;

export function isLoopbackHost(host?: string | null): boolean {
    if (!host) {
        return false;
    }
    return LOOPBACK_HOSTS.has(host.replace(/^\[|\]$/g, '').toLowerCase());
}

function stripTrailingSlash(value: string): string {
    return value.trim().replace(/\/+$/, '');
}

function withScheme(url: string, scheme: 'http' | 'https'): string {
    return `${scheme}${url.slice(url.indexOf(':'))}`;
}

/**
 * Ordered list of base URLs to try for one configured license server.
 * Order changes only through `promote`, after a candidate has answered.
 */
export class CandidateResolver {
    private readonly candidates: ServerCandidate[] = [];

    constructor(config: ResolverConfig) {
        const configured = stripTrailingSlash(config.serverUrl);

        let parsed: URL;
        try {
            parsed = new URL(configured);
        } catch {
            throw new ConfigurationError(`Invalid license server URL: ${config.serverUrl}`);
        }

        const scheme = parsed.protocol.replace(/:$/, '').toLowerCase();
        if (scheme !== 'http' && scheme !== 'https') {
            throw new ConfigurationError(`Unsupported license server scheme: ${scheme}`);
        }

        const primary = withScheme(configured, scheme);
        const loopback = isLoopbackHost(parsed.hostname);
        if (scheme === 'http' && !loopback && !config.allowInsecureServer) {
            throw new ConfigurationError(
                'License server must use HTTPS for remote hosts. ' +
                    'Set ALLOW_INSECURE_LICENSE_SERVER=1 to permit HTTP or use localhost.'
            );
        }

        // A plain-http configuration never verifies TLS, including its https alternative.
        const verifyTls = config.verifyTls && scheme === 'https';

        this.add({ url: primary, verifyTls });

        if (scheme === 'https' && loopback && !config.disableHttpFallback) {
            this.add({ url: withScheme(primary, 'http'), verifyTls: false }, true);
        } else if (scheme === 'http' && loopback && !config.disableHttpsFallback) {
            this.add({ url: withScheme(primary, 'https'), verifyTls });
        }
    }

    list(): readonly ServerCandidate[] {
        return [...this.candidates];
    }

    promote(url: string): void {
        const index = this.candidates.findIndex((candidate) => candidate.url === url);
        if (index <= 0) {
            return;
        }
        const [candidate] = this.candidates.splice(index, 1);
        this.candidates.unshift(candidate);
    }

    private add(candidate: ServerCandidate, priority: boolean = false): void {
        const url = stripTrailingSlash(candidate.url);
        if (!url || this.candidates.some((existing) => existing.url === url)) {
            return;
        }
        const entry = { ...candidate, url };
        if (priority) {
            this.candidates.unshift(entry);
        } else {
            this.candidates.push(entry);
        }
    }
}
