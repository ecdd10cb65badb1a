import axios, { AxiosInstance } from 'axios';
import * as https from 'https';
import * as os from 'os';
import { CandidateResolver } from './candidates';
import { NetworkError } from './errors';
import { describePlatform } from './fingerprint';
import {
    LicenseVerifier,
    Logger,
    ServerCandidate,
    VerificationResult,
    VerifyRequestBody,
    isRecord,
    verifyResponseSchema,
} from './types';

export const VERIFY_PATH = '/api/license/verify';
export const DEFAULT_REQUEST_TIMEOUT = 15000;

export interface VerificationClientOptions {
    machineFingerprint: string;
    appVersion?: string;
    requestTimeout?: number;
    logger?: Logger;
}

type Attempt =
    | { kind: 'response'; result: VerificationResult; parseable: boolean }
    | { kind: 'transport'; error: NetworkError };

/**
 * Posts verification requests to each server candidate in turn. The first
 * candidate that answers with any HTTP response ends the loop; candidates
 * that fail at the transport level are skipped. Only a candidate whose reply
 * parses is promoted.
 */
export class VerificationClient implements LicenseVerifier {
    private readonly apiClient: AxiosInstance;
    private readonly insecureAgent = new https.Agent({ rejectUnauthorized: false });
    private readonly logger: Logger;

    constructor(
        private readonly resolver: CandidateResolver,
        private readonly options: VerificationClientOptions
    ) {
        this.logger = options.logger ?? console;
        this.apiClient = axios.create({
            timeout: options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
            headers: {
                'Content-Type': 'application/json',
                Accept: 'application/json',
            },
        });
    }

    public async verify(licenseKey: string, email?: string | null): Promise<VerificationResult> {
        const body: VerifyRequestBody = {
            license_key: licenseKey,
            machine_fingerprint: this.options.machineFingerprint,
            email: email || null,
            hostname: os.hostname(),
            platform: describePlatform(),
            app_version: this.options.appVersion ?? null,
        };

        let lastError: NetworkError | undefined;
        for (const candidate of this.resolver.list()) {
            this.logger.info(`VerificationClient: Attempting license verification via ${candidate.url}`);
            const attempt = await this.post(candidate, body);
            if (attempt.kind === 'transport') {
                this.logger.debug(`VerificationClient: ${candidate.url} unreachable: ${attempt.error.message}`);
                lastError = attempt.error;
                continue;
            }

            if (attempt.parseable) {
                this.resolver.promote(candidate.url);
            }
            return attempt.result;
        }

        if (lastError) {
            this.logger.error(`VerificationClient: Failed to reach license server: ${lastError.message}`);
        }
        return { ok: false, error: 'network_error', cause: lastError };
    }

    private async post(candidate: ServerCandidate, body: VerifyRequestBody): Promise<Attempt> {
        let status: number;
        let data: unknown;
        try {
            const response = await this.apiClient.post<unknown>(`${candidate.url}${VERIFY_PATH}`, body, {
                httpsAgent: candidate.url.startsWith('https://') && !candidate.verifyTls ? this.insecureAgent : undefined,
                responseType: 'text',
                transformResponse: [(raw: unknown) => raw],
                validateStatus: () => true,
            });
            status = response.status;
            data = response.data;
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            return { kind: 'transport', error: new NetworkError(cause.message, cause) };
        }

        const result = this.parse(status, data);
        if (!result) {
            return { kind: 'response', result: { ok: false, error: 'invalid_server_response' }, parseable: false };
        }
        return { kind: 'response', result, parseable: true };
    }

    private parse(status: number, data: unknown): VerificationResult | null {
        let decoded: unknown = data;
        if (typeof data === 'string') {
            try {
                decoded = JSON.parse(data);
            } catch {
                this.logger.warn(`VerificationClient: Unparseable response body (HTTP ${status}).`);
                return null;
            }
        }

        const parsed = verifyResponseSchema.safeParse(decoded);
        if (parsed.success) {
            return parsed.data;
        }
        // error bodies without an `ok` flag
        if (status >= 400 && isRecord(decoded) && typeof decoded.error === 'string') {
            return { ok: false, error: decoded.error };
        }
        this.logger.warn(`VerificationClient: Unexpected response structure (HTTP ${status}).`);
        return null;
    }
}
