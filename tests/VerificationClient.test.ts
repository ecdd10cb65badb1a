import axios, { AxiosInstance } from 'axios';
import * as https from 'https';
import * as path from 'path';
import { SetOnce } from '../src/applied';
import { CacheCodec } from '../src/cache';
import { CandidateResolver } from '../src/candidates';
import { DEFAULT_REQUEST_TIMEOUT, VerificationClient } from '../src/client';
import { NetworkError } from '../src/errors';
import { LicenseManager } from '../src/index';
import { humanizeError } from '../src/messages';
import { LicensePayload } from '../src/types';
import {
    FINGERPRINT_A,
    fixedClock,
    makeConfig,
    makeLogger,
    makePayload,
    makeTempDir,
    removeDir,
} from './helpers';

jest.mock('axios');

const mockedAxiosInstance = {
    post: jest.fn(),
};
const mockedAxios = axios as jest.Mocked<typeof axios>;

const SUCCESS_BODY = { ok: true, license: { activation_count: 1, max_activations: 3, client_name: 'Example Client' } };

function makeClient(serverUrl: string = 'https://license.example.com', appVersion?: string) {
    const resolver = new CandidateResolver(makeConfig({ serverUrl }));
    const client = new VerificationClient(resolver, {
        machineFingerprint: FINGERPRINT_A,
        appVersion,
        logger: makeLogger(),
    });
    return { resolver, client };
}

function postedUrls(): string[] {
    return mockedAxiosInstance.post.mock.calls.map((call) => call[0]);
}

describe('VerificationClient', () => {
    beforeEach(() => {
        jest.clearAllMocks();
        mockedAxios.create.mockReturnValue(mockedAxiosInstance as unknown as AxiosInstance);
    });

    it('should create an HTTP client with the fixed timeout', () => {
        makeClient();

        expect(mockedAxios.create).toHaveBeenCalledWith(
            expect.objectContaining({ timeout: DEFAULT_REQUEST_TIMEOUT })
        );
    });

    it('should post the verification request to the candidate', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 200, data: JSON.stringify(SUCCESS_BODY) });
        const { client } = makeClient('https://license.example.com', '2.4.0');

        const result = await client.verify('ABCD-1234', 'a@b.com');

        expect(result).toEqual(SUCCESS_BODY);
        expect(mockedAxiosInstance.post).toHaveBeenCalledTimes(1);
        expect(mockedAxiosInstance.post).toHaveBeenCalledWith(
            'https://license.example.com/api/license/verify',
            expect.objectContaining({
                license_key: 'ABCD-1234',
                machine_fingerprint: FINGERPRINT_A,
                email: 'a@b.com',
                app_version: '2.4.0',
                hostname: expect.any(String),
                platform: expect.any(String),
            }),
            expect.objectContaining({ httpsAgent: undefined })
        );
    });

    it('should send a null email and app version when none are given', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 200, data: SUCCESS_BODY });
        const { client } = makeClient();

        await client.verify('ABCD-1234', '');

        expect(mockedAxiosInstance.post.mock.calls[0][1]).toMatchObject({ email: null, app_version: null });
    });

    it('should treat a structured error with a failing status as a normal failure', async () => {
        mockedAxiosInstance.post.mockResolvedValue({
            status: 403,
            data: JSON.stringify({ ok: false, error: 'license_revoked' }),
        });
        const { client } = makeClient();

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'license_revoked' });
    });

    it('should read an error body without an ok flag as a failure', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 403, data: JSON.stringify({ error: 'license_revoked' }) });
        const { client } = makeClient();

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'license_revoked' });
    });

    it('should not read an error field on a successful status', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 200, data: JSON.stringify({ error: 'license_revoked' }) });
        const { client } = makeClient();

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'invalid_server_response' });
    });

    it('should normalize an unparseable body to invalid_server_response', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 502, data: '<html>Bad Gateway</html>' });
        const { client } = makeClient();

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'invalid_server_response' });
    });

    it('should normalize an unexpected structure to invalid_server_response', async () => {
        mockedAxiosInstance.post.mockResolvedValue({ status: 200, data: JSON.stringify({ valid: true }) });
        const { client } = makeClient();

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'invalid_server_response' });
    });

    it('should return network_error when every candidate fails at the transport level', async () => {
        const timeout = new Error('timeout of 15000ms exceeded');
        mockedAxiosInstance.post.mockRejectedValue(timeout);
        const { client } = makeClient('http://localhost:5050');

        const result = await client.verify('ABCD-1234');

        expect(mockedAxiosInstance.post).toHaveBeenCalledTimes(2);
        expect(result).toMatchObject({ ok: false, error: 'network_error' });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.cause).toBeInstanceOf(NetworkError);
            expect(result.cause).toMatchObject({ originalError: timeout });
        }
    });

    it('should try the next candidate after a transport error', async () => {
        mockedAxiosInstance.post
            .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5050'))
            .mockResolvedValueOnce({ status: 200, data: JSON.stringify(SUCCESS_BODY) });
        const { client } = makeClient('http://localhost:5050');

        const result = await client.verify('ABCD-1234');

        expect(result.ok).toBe(true);
        expect(postedUrls()).toEqual([
            'http://localhost:5050/api/license/verify',
            'https://localhost:5050/api/license/verify',
        ]);
    });

    it('should try a promoted candidate first on the next call', async () => {
        mockedAxiosInstance.post
            .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5050'))
            .mockResolvedValueOnce({ status: 200, data: JSON.stringify(SUCCESS_BODY) })
            .mockResolvedValueOnce({ status: 200, data: JSON.stringify(SUCCESS_BODY) });
        const { client, resolver } = makeClient('http://localhost:5050');

        await client.verify('ABCD-1234');
        await client.verify('ABCD-1234');

        expect(postedUrls()).toEqual([
            'http://localhost:5050/api/license/verify',
            'https://localhost:5050/api/license/verify',
            'https://localhost:5050/api/license/verify',
        ]);
        expect(resolver.list()[0].url).toBe('https://localhost:5050');
    });

    it('should promote a candidate that returns a structured failure', async () => {
        mockedAxiosInstance.post
            .mockRejectedValueOnce(new Error('socket hang up'))
            .mockResolvedValueOnce({ status: 404, data: JSON.stringify({ ok: false, error: 'invalid_license' }) });
        const { client, resolver } = makeClient('http://localhost:5050');

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'invalid_license' });
        expect(resolver.list()[0].url).toBe('https://localhost:5050');
    });

    it('should not promote a candidate whose reply cannot be parsed', async () => {
        mockedAxiosInstance.post
            .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5050'))
            .mockResolvedValueOnce({ status: 502, data: '<html>Bad Gateway</html>' });
        const { client, resolver } = makeClient('http://localhost:5050');

        await expect(client.verify('ABCD-1234')).resolves.toEqual({ ok: false, error: 'invalid_server_response' });
        expect(resolver.list()[0].url).toBe('http://localhost:5050');
    });

    it('should not reorder candidates when every candidate fails', async () => {
        mockedAxiosInstance.post.mockRejectedValue(new Error('socket hang up'));
        const { client, resolver } = makeClient('http://localhost:5050');

        await client.verify('ABCD-1234');

        expect(resolver.list().map((candidate) => candidate.url)).toEqual([
            'http://localhost:5050',
            'https://localhost:5050',
        ]);
    });

    it('should disable certificate checks for an https candidate without TLS verification', async () => {
        mockedAxiosInstance.post
            .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5050'))
            .mockResolvedValueOnce({ status: 200, data: JSON.stringify(SUCCESS_BODY) });
        const { client } = makeClient('http://localhost:5050');

        await client.verify('ABCD-1234');

        const agent = mockedAxiosInstance.post.mock.calls[1][2].httpsAgent;
        expect(agent).toBeInstanceOf(https.Agent);
        expect(agent.options.rejectUnauthorized).toBe(false);
    });
});

describe('LicenseManager over VerificationClient', () => {
    let dir: string;

    beforeEach(() => {
        jest.clearAllMocks();
        mockedAxios.create.mockReturnValue(mockedAxiosInstance as unknown as AxiosInstance);
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should not accept a cached license offline after the server revokes it', async () => {
        const logger = makeLogger();
        const cache = new CacheCodec(FINGERPRINT_A, path.join(dir, 'license.json'), { logger, clock: fixedClock });
        await cache.persist(makePayload());
        mockedAxiosInstance.post.mockResolvedValue({ status: 403, data: JSON.stringify({ error: 'license_revoked' }) });
        const showError = jest.fn();
        const config = makeConfig();
        const manager = new LicenseManager(config, {
            prompt: { requestLicense: jest.fn().mockResolvedValue(null) },
            verifier: new VerificationClient(new CandidateResolver(config), { machineFingerprint: FINGERPRINT_A, logger }),
            cache,
            machineFingerprint: FINGERPRINT_A,
            logger,
            clock: fixedClock,
            appliedLicense: new SetOnce<LicensePayload>(),
            env: {},
            showError,
        });

        await expect(manager.ensureValidLicense()).resolves.toBeNull();
        expect(showError).toHaveBeenNthCalledWith(1, humanizeError('license_revoked'));
    });
});
