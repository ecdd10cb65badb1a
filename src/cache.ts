import { createHash } from 'crypto';
import { chmod, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { CacheIntegrityError } from './errors';
import {
    CACHE_FORMAT,
    CACHE_VERSION,
    CIPHER_ALGORITHM,
    CacheEnvelope,
    Clock,
    EncryptedBlob,
    LicensePayload,
    Logger,
    cacheEnvelopeSchema,
    isRecord,
    licensePayloadSchema,
} from './types';

const CACHE_FILE_NAME = 'license.json';
const FILE_MODE = 0o600;

export interface CacheCodecOptions {
    logger?: Logger;
    clock?: Clock;
}

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function toBase64Url(data: Buffer): string {
    return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

function parseInstant(value: string): number {
    const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(value);
    return Date.parse(hasZone || !value.includes('T') ? value : `${value}Z`);
}

/**
 * Per-user data directory for license artifacts.
 */
export function resolveDataDir(
    appName: string,
    platform: NodeJS.Platform = process.platform,
    env: NodeJS.ProcessEnv = process.env,
    home: string = os.homedir()
): string {
    if (platform === 'win32') {
        return path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), appName);
    }
    if (platform === 'darwin') {
        return path.join(home, 'Library', 'Application Support', appName);
    }
    return path.join(env.XDG_DATA_HOME || path.join(home, '.local', 'share'), appName);
}

export function defaultCachePath(appName: string): string {
    return path.join(resolveDataDir(appName), CACHE_FILE_NAME);
}

/**
 * Reads and writes the encrypted license envelope for one device.
 *
 * The cipher is a repeating-key XOR under SHA-256(fingerprint) with a
 * SHA-256 signature over plaintext and key. It binds the file to the device
 * and detects edits; it does not keep the payload secret from anyone who can
 * recompute the fingerprint.
 */
export class CacheCodec {
    private readonly key: Buffer;
    private readonly logger: Logger;
    private readonly clock: Clock;

    constructor(
        private readonly fingerprint: string,
        readonly filePath: string,
        options: CacheCodecOptions = {}
    ) {
        this.key = createHash('sha256').update(fingerprint, 'utf-8').digest();
        this.logger = options.logger ?? console;
        this.clock = options.clock ?? (() => new Date());
    }

    encrypt(plaintext: string): EncryptedBlob {
        const raw = Buffer.from(plaintext, 'utf-8');
        return {
            cipher: toBase64Url(this.xor(raw)),
            sig: this.sign(raw),
            algo: CIPHER_ALGORITHM,
        };
    }

    decrypt(blob: EncryptedBlob): string {
        if (blob.algo !== undefined && blob.algo !== CIPHER_ALGORITHM) {
            throw new CacheIntegrityError(`Unsupported cache algorithm: ${blob.algo}`);
        }
        const cipher = Buffer.from(blob.cipher, 'base64');
        if (toBase64Url(cipher) !== blob.cipher) {
            throw new CacheIntegrityError('License cache cipher is not valid base64');
        }
        const raw = this.xor(cipher);
        if (this.sign(raw) !== blob.sig) {
            throw new CacheIntegrityError('License payload integrity check failed');
        }
        return raw.toString('utf-8');
    }

    encode(payload: LicensePayload): CacheEnvelope {
        return {
            _format: CACHE_FORMAT,
            version: CACHE_VERSION,
            encrypted: true,
            data: this.encrypt(JSON.stringify(payload, null, 2)),
        };
    }

    /**
     * Accepts the encrypted envelope, or a bare payload object written by
     * older releases.
     */
    decode(raw: unknown): LicensePayload {
        const envelope = cacheEnvelopeSchema.safeParse(raw);
        if (envelope.success) {
            let decrypted: unknown;
            try {
                decrypted = JSON.parse(this.decrypt(envelope.data.data));
            } catch (error) {
                if (error instanceof CacheIntegrityError) {
                    throw error;
                }
                throw new CacheIntegrityError('Decrypted license payload is not JSON');
            }
            return this.parsePayload(decrypted);
        }
        if (isRecord(raw) && '_format' in raw) {
            throw new CacheIntegrityError('Unrecognized license cache envelope');
        }
        return this.parsePayload(raw);
    }

    isExpired(payload: LicensePayload): boolean {
        if (!payload.cache_expires_at) {
            return true;
        }
        const expiry = parseInstant(payload.cache_expires_at);
        if (Number.isNaN(expiry)) {
            return true;
        }
        return this.clock().getTime() >= expiry;
    }

    /**
     * Returns the cached payload only if it decodes, belongs to this device
     * and has not expired. Every other outcome is reported as `null`.
     */
    async load(): Promise<LicensePayload | null> {
        let text: string;
        try {
            text = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                this.logger.warn(`LicenseCache: Could not read license cache: ${errorMessage(error)}`);
            }
            return null;
        }

        let payload: LicensePayload;
        try {
            payload = this.decode(JSON.parse(text));
        } catch (error) {
            this.logger.warn('LicenseCache: Existing license cache is invalid and will be ignored.', errorMessage(error));
            return null;
        }

        if (payload.machine_fingerprint !== this.fingerprint) {
            this.logger.warn('LicenseCache: Cached license belongs to another device and will be ignored.');
            return null;
        }
        if (this.isExpired(payload)) {
            this.logger.info('LicenseCache: Cached license expired; re-verification required.');
            return null;
        }
        return payload;
    }

    private async discard(tempPath: string): Promise<void> {
        try {
            await rm(tempPath, { force: true });
        } catch (error) {
            this.logger.debug(`LicenseCache: Could not remove ${tempPath}: ${errorMessage(error)}`);
        }
    }

    async persist(payload: LicensePayload): Promise<void> {
        const directory = path.dirname(this.filePath);
        const tempPath = path.join(directory, `${path.basename(this.filePath, path.extname(this.filePath))}.tmp`);
        try {
            await mkdir(directory, { recursive: true });
            await writeFile(tempPath, JSON.stringify(this.encode(payload), null, 2), {
                encoding: 'utf-8',
                mode: FILE_MODE,
            });
            await rename(tempPath, this.filePath);
        } catch (error) {
            this.logger.warn(`LicenseCache: Failed to persist license cache: ${errorMessage(error)}`);
            await this.discard(tempPath);
            return;
        }

        try {
            await chmod(this.filePath, FILE_MODE);
        } catch (error) {
            this.logger.debug(`LicenseCache: Could not restrict cache permissions: ${errorMessage(error)}`);
        }
        this.logger.debug('LicenseCache: Cache updated.');
    }

    async remove(): Promise<void> {
        try {
            await rm(this.filePath, { force: true });
        } catch (error) {
            this.logger.warn(`LicenseCache: Failed to delete cached license: ${errorMessage(error)}`);
        }
    }

    private parsePayload(value: unknown): LicensePayload {
        const parsed = licensePayloadSchema.safeParse(value);
        if (!parsed.success) {
            throw new CacheIntegrityError('Cached license payload is malformed');
        }
        return parsed.data;
    }

    private xor(data: Buffer): Buffer {
        const output = Buffer.alloc(data.length);
        for (let i = 0; i < data.length; i++) {
            output[i] = data[i] ^ this.key[i % this.key.length];
        }
        return output;
    }

    private sign(raw: Buffer): string {
        return createHash('sha256').update(Buffer.concat([raw, this.key])).digest('hex');
    }
}
