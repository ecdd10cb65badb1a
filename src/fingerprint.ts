import { createHash } from 'crypto';
import { execFileSync } from 'child_process';
import { readFileSync } from 'fs';
import * as os from 'os';

const PROBE_TIMEOUT = 3000;

export interface DeviceSource {
    hostname(): string;
    osType(): string;
    arch(): string;
    osVersion(): string;
    macToken(): string | null;
    systemUuid(): string | null;
}

function firstHardwareMac(): string | null {
    const interfaces = os.networkInterfaces();
    const names = Object.keys(interfaces).sort();
    for (const name of names) {
        for (const info of interfaces[name] ?? []) {
            if (!info.internal && info.mac && info.mac !== '00:00:00:00:00:00') {
                return `0x${info.mac.replace(/:/g, '').toLowerCase()}`;
            }
        }
    }
    return null;
}

function probeSystemUuid(): string | null {
    switch (process.platform) {
        case 'win32': {
            const output = execFileSync('wmic', ['csproduct', 'get', 'uuid'], {
                encoding: 'utf-8',
                timeout: PROBE_TIMEOUT,
                windowsHide: true,
            });
            const line = output
                .split(/\r?\n/)
                .map((value) => value.trim())
                .find((value) => value && !value.includes('UUID'));
            return line ?? null;
        }
        case 'darwin': {
            const output = execFileSync('ioreg', ['-rd1', '-c', 'IOPlatformExpertDevice'], {
                encoding: 'utf-8',
                timeout: PROBE_TIMEOUT,
            });
            const match = /"IOPlatformUUID"\s*=\s*"([^"]+)"/.exec(output);
            return match ? match[1] : null;
        }
        case 'linux': {
            for (const path of ['/etc/machine-id', '/var/lib/dbus/machine-id']) {
                try {
                    const value = readFileSync(path, 'utf-8').trim();
                    if (value) {
                        return value;
                    }
                } catch {
                    continue;
                }
            }
            return null;
        }
        default:
            return null;
    }
}

export const nodeDeviceSource: DeviceSource = {
    hostname: () => os.hostname(),
    osType: () => os.type(),
    arch: () => os.arch(),
    osVersion: () => os.version(),
    macToken: firstHardwareMac,
    systemUuid: probeSystemUuid,
};

/**
 * Hashes host name, OS family, architecture, OS version, a MAC token and a
 * best-effort system UUID into a hex digest. A failing probe contributes a
 * placeholder instead of aborting.
 */
export function computeMachineFingerprint(source: DeviceSource = nodeDeviceSource): string {
    const components = [source.hostname(), source.osType(), source.arch(), source.osVersion()];

    try {
        components.push(source.macToken() ?? 'mac-unknown');
    } catch {
        components.push('mac-unknown');
    }

    try {
        const uuid = source.systemUuid();
        if (uuid) {
            components.push(uuid);
        }
    } catch {
        components.push('uuid-unknown');
    }

    const raw = components.filter(Boolean).join('|');
    return createHash('sha256').update(raw, 'utf-8').digest('hex');
}

export function describePlatform(): string {
    return `${os.type()}-${os.release()}-${os.arch()}`;
}
