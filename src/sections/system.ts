/**
 * System Profile
 * Host facts some defaults depend on (RAM-sized caches, peer counts).
 * Sections receive it explicitly so the catalog stays deterministic under test.
 */

import os from 'os';

export type Architecture = 'amd64' | 'arm64';

export interface SystemProfile {
    totalMemoryGB: number;
    arch: Architecture;
}

export function detectSystemProfile(): SystemProfile {
    return {
        totalMemoryGB: Math.floor(os.totalmem() / 1024 / 1024 / 1024),
        arch: process.arch === 'arm64' ? 'arm64' : 'amd64',
    };
}

/**
 * Memory hint in MB for clients that size caches by total RAM
 */
export function memoryTierMB(system: SystemProfile): number {
    const gb = system.totalMemoryGB;
    if (gb === 0) return 0;
    if (gb < 9) return 512;
    if (gb < 13) return 1024;
    if (gb < 17) return 2048;
    if (gb < 25) return 4096;
    if (gb < 33) return 6144;
    return 8192;
}
