import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

/**
 * Fresh temp directory per test; call the returned cleanup in afterEach.
 */
export function createTempDir(prefix: string = 'usage-stats-'): { dir: string; cleanup: () => void } {
    const dir = mkdtempSync(join(tmpdir(), prefix));
    return {
        dir,
        cleanup: () => rmSync(dir, { recursive: true, force: true })
    };
}

export const FIXED_TIME_1 = new Date('2026-01-01T10:00:00.000Z');
export const FIXED_TIME_2 = new Date('2026-01-01T10:05:00.000Z');
export const FIXED_TIME_3 = new Date('2026-01-01T10:10:00.000Z');
