import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { PrimitiveKind } from '../schema/usage.js';
import { errorMessage, utcTimestamp } from '../storage/index.js';

const MAX_ERROR_LENGTH = 100;

export interface AuditEvent {
    name: string;
    kind: PrimitiveKind;
    success?: boolean;
    errorMsg?: string | null;
}

/**
 * Format one audit line:
 *   2026-01-01T10:30:45|tool:celsius_to_fahrenheit|OK
 *   2026-01-01T10:31:00|tool:unknown_tool|FAIL|Unknown tool
 */
export function formatAuditLine(event: AuditEvent, at: Date = new Date()): string {
    const stamp = utcTimestamp(at).slice(0, 19);
    let line = `${stamp}|${event.kind}:${event.name}|${event.success === false ? 'FAIL' : 'OK'}`;
    if (event.errorMsg) {
        line += `|${event.errorMsg.slice(0, MAX_ERROR_LENGTH)}`;
    }
    return line;
}

/**
 * Optional append-only file log of invocations. A null path disables it and
 * every call becomes a no-op. Write failures go to stderr and never throw.
 */
export class UsageAuditLog {
    private enabled: boolean;

    constructor(readonly logPath: string | null) {
        this.enabled = logPath !== null;

        if (logPath !== null) {
            const dir = dirname(logPath);
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
            }
        }
    }

    get isEnabled(): boolean {
        return this.enabled;
    }

    log(event: AuditEvent): void {
        if (!this.enabled || this.logPath === null) return;

        try {
            appendFileSync(this.logPath, formatAuditLine(event) + '\n', 'utf-8');
        } catch (e) {
            console.error(`[AuditLog] Failed to write ${this.logPath}: ${errorMessage(e)}`);
        }
    }

    /** Stops further writes. Safe to call more than once. */
    close(): void {
        this.enabled = false;
    }
}
