import { execa } from 'execa';
import { ToolError } from './errors';
import { debug } from './log';

export interface RunOptions {
    /** Exit codes other than 0 that still count as success (mkvmerge uses 1 for warnings). */
    okExitCodes?: number[];
    /** Receives each non-empty line the tool prints while running. */
    onLine?: (line: string) => void;
}

export interface ToolResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export type ToolRunner = (file: string, args: string[], opts?: RunOptions) => Promise<ToolResult>;

function field(e: unknown, key: string): unknown {
    if (typeof e === 'object' && e !== null && key in e) {
        return Reflect.get(e, key);
    }
    return undefined;
}

function text(v: unknown): string {
    return typeof v === 'string' ? v : '';
}

export interface LineSplitter {
    push(chunk: string): void;
    /** Emits whatever is left after the last newline. */
    flush(): void;
}

/** Reassembles lines that arrive split across output chunks. */
export function createLineSplitter(onLine: (line: string) => void): LineSplitter {
    let pending = '';
    const emit = (raw: string) => {
        const line = raw.trim();
        if (line) onLine(line);
    };
    return {
        push(chunk) {
            const parts = (pending + chunk).split(/\r?\n/);
            pending = parts.pop() ?? '';
            for (const part of parts) emit(part);
        },
        flush() {
            emit(pending);
            pending = '';
        },
    };
}

/** Runs an external tool through execa; failures surface as ToolError. */
export const runTool: ToolRunner = async (file, args, opts = {}) => {
    debug('tool.exec', { file, args });
    const proc = execa(file, args, { all: true, stdio: 'pipe' });
    const lines = opts.onLine ? createLineSplitter(opts.onLine) : null;
    if (lines) {
        proc.all?.on('data', (d: Buffer) => lines.push(d.toString()));
    }
    try {
        const res = await proc;
        lines?.flush();
        return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode };
    } catch (e: unknown) {
        lines?.flush();
        const exitCode = field(e, 'exitCode');
        const stdout = text(field(e, 'stdout'));
        const stderr = text(field(e, 'stderr'));
        if (typeof exitCode === 'number' && opts.okExitCodes?.includes(exitCode)) {
            return { stdout, stderr, exitCode };
        }
        const shortMessage = text(field(e, 'shortMessage'));
        throw new ToolError(file, shortMessage || (e instanceof Error ? e.message : String(e)), {
            exitCode: typeof exitCode === 'number' ? exitCode : undefined,
            stderr: stderr || stdout,
            notFound: field(e, 'code') === 'ENOENT',
        });
    }
};
