import { appendFile } from 'node:fs/promises';
import { EOL } from 'node:os';

export type LogLevel = 'info' | 'warn' | 'error';

/** What the normalizer writes its per-call lines to */
export interface SurfaceLogger {
    info(line: string): void;
    warn(line: string): void;
    error(line: string): void;
}

export const consoleLogger: SurfaceLogger = {
    info: (line) => console.info(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
};

export const silentLogger: SurfaceLogger = {
    info: () => {},
    warn: () => {},
    error: () => {},
};

export interface BatchFileLoggerOptions {
    filePath: string;
    maxQueue?: number; // default 100
    format?: (level: LogLevel, line: string) => string; // default timestamp + level prefix
}

/**
 * Queues lines and appends them to a file with at most one write in flight.
 * Past maxQueue, lines are dropped and the drop count is reported in the file.
 */
export class BatchFileLogger implements SurfaceLogger {
    private filePath: string;
    private maxQueue: number;
    private format: (level: LogLevel, line: string) => string;

    private queue: string[] = [];
    private dropping = 0;
    private totaldrops = 0;

    private flushInFlight: Promise<void> | null = null;
    private closing = false;

    constructor(opts: BatchFileLoggerOptions) {
        this.filePath = opts.filePath;
        this.maxQueue = opts.maxQueue ?? 100;
        this.format =
            opts.format ?? ((level, line) => `[${new Date().toISOString()}] [${level}] ${line}${EOL}`);
    }

    info(line: string) {
        this.log('info', line);
    }

    warn(line: string) {
        this.log('warn', line);
    }

    error(line: string) {
        this.log('error', line);
    }

    log(level: LogLevel, line: string): boolean {
        if (this.closing) return false;

        if (this.queue.length >= this.maxQueue) {
            this.dropping++;
            this.totaldrops++;
            return false;
        }

        this.queue.push(this.format(level, line));

        if (!this.flushInFlight) {
            this.kick();
        }

        return true;
    }

    private kick() {
        if (this.flushInFlight) return;

        this.flushInFlight = (async () => {
            try {
                while (this.queue.length > 0) {
                    const chunk = this.queue;
                    this.queue = [];
                    if (this.dropping > 0) {
                        chunk.push(this.format('warn', `[logger] dropped ${this.dropping} lines due to backlog`));
                        this.dropping = 0;
                    }
                    await appendFile(this.filePath, chunk.join(''), { encoding: 'utf8', flag: 'a' });
                }
            } catch (e) {
                // Nowhere else to report a failing log file
                console.error(e);
            } finally {
                this.flushInFlight = null;
            }
        })();
    }

    getStats() {
        return {
            queued: this.queue.length,
            drops: this.totaldrops,
            flushInFlight: !!this.flushInFlight,
            closing: this.closing,
            maxQueue: this.maxQueue,
        };
    }

    /** Resolves once everything queued so far is on disk */
    async flush(): Promise<void> {
        while (this.flushInFlight) {
            await this.flushInFlight;
        }
    }

    async close(): Promise<void> {
        if (this.closing) return;
        this.closing = true;
        await this.flush();
    }
}

/** Collects lines in memory; handy for callers that report per batch */
export class MemoryLogger implements SurfaceLogger {
    lines: { level: LogLevel; line: string }[] = [];

    info(line: string) {
        this.lines.push({ level: 'info', line });
    }

    warn(line: string) {
        this.lines.push({ level: 'warn', line });
    }

    error(line: string) {
        this.lines.push({ level: 'error', line });
    }
}
