export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface RunLogEntry {
    level: LogLevel;
    message: string;
    timestamp: number;
    exception?: string;
}

export interface RunLogSummary {
    total: number;
    byLevel: Partial<Record<LogLevel, number>>;
}

/**
 * Bounded in-memory log buffer for a single run. Oldest entries are dropped
 * once maxRecords is reached; the buffer is usually attached to the run's
 * metadata when it finishes.
 */
export class RunLogCollector {
    private records: RunLogEntry[] = [];

    constructor(private readonly maxRecords: number = 1000) { }

    info(message: string): void {
        this.add('INFO', message);
    }

    warning(message: string): void {
        this.add('WARNING', message);
    }

    error(message: string, exception?: string): void {
        this.add('ERROR', message, exception);
    }

    debug(message: string): void {
        this.add('DEBUG', message);
    }

    getLogs(): RunLogEntry[] {
        return [...this.records];
    }

    getWarningsAndErrors(): RunLogEntry[] {
        return this.records.filter(r => r.level === 'WARNING' || r.level === 'ERROR');
    }

    getSummary(): RunLogSummary {
        const byLevel: Partial<Record<LogLevel, number>> = {};
        for (const record of this.records) {
            byLevel[record.level] = (byLevel[record.level] ?? 0) + 1;
        }
        return { total: this.records.length, byLevel };
    }

    clear(): void {
        this.records = [];
    }

    private add(level: LogLevel, message: string, exception?: string): void {
        if (this.records.length >= this.maxRecords) {
            this.records.shift();
        }
        const entry: RunLogEntry = { level, message, timestamp: Date.now() };
        if (exception) entry.exception = exception;
        this.records.push(entry);
    }
}
