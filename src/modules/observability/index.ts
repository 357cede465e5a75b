import winston from 'winston';
import 'winston-daily-rotate-file';
import { Aggregate, ReadResult } from '../../types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
    level?: string;
    directory?: string;
    silent?: boolean;
}

// stdout carries the report, so every log level goes to stderr
const CONSOLE_STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

export class Logger {
    private logger: winston.Logger;
    private fileDirectory: string | null = null;

    constructor(options: LoggerOptions = {}) {
        this.logger = winston.createLogger({
            level: options.level ?? 'info',
            silent: options.silent ?? false,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Console({
                    format: winston.format.simple(),
                    stderrLevels: CONSOLE_STDERR_LEVELS
                })
            ]
        });
        if (options.directory) {
            this.addFileTransport(options.directory);
        }
    }

    configure(options: LoggerOptions) {
        if (options.level) this.logger.level = options.level;
        if (options.silent !== undefined) this.logger.silent = options.silent;
        if (options.directory && options.directory !== this.fileDirectory) {
            this.addFileTransport(options.directory);
        }
    }

    private addFileTransport(directory: string) {
        this.logger.add(new winston.transports.DailyRotateFile({
            dirname: directory,
            filename: 'study-grouper-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d'
        }));
        this.fileDirectory = directory;
    }

    log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        this.logger.log(level, message, meta);
    }

    info(message: string, meta?: Record<string, unknown>) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>) {
        this.log('error', message, meta);
    }

    debug(message: string, meta?: Record<string, unknown>) {
        this.log('debug', message, meta);
    }
}

export const logger = new Logger({ level: process.env.LOG_LEVEL ?? 'info' });

/**
 * Per-run counters, reported once the run finishes.
 * Placeholder counts are records whose value was absent or blank.
 */
export class RunStats {
    private readonly startedAt = Date.now();

    stats = {
        records: 0,
        categories: 0,
        encoding: '',
        lossy: false,
        placeholder_category: 0,
        placeholder_subcategory: 0,
        placeholder_suitability: 0,
        outputs: 0
    };

    recordRead(result: ReadResult) {
        this.stats.records = result.records.length;
        this.stats.encoding = result.encoding;
        this.stats.lossy = result.lossy;
    }

    recordAggregate(aggregate: Aggregate) {
        this.stats.categories = aggregate.categories.size;
        this.stats.placeholder_category = aggregate.substitutions.category;
        this.stats.placeholder_subcategory = aggregate.substitutions.subcategory;
        this.stats.placeholder_suitability = aggregate.substitutions.suitability;
    }

    recordOutputs(files: readonly string[]) {
        this.stats.outputs += files.length;
    }

    getSummary() {
        return {
            ...this.stats,
            duration_ms: Date.now() - this.startedAt
        };
    }
}
