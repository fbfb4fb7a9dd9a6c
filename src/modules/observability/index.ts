import winston from 'winston';
import 'winston-daily-rotate-file';
import { RunStats } from '../../types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
    level?: LogLevel;
    /** Directory for daily-rotated JSON logs. Console only when omitted. */
    dir?: string;
    silent?: boolean;
}

/**
 * Thin wrapper over winston. One instance is built by the entrypoint and
 * handed to every component; components call child() to tag their output.
 */
export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions = {}, base?: winston.Logger) {
        if (base) {
            this.logger = base;
            return;
        }

        const transports: winston.transport[] = [
            new winston.transports.Console({ format: winston.format.simple() }),
        ];

        if (options.dir) {
            transports.push(new winston.transports.DailyRotateFile({
                filename: `${options.dir}/lead-pipeline-%DATE%.log`,
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d'
            }));
        }

        this.logger = winston.createLogger({
            level: options.level ?? 'info',
            silent: options.silent ?? false,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports
        });
    }

    log(level: LogLevel, message: string, meta?: LogMeta) {
        this.logger.log(level, message, meta);
    }

    error(message: string, meta?: LogMeta) {
        this.log('error', message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    child(meta: LogMeta): Logger {
        return new Logger({}, this.logger.child(meta));
    }
}

export const createSilentLogger = (): Logger => new Logger({ silent: true });

export class RunMetrics {
    private startedAt = Date.now();

    stats: RunStats = {
        sources: 0,
        failedSources: 0,
        collected: 0,
        afterDeduplication: 0,
        enrichmentFailures: 0,
        scored: 0,
        filteredOut: 0,
        returned: 0,
        durationMs: 0
    };

    recordBatch(succeeded: boolean, records: number) {
        this.stats.sources++;
        if (succeeded) {
            this.stats.collected += records;
        } else {
            this.stats.failedSources++;
        }
    }

    recordEnrichmentFailure() {
        this.stats.enrichmentFailures++;
    }

    finish(returned: number): RunStats {
        this.stats.returned = returned;
        this.stats.durationMs = Date.now() - this.startedAt;
        return { ...this.stats };
    }
}
