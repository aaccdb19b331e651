import winston from 'winston';
import { ConfidenceLevel, ResolutionOutcome } from '../../types';

export enum ErrorCategory {
    NETWORK = 'NETWORK',       // Timeout, DNS, connection refused, non-2xx
    PARSING = 'PARSING',       // HTML/JSON/YAML parsing failures
    VALIDATION = 'VALIDATION', // Zod and input validation failures
    AUTH = 'AUTH',             // API key invalid, rate limited
    LOGIC = 'LOGIC',           // Programmer error (bugs)
}

export interface LogContext {
    person_name?: string;
    company_name?: string;
    source?: string;
    url?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

function buildLogger(): winston.Logger {
    const isProduction = process.env.NODE_ENV === 'production';

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: isProduction
                ? winston.format.combine(winston.format.timestamp(), winston.format.json())
                : winston.format.combine(
                    winston.format.colorize(),
                    winston.format.timestamp(),
                    winston.format.printf(({ level, message, timestamp, ...meta }) => {
                        const brief = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                        return `[${timestamp}] [${level}] ${message}${brief}`;
                    })
                ),
        }),
    ];

    if (process.env.LOG_FILE) {
        transports.push(new winston.transports.File({
            filename: process.env.LOG_FILE,
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }));
    }

    return winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        silent: process.env.NODE_ENV === 'test',
        defaultMeta: { service: process.env.SERVICE_NAME || 'contact-resolver' },
        transports,
    });
}

export class Logger {
    private static instance: winston.Logger = buildLogger();

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket') || msg.includes('network')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json') || msg.includes('yaml')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('zod') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        return ErrorCategory.LOGIC;
    }

    static logError(msg: string, error: Error, extraContext?: Partial<LogContext>) {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: this.categorizeError(error),
        });
    }

    private static log(level: string, msg: string, context?: LogContext) {
        if (!context) {
            this.instance.log(level, msg);
            return;
        }
        const { error, ...rest } = context;
        if (error instanceof Error) {
            this.instance.log(level, msg, { ...rest, error_message: error.message, error_stack: error.stack });
        } else {
            this.instance.log(level, msg, rest);
        }
    }
}

export class ResolutionMetrics {
    stats = {
        total: 0,
        resolved: 0,
        unresolved: 0,
        authoritative: 0,
        high: 0,
        medium: 0,
        low: 0,
        total_latency: 0,
    };

    record(outcome: ResolutionOutcome) {
        this.stats.total++;
        if (outcome.contact.phone) {
            this.stats.resolved++;
            if (outcome.contact.confidenceLevel === ConfidenceLevel.HIGH) this.stats.high++;
            if (outcome.contact.confidenceLevel === ConfidenceLevel.MEDIUM) this.stats.medium++;
            if (outcome.contact.confidenceLevel === ConfidenceLevel.LOW) this.stats.low++;
        } else {
            this.stats.unresolved++;
        }
        if (outcome.authoritativeHit) this.stats.authoritative++;
        this.stats.total_latency += outcome.durationMs;
    }

    getSummary() {
        return {
            ...this.stats,
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0,
        };
    }
}
