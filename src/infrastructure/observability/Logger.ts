/**
 * Logger - Structured logging interface and implementation.
 *
 * Provides consistent logging across the orchestrator with:
 * - Log levels (debug, info, warn, error)
 * - Structured context (cycleId, agentName, target, etc.)
 * - Child loggers for scoped contexts
 *
 * Auto-injects cycleId and agentName from CycleContext.
 */

import { CycleContext } from './CycleContext.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    cycleId?: string;
    agentName?: string;
    eventType?: string;
    service?: string;
    component?: string;
    target?: string;
    errorCode?: string;
    durationMs?: number;
    [key: string]: unknown;
}

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: Error, context?: LogContext): void;

    /**
     * Creates a child logger with inherited context.
     */
    child(context: LogContext): ILogger;
}

/**
 * Sink for formatted log lines. Defaults to the console.
 */
export type LogWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
    switch (level) {
        case 'debug':
            console.debug(line);
            break;
        case 'info':
            console.info(line);
            break;
        case 'warn':
            console.warn(line);
            break;
        case 'error':
            console.error(line);
            break;
    }
};

/**
 * Console-based structured logger.
 * Outputs JSON-formatted logs for easy parsing.
 */
export class ConsoleLogger implements ILogger {
    private static levelPriority: Record<LogLevel, number> = {
        debug: 0,
        info: 1,
        warn: 2,
        error: 3,
    };

    constructor(
        private readonly baseContext: LogContext = {},
        private readonly minLevel: LogLevel = 'debug',
        private readonly writer: LogWriter = consoleWriter
    ) {}

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        const errorContext: LogContext = {
            ...context,
            error: error ? {
                name: error.name,
                message: error.message,
                stack: error.stack,
            } : undefined,
        };
        this.log('error', message, errorContext);
    }

    child(context: LogContext): ILogger {
        return new ConsoleLogger(
            { ...this.baseContext, ...context },
            this.minLevel,
            this.writer
        );
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (ConsoleLogger.levelPriority[level] < ConsoleLogger.levelPriority[this.minLevel]) {
            return;
        }

        const cycle = CycleContext.get();
        const autoContext: Partial<LogContext> = {};

        if (cycle) {
            if (!context?.cycleId && !this.baseContext.cycleId) {
                autoContext.cycleId = cycle.cycleId;
            }
            if (!context?.agentName && !this.baseContext.agentName && cycle.agentName) {
                autoContext.agentName = cycle.agentName;
            }
        }

        const logEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            ...this.baseContext,
            ...autoContext,
            ...context,
        };

        this.writer(level, JSON.stringify(logEntry));
    }
}

/**
 * No-op logger for testing or when logging is disabled.
 */
export class NullLogger implements ILogger {
    debug(_message: string, _context?: LogContext): void {}
    info(_message: string, _context?: LogContext): void {}
    warn(_message: string, _context?: LogContext): void {}
    error(_message: string, _error?: Error, _context?: LogContext): void {}
    child(_context: LogContext): ILogger {
        return this;
    }
}
