import chalk from 'chalk';

/**
 * Logger — leveled, stderr-only output
 *
 * Levels follow the settings file's `log_level`:
 *   error   → only failures
 *   warning → failures and warnings (default)
 *   verbose → everything, including step-by-step execution messages
 *
 * Set CMDSTACK_LOG_FORMAT=json for one JSON object per line.
 */

export type LogLevel = 'error' | 'warning' | 'verbose';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warning', 'verbose'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    error: 0,
    warning: 1,
    verbose: 2,
};

export interface Logger {
    error(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    verbose(message: string, data?: Record<string, unknown>): void;
    child(name: string): Logger;
    readonly level: LogLevel;
}

export interface LoggerOptions {
    /** Disable ANSI colours (tool-call output must stay clean) */
    plain?: boolean;
    /** Where lines go; defaults to process.stderr */
    write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function isJsonFormat(): boolean {
    return process.env['CMDSTACK_LOG_FORMAT']?.toLowerCase() === 'json';
}

export function createLogger(name: string, level: LogLevel = 'warning', options: LoggerOptions = {}): Logger {
    const maxPriority = LEVEL_PRIORITY[level];
    const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
    const useJson = isJsonFormat();

    const paint: Record<LogLevel, (text: string) => string> = options.plain
        ? { error: (t) => t, warning: (t) => t, verbose: (t) => t }
        : { error: chalk.red, warning: chalk.yellow, verbose: chalk.dim };

    function log(lvl: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (LEVEL_PRIORITY[lvl] > maxPriority) return;

        const hasData = data !== undefined && Object.keys(data).length > 0;
        if (useJson) {
            write(JSON.stringify({
                timestamp: new Date().toISOString(),
                level: lvl,
                module: name,
                message,
                ...(hasData ? data : {}),
            }));
            return;
        }

        const prefix = `[${lvl.toUpperCase()}] [${name}]`;
        const extra = hasData ? ` ${JSON.stringify(data)}` : '';
        write(paint[lvl](`${prefix} ${message}${extra}`));
    }

    return {
        level,
        error: (msg, data) => log('error', msg, data),
        warn: (msg, data) => log('warning', msg, data),
        verbose: (msg, data) => log('verbose', msg, data),
        child: (childName) => createLogger(`${name}:${childName}`, level, options),
    };
}

/** A logger that drops everything; engine components default to it. */
export const silentLogger: Logger = createLogger('silent', 'error', { write: () => undefined });
