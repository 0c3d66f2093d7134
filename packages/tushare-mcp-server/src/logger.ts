/**
 * 日志工具
 * 基于 winston，全部输出到 stderr（stdout 留给 MCP stdio 传输）
 */

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
    [key: string]: unknown;
}

/**
 * 业务代码依赖的最小日志接口，winston.Logger 满足该接口
 */
export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    const normalized = (value ?? '').trim().toLowerCase();
    const match = LOG_LEVELS.find(level => level === normalized);
    return match ?? fallback;
}

const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const contextStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}${contextStr}`;
});

export function createLogger(level: LogLevel = 'info'): winston.Logger {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            lineFormat,
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: [...LOG_LEVELS],
            }),
        ],
    });
}

export const logger = createLogger(parseLogLevel(process.env.LOG_LEVEL));
