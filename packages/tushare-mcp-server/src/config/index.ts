/**
 * Tushare MCP Server Config Management
 */

import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { parseLogLevel, type LogLevel } from '../logger.js';
import { TOKEN_ENV_DIR, TOKEN_ENV_FILE, TUSHARE_DEFAULT_BASE_URL } from './constants.js';

export interface ServerConfig {
    tushare: {
        baseUrl: string;
        envFile: string;
    };
    timeout: number;
    cache: {
        enabled: boolean;
        ttl: number;
    };
    rateLimit: {
        enabled: boolean;
        perSecond: number;
    };
    logLevel: LogLevel;
    transport: 'stdio' | 'http';
    host: string;
    port: number;
}

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function resolveEnvFile(env: Env = process.env): string {
    const configured = env.TUSHARE_ENV_FILE;
    if (configured) {
        return path.resolve(configured);
    }

    let home: string;
    try {
        home = os.homedir();
    } catch {
        home = '';
    }
    // 受限环境可能拿不到主目录，退回当前目录
    return path.join(home || process.cwd(), TOKEN_ENV_DIR, TOKEN_ENV_FILE);
}

/**
 * 读取配置
 * token 文件中的其他键（如 LOG_LEVEL）也会被加载，但不覆盖已有环境变量
 */
export function loadConfig(env: Env = process.env, options: { loadEnvFile?: boolean } = {}): ServerConfig {
    const envFile = resolveEnvFile(env);
    if (options.loadEnvFile ?? env === process.env) {
        dotenv.config({ path: envFile });
    }

    return {
        tushare: {
            baseUrl: env.TUSHARE_API_URL || TUSHARE_DEFAULT_BASE_URL,
            envFile,
        },
        timeout: parseInteger(env.API_TIMEOUT, 45000),
        cache: {
            enabled: env.CACHE_ENABLED !== 'false',
            ttl: parseInteger(env.CACHE_TTL, 600),
        },
        rateLimit: {
            enabled: env.RATE_LIMIT_ENABLED !== 'false',
            perSecond: Math.max(1, parseInteger(env.RATE_LIMIT_PER_SECOND, 3)),
        },
        logLevel: parseLogLevel(env.LOG_LEVEL),
        transport: env.MCP_TRANSPORT === 'http' ? 'http' : 'stdio',
        host: env.HOST || '0.0.0.0',
        port: parseInteger(env.MCP_PORT ?? env.PORT, 8000),
    };
}

export * from './constants.js';
