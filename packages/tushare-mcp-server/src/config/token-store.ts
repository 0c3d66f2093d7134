/**
 * Token 存储
 * token 保存在 dotenv 格式的文件中，每次读取都重新解析文件，
 * 这样其他进程写入的新 token 无需重启即可生效。
 */

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { TokenSource } from '../types/adapters.js';
import { TOKEN_ENV_KEY } from './constants.js';

function serializeValue(value: string): string {
    if (/[\s#"'=]/.test(value)) {
        return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
    }
    return value;
}

export function serializeEnv(entries: Record<string, string>): string {
    return Object.entries(entries)
        .map(([key, value]) => `${key}=${serializeValue(value)}`)
        .join('\n') + '\n';
}

export class TokenStore implements TokenSource {
    readonly filePath: string;
    private readonly env: Record<string, string | undefined>;

    constructor(filePath: string, env: Record<string, string | undefined> = process.env) {
        this.filePath = filePath;
        this.env = env;
    }

    /**
     * 确保目录和文件存在
     */
    async ensureFile(): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        try {
            await fs.access(this.filePath);
        } catch {
            await fs.writeFile(this.filePath, '', 'utf8');
        }
    }

    async readEntries(): Promise<Record<string, string>> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return {};
            }
            throw error;
        }
        return dotenv.parse(content);
    }

    /**
     * 文件中的 token 优先，其次是环境变量
     */
    async getToken(): Promise<string | undefined> {
        const entries = await this.readEntries();
        const fromFile = entries[TOKEN_ENV_KEY]?.trim();
        if (fromFile) return fromFile;

        const fromEnv = this.env[TOKEN_ENV_KEY]?.trim();
        return fromEnv || undefined;
    }

    /**
     * 写入 token，保留文件中的其他键，并同步到当前进程环境
     */
    async setToken(token: string): Promise<void> {
        const trimmed = token.trim();
        await this.ensureFile();
        const entries = await this.readEntries();
        entries[TOKEN_ENV_KEY] = trimmed;
        await fs.writeFile(this.filePath, serializeEnv(entries), 'utf8');
        this.env[TOKEN_ENV_KEY] = trimmed;
    }
}
