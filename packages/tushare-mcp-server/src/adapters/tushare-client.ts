/**
 * Tushare 客户端
 * 基于官方 HTTP API (https://api.tushare.pro)
 *
 * 进程启动时创建一次，通过依赖传递给服务层、工具和路由。
 */

import axios from 'axios';
import { z } from 'zod';
import { emptyRecordSet, fromTable } from '../core/record.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { TokenSource, TushareQuery, TushareTransport } from '../types/adapters.js';
import type { RecordSet, TushareParams, TusharePayload } from '../types/tushare.js';
import { TokenMissingError, TushareApiError } from '../utils/error-handler.js';
import { FIELDS } from '../config/constants.js';
import type { RateLimiterManager } from './rate-limiter.js';

const SOURCE = 'tushare';

const tushareResponseSchema = z.object({
    code: z.number(),
    msg: z.string().nullish(),
    data: z
        .object({
            fields: z.array(z.string()),
            items: z.array(z.array(z.union([z.string(), z.number(), z.boolean(), z.null()]))),
        })
        .nullish(),
});

/**
 * 基于 axios 的默认传输
 */
export function createAxiosTransport(timeout: number): TushareTransport {
    const http = axios.create({
        timeout,
        headers: {
            'Content-Type': 'application/json',
        },
    });

    return {
        async post(url, payload) {
            const response = await http.post<unknown>(url, payload);
            return response.data;
        },
    };
}

export interface TushareClientOptions {
    baseUrl: string;
    tokenSource: TokenSource;
    transport: TushareTransport;
    rateLimiter?: RateLimiterManager;
    logger?: Logger;
}

/**
 * 去掉 undefined 和空字符串参数
 */
export function compactParams(params: TushareParams): Record<string, string | number> {
    const out: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        if (typeof value === 'string' && value.trim() === '') continue;
        out[key] = value;
    }
    return out;
}

export class TushareClient implements TushareQuery {
    readonly name = SOURCE;
    private readonly baseUrl: string;
    private readonly tokenSource: TokenSource;
    private readonly transport: TushareTransport;
    private readonly rateLimiter?: RateLimiterManager;
    private readonly logger: Logger;

    constructor(options: TushareClientOptions) {
        this.baseUrl = options.baseUrl;
        this.tokenSource = options.tokenSource;
        this.transport = options.transport;
        this.rateLimiter = options.rateLimiter;
        this.logger = options.logger ?? defaultLogger;
    }

    async query(apiName: string, params: TushareParams = {}, fields?: string): Promise<RecordSet> {
        const token = await this.tokenSource.getToken();
        if (!token) {
            throw new TokenMissingError();
        }
        return this.request(apiName, params, fields, token);
    }

    /**
     * 用一次轻量调用校验 token；不传 token 时校验当前配置的 token
     */
    async verifyToken(token?: string): Promise<void> {
        const resolved = token?.trim() || (await this.tokenSource.getToken());
        if (!resolved) {
            throw new TokenMissingError();
        }
        await this.request('trade_cal', { exchange: 'SSE', limit: 1 }, FIELDS.TRADE_CAL, resolved);
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.verifyToken();
            return true;
        } catch (error) {
            this.logger.debug('Tushare unavailable', {
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }

    private async request(apiName: string, params: TushareParams, fields: string | undefined, token: string): Promise<RecordSet> {
        const payload: TusharePayload = {
            api_name: apiName,
            token,
            params: compactParams(params),
        };
        if (fields) {
            payload.fields = fields;
        }

        this.logger.debug('Calling Tushare API', { apiName, params: payload.params });

        const call = async () => this.transport.post(this.baseUrl, payload);
        const raw = this.rateLimiter ? await this.rateLimiter.schedule(SOURCE, call) : await call();

        const parsed = tushareResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new TushareApiError(apiName, -1, `无法解析的响应: ${parsed.error.message}`);
        }

        const response = parsed.data;
        if (response.code !== 0) {
            throw new TushareApiError(apiName, response.code, response.msg || '未知错误');
        }

        if (!response.data) {
            return emptyRecordSet(fields ? fields.split(',') : []);
        }

        const items = response.data.items.map(item =>
            item.map(cell => (typeof cell === 'boolean' ? String(cell) : cell)),
        );
        return fromTable(response.data.fields, items);
    }
}
