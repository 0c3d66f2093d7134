/**
 * 适配器相关类型定义
 */

import type { RecordSet, TushareParams, TusharePayload } from './tushare.js';

/**
 * Tushare 查询端口
 * 服务层只依赖这个接口，测试时可替换为进程内实现
 */
export interface TushareQuery {
    query(apiName: string, params?: TushareParams, fields?: string): Promise<RecordSet>;
}

/**
 * 底层 HTTP 传输，返回未经校验的响应体
 */
export interface TushareTransport {
    post(url: string, payload: TusharePayload): Promise<unknown>;
}

/**
 * Token 来源
 */
export interface TokenSource {
    getToken(): Promise<string | undefined>;
}

/**
 * 缓存适配器接口
 */
export interface CacheStore {
    get<T>(key: string): T | undefined;
    set<T>(key: string, value: T, ttl?: number): void;
    has(key: string): boolean;
    delete(key: string): void;
    clear(): void;
}

/**
 * 限流配置
 */
export interface RateLimiterConfig {
    maxConcurrent: number;
    minTime: number; // ms between requests
}
