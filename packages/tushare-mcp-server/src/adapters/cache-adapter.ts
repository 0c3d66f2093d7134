/**
 * 缓存适配器
 * 基于 node-cache，缓存股票列表、名称等变化缓慢的数据
 */

import NodeCache from 'node-cache';
import type { CacheStore } from '../types/adapters.js';

export interface CacheSettings {
    enabled: boolean;
    /** 默认 TTL（秒） */
    ttl: number;
    /** 过期检查周期（秒），0 表示不启动定时检查 */
    checkPeriod?: number;
}

export class CacheAdapter implements CacheStore {
    private readonly cache: NodeCache;
    private readonly enabled: boolean;

    constructor(settings: CacheSettings) {
        this.enabled = settings.enabled;
        this.cache = new NodeCache({
            stdTTL: settings.ttl,
            checkperiod: settings.checkPeriod ?? 60,
            useClones: true,
            deleteOnExpire: true,
        });
    }

    get<T>(key: string): T | undefined {
        if (!this.enabled) {
            return undefined;
        }
        return this.cache.get<T>(key);
    }

    set<T>(key: string, value: T, ttl?: number): void {
        if (!this.enabled) {
            return;
        }

        if (ttl !== undefined) {
            this.cache.set(key, value, ttl);
        } else {
            this.cache.set(key, value);
        }
    }

    has(key: string): boolean {
        if (!this.enabled) {
            return false;
        }
        return this.cache.has(key);
    }

    delete(key: string): void {
        this.cache.del(key);
    }

    clear(): void {
        this.cache.flushAll();
    }

    /**
     * 获取缓存统计信息
     */
    getStats(): { hits: number; misses: number; keys: number; hitRate: string } {
        const stats = this.cache.getStats();
        const total = stats.hits + stats.misses;
        const hitRate = total > 0 ? ((stats.hits / total) * 100).toFixed(2) + '%' : '0%';

        return {
            hits: stats.hits,
            misses: stats.misses,
            keys: this.cache.keys().length,
            hitRate,
        };
    }

    /**
     * 获取或设置 (缓存穿透保护)
     */
    async getOrSet<T>(key: string, fetcher: () => Promise<T>, ttl?: number): Promise<T> {
        const cached = this.get<T>(key);
        if (cached !== undefined) {
            return cached;
        }

        const value = await fetcher();
        this.set(key, value, ttl);
        return value;
    }

    close(): void {
        this.cache.close();
    }

    /**
     * 生成缓存键
     */
    static generateKey(prefix: string, ...parts: (string | number | undefined)[]): string {
        return [prefix, ...parts.filter(p => p !== undefined)].join(':');
    }
}
