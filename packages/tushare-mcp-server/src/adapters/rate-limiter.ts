/**
 * 限流器
 * 基于 bottleneck 实现 API 限流
 */

import Bottleneck from 'bottleneck';
import type { RateLimiterConfig } from '../types/adapters.js';

export interface RateLimitSettings {
    enabled: boolean;
    perSecond: number;
}

/**
 * 创建限流器实例
 */
export function createRateLimiter(config: RateLimiterConfig): Bottleneck {
    return new Bottleneck({
        maxConcurrent: config.maxConcurrent,
        minTime: config.minTime,
    });
}

/**
 * 限流器管理器
 * 每个数据源一个独立的限流器
 */
export class RateLimiterManager {
    private readonly settings: RateLimitSettings;
    private readonly limiters: Map<string, Bottleneck> = new Map();

    constructor(settings: RateLimitSettings) {
        this.settings = settings;
    }

    /**
     * 获取指定数据源的限流器
     */
    getLimiter(source: string): Bottleneck {
        const existing = this.limiters.get(source);
        if (existing) return existing;

        const limiter = createRateLimiter(this.limiterConfig());
        this.limiters.set(source, limiter);
        return limiter;
    }

    /**
     * Tushare 按分钟计次，各数据源都串行请求并保持最小间隔
     */
    private limiterConfig(): RateLimiterConfig {
        return {
            maxConcurrent: 1,
            minTime: Math.floor(1000 / Math.max(1, this.settings.perSecond)),
        };
    }

    /**
     * 通过限流器执行函数，禁用限流时直接执行
     */
    async schedule<T>(source: string, fn: () => Promise<T>): Promise<T> {
        if (!this.settings.enabled) {
            return fn();
        }
        return this.getLimiter(source).schedule(fn);
    }

    /**
     * 获取所有限流器的统计信息
     */
    getStats(): Record<string, { running: number; queued: number }> {
        const stats: Record<string, { running: number; queued: number }> = {};

        for (const [source, limiter] of this.limiters) {
            const counts = limiter.counts();
            stats[source] = {
                running: counts.RUNNING,
                queued: counts.QUEUED,
            };
        }

        return stats;
    }

    async stop(): Promise<void> {
        await Promise.all([...this.limiters.values()].map(limiter => limiter.stop({ dropWaitingJobs: false })));
        this.limiters.clear();
    }
}
