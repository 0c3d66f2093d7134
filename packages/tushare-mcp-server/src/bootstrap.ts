/**
 * 运行时组装
 * 进程内只创建一次客户端，再通过依赖传给服务、工具和路由
 */

import { CacheAdapter } from './adapters/cache-adapter.js';
import { RateLimiterManager } from './adapters/rate-limiter.js';
import { createAxiosTransport, TushareClient } from './adapters/tushare-client.js';
import type { ServerConfig } from './config/index.js';
import { TokenStore } from './config/token-store.js';
import { createLogger, type Logger } from './logger.js';
import { createServices, StockNameConverter, type Services } from './services/index.js';
import { createTools } from './tools/index.js';
import type { TushareTransport } from './types/adapters.js';
import type { ToolRegistryItem } from './types/tools.js';

export interface Runtime {
    config: ServerConfig;
    logger: Logger;
    tokenStore: TokenStore;
    client: TushareClient;
    cache: CacheAdapter;
    rateLimiter: RateLimiterManager;
    services: Services;
    tools: ToolRegistryItem[];
    createNameConverter(): StockNameConverter;
    close(): Promise<void>;
}

export interface RuntimeOverrides {
    transport?: TushareTransport;
    logger?: Logger;
    env?: Record<string, string | undefined>;
}

export function createRuntime(config: ServerConfig, overrides: RuntimeOverrides = {}): Runtime {
    const logger = overrides.logger ?? createLogger(config.logLevel);
    const tokenStore = new TokenStore(config.tushare.envFile, overrides.env);
    const rateLimiter = new RateLimiterManager(config.rateLimit);
    const cache = new CacheAdapter({ enabled: config.cache.enabled, ttl: config.cache.ttl });

    const client = new TushareClient({
        baseUrl: config.tushare.baseUrl,
        tokenSource: tokenStore,
        transport: overrides.transport ?? createAxiosTransport(config.timeout),
        rateLimiter,
        logger,
    });

    const services = createServices({ client, cache, logger });
    const tools = createTools({ services, tokens: tokenStore, verifier: client, logger });

    return {
        config,
        logger,
        tokenStore,
        client,
        cache,
        rateLimiter,
        services,
        tools,
        createNameConverter: () => new StockNameConverter(client, logger),
        async close() {
            logger.debug('Runtime closing', { cache: cache.getStats(), limiters: rateLimiter.getStats() });
            cache.close();
            await rateLimiter.stop();
        },
    };
}
