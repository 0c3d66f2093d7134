#!/usr/bin/env node

/**
 * Tushare MCP Server Entry Point
 * MCP_TRANSPORT=stdio（默认）走标准输入输出，http 时启动 Fastify（REST + MCP SSE）
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createRuntime } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { buildApp } from './http/app.js';
import { createMcpServer } from './server.js';
import { errorMessage } from './utils/error-handler.js';

// 加载配置
const config = loadConfig();
const runtime = createRuntime(config);
const { logger } = runtime;

async function startStdio(): Promise<() => Promise<void>> {
    const server = createMcpServer(runtime.tools);
    await server.connect(new StdioServerTransport());
    // stdout 属于 MCP 协议，日志只写 stderr
    logger.info('MCP server started on stdio', { tools: runtime.tools.length });
    return () => server.close();
}

async function startHttp(): Promise<() => Promise<void>> {
    const app = await buildApp({
        services: runtime.services,
        tokens: runtime.tokenStore,
        verifier: runtime.client,
        logger,
        createMcpServer: () => createMcpServer(runtime.tools),
    });
    await app.listen({ host: config.host, port: config.port });
    logger.info('HTTP server listening', { host: config.host, port: config.port });

    if (!(await runtime.client.isAvailable())) {
        logger.warn('Tushare token missing or invalid, configure it with setup_tushare_token');
    }
    return () => app.close();
}

async function main() {
    const stop = config.transport === 'http' ? await startHttp() : await startStdio();

    const shutdown = async () => {
        await stop();
        await runtime.close();
        process.exit(0);
    };

    process.on('SIGINT', () => {
        shutdown().catch(error => {
            logger.error('Shutdown failed', { error: errorMessage(error) });
            process.exit(1);
        });
    });
}

main().catch(error => {
    logger.error('Fatal error', { error: errorMessage(error) });
    process.exit(1);
});
