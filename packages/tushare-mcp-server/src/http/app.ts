/**
 * Fastify 应用
 * REST 接口、token 设置和 MCP SSE 挂在同一个实例上
 */

import fastifyLib, { type FastifyError, type FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { HTTP_STATUS } from '../config/constants.js';
import type { Logger } from '../logger.js';
import type { Services } from '../services/index.js';
import { setupToken, type TokenManager, type TokenVerifier } from '../tools/index.js';
import {
    InvalidDataError,
    NotFoundError,
    TokenMissingError,
    ValidationError,
} from '../utils/error-handler.js';
import { makeMcpSseRoutes } from './mcp-sse.js';
import { makeRestRoutes } from './rest-routes.js';

export interface AppDeps {
    services: Services;
    tokens: TokenManager;
    verifier: TokenVerifier;
    logger: Logger;
    /** 不传时不挂载 /mcp */
    createMcpServer?: () => McpServer;
}

const setupTokenBody = z.object({ token: z.string() }).passthrough();

function statusFor(error: FastifyError): number {
    if (error instanceof ValidationError) return HTTP_STATUS.BAD_REQUEST;
    if (error instanceof NotFoundError) return HTTP_STATUS.NOT_FOUND;
    if (error instanceof InvalidDataError) return HTTP_STATUS.UNPROCESSABLE;
    if (error instanceof TokenMissingError) return HTTP_STATUS.SERVICE_UNAVAILABLE;
    if (error.validation != null) return HTTP_STATUS.BAD_REQUEST;
    if (error.statusCode != null && error.statusCode >= 400 && error.statusCode < 500) return error.statusCode;
    return HTTP_STATUS.INTERNAL_ERROR;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
    const app = fastifyLib({ logger: false });

    app.setErrorHandler((error: FastifyError, request, reply) => {
        const status = statusFor(error);
        if (status >= HTTP_STATUS.INTERNAL_ERROR) {
            deps.logger.error('Request error', { method: request.method, url: request.url, error: error.message });
        } else {
            deps.logger.debug('Request rejected', { method: request.method, url: request.url, status, error: error.message });
        }
        return reply.status(status).send({ detail: error.message });
    });

    app.setNotFoundHandler((request, reply) => {
        return reply.status(HTTP_STATUS.NOT_FOUND).send({ detail: `Route ${request.method} ${request.url} not found` });
    });

    app.get('/', async () => ({ message: 'Tushare MCP API is running!' }));

    app.post('/tools/setup_tushare_token', async (request, reply) => {
        const parsed = setupTokenBody.safeParse(request.body);
        if (!parsed.success || !parsed.data.token.trim()) {
            return reply.code(HTTP_STATUS.BAD_REQUEST).send({
                detail: "Missing or invalid 'token' in payload. Expected a JSON object with a 'token' string.",
            });
        }

        const result = await setupToken(parsed.data.token, deps);
        if (result.status !== 'saved') {
            return reply.code(HTTP_STATUS.UNAUTHORIZED).send({ detail: result.message });
        }
        return { status: 'success', message: result.message };
    });

    await app.register(makeRestRoutes(deps.services));

    const { createMcpServer } = deps;
    if (createMcpServer) {
        await app.register(makeMcpSseRoutes({ createServer: createMcpServer, logger: deps.logger }));
    }

    return app;
}
