/**
 * MCP over SSE
 *
 * GET  /mcp                       建立 SSE 会话
 * POST /mcp/messages?sessionId=   发送 JSON-RPC 消息
 *
 * 每个会话一个 McpServer 实例，连接关闭时移除
 */

import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FastifyPluginAsync } from 'fastify';
import type { Logger } from '../logger.js';
import { errorMessage } from '../utils/error-handler.js';

export const MCP_BASE_PATH = '/mcp';
export const MCP_MESSAGES_PATH = `${MCP_BASE_PATH}/messages`;

export interface McpSseDeps {
    createServer: () => McpServer;
    logger: Logger;
}

export const makeMcpSseRoutes = (deps: McpSseDeps): FastifyPluginAsync => {
    const transports = new Map<string, SSEServerTransport>();

    return async (fastify) => {
        fastify.get(MCP_BASE_PATH, async (request, reply) => {
            reply.hijack();
            const transport = new SSEServerTransport(MCP_MESSAGES_PATH, reply.raw);
            const sessionId = transport.sessionId;
            transports.set(sessionId, transport);

            transport.onclose = () => {
                transports.delete(sessionId);
                deps.logger.debug('MCP SSE session closed', { sessionId });
            };

            const server = deps.createServer();
            try {
                // connect 内部会调用 transport.start()
                await server.connect(transport);
                deps.logger.info('MCP SSE session opened', { sessionId, ip: request.ip });
            } catch (error) {
                transports.delete(sessionId);
                deps.logger.error('MCP SSE connect failed', { sessionId, error: errorMessage(error) });
                if (!reply.raw.headersSent) {
                    reply.raw.writeHead(500).end('Failed to open MCP session');
                } else {
                    reply.raw.end();
                }
            }
        });

        fastify.post<{ Querystring: { sessionId?: string } }>(MCP_MESSAGES_PATH, async (request, reply) => {
            const sessionId = request.query.sessionId;
            const transport = sessionId ? transports.get(sessionId) : undefined;
            if (!transport) {
                return reply.code(404).send({ detail: 'MCP session not found' });
            }

            reply.hijack();
            await transport.handlePostMessage(request.raw, reply.raw, request.body);
        });

        fastify.addHook('onClose', async () => {
            await Promise.all([...transports.values()].map(transport => transport.close()));
            transports.clear();
        });
    };
};
