/**
 * MCP 服务器组装
 * stdio 和 SSE 两种传输共用同一套工具注册逻辑
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PromptDefinition, ToolRegistryItem } from './types/tools.js';

export const SERVER_INFO = {
    name: 'tushare-mcp-server',
    version: '1.0.0',
} as const;

export const CONFIGURE_TOKEN_PROMPT: PromptDefinition = {
    name: 'configure_token',
    description: '配置 Tushare token 的提示模板',
    text: `请提供您的Tushare API token。
您可以在 https://tushare.pro/user/token 获取您的token。
如果您还没有Tushare账号，请先在 https://tushare.pro/register 注册。

请输入您的token:`,
};

export function createMcpServer(tools: readonly ToolRegistryItem[]): McpServer {
    const server = new McpServer(SERVER_INFO);

    for (const tool of tools) {
        server.tool(
            tool.definition.name,
            tool.definition.description,
            tool.definition.inputSchema.shape,
            async args => {
                const result = await tool.handler(args);
                return {
                    content: [{ type: 'text' as const, text: result.text }],
                    isError: !result.success,
                };
            },
        );
    }

    server.prompt(CONFIGURE_TOKEN_PROMPT.name, CONFIGURE_TOKEN_PROMPT.description, () => ({
        messages: [
            {
                role: 'user' as const,
                content: { type: 'text' as const, text: CONFIGURE_TOKEN_PROMPT.text },
            },
        ],
    }));

    return server;
}
