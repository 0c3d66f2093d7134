/**
 * Token 管理工具
 */

import { z } from 'zod';
import { TOOL_CATEGORIES } from '../config/constants.js';
import type { ToolRegistryItem } from '../types/tools.js';
import { errorMessage } from '../utils/error-handler.js';
import type { TokenManager, TokenVerifier, ToolContext } from './context.js';
import { defineTool } from './define.js';

export const TOKEN_MESSAGES = {
    INVALID: 'Token无效，请输入一个有效的字符串。',
    SAVED: 'Token配置成功！您现在可以使用Tushare的API功能了。',
    MISSING: '未配置Tushare token。请使用 setup_tushare_token 来设置您的token。',
    OK: 'Token配置正常，可以使用Tushare API。',
} as const;

export type SetupTokenResult =
    | { status: 'saved'; message: string }
    | { status: 'invalid'; message: string }
    | { status: 'failed'; message: string };

/**
 * 保存并校验 token，MCP 工具和 HTTP 接口共用
 * 校验失败时 token 仍保留在文件中，与手工编辑文件的效果一致
 */
export async function setupToken(
    token: string,
    deps: { tokens: TokenManager; verifier: TokenVerifier },
): Promise<SetupTokenResult> {
    const trimmed = token.trim();
    if (!trimmed) {
        return { status: 'invalid', message: TOKEN_MESSAGES.INVALID };
    }

    await deps.tokens.setToken(trimmed);
    try {
        await deps.verifier.verifyToken(trimmed);
    } catch (error) {
        return { status: 'failed', message: `Token配置失败：${errorMessage(error)}` };
    }
    return { status: 'saved', message: TOKEN_MESSAGES.SAVED };
}

const setupTokenSchema = z.object({
    token: z.string().describe('Tushare API token'),
});

export function createTokenTools(ctx: ToolContext): ToolRegistryItem[] {
    return [
        defineTool(
            {
                name: 'setup_tushare_token',
                description: '设置并校验 Tushare API token，保存到本地配置文件',
                category: TOOL_CATEGORIES.TOKEN,
                inputSchema: setupTokenSchema,
                tags: ['token'],
            },
            async params => (await setupToken(params.token, ctx)).message,
            ctx.logger,
        ),
        defineTool(
            {
                name: 'check_token_status',
                description: '检查当前 Tushare token 是否已配置且有效',
                category: TOOL_CATEGORIES.TOKEN,
                inputSchema: z.object({}),
                tags: ['token'],
            },
            async () => {
                const token = await ctx.tokens.getToken();
                if (!token) {
                    return TOKEN_MESSAGES.MISSING;
                }
                try {
                    await ctx.verifier.verifyToken(token);
                    return TOKEN_MESSAGES.OK;
                } catch (error) {
                    return `Token无效或已过期。错误信息: ${errorMessage(error)}`;
                }
            },
            ctx.logger,
        ),
    ];
}
