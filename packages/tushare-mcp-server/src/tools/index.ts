/**
 * 工具注册中心
 * 聚合所有工具，提供统一的注册和查找接口
 */

import type { ToolDefinition, ToolRegistryItem } from '../types/tools.js';
import type { ToolContext } from './context.js';
import { createFinancialTools } from './financial-tools.js';
import { createIndexTools } from './index-tools.js';
import { createMarketTools } from './market-tools.js';
import { createStockTools } from './stock-tools.js';
import { createTokenTools } from './token-tools.js';

export function createTools(ctx: ToolContext): ToolRegistryItem[] {
    return [
        ...createTokenTools(ctx),      // 2 tools
        ...createStockTools(ctx),      // 8 tools
        ...createFinancialTools(ctx),  // 6 tools
        ...createIndexTools(ctx),      // 4 tools
        ...createMarketTools(ctx),     // 3 tools
    ];
}

export function getToolDefinitions(tools: readonly ToolRegistryItem[]): ToolDefinition[] {
    return tools.map(item => item.definition);
}

/**
 * 根据名称查找工具
 */
export function findTool(tools: readonly ToolRegistryItem[], name: string): ToolRegistryItem | undefined {
    return tools.find(item => item.definition.name === name);
}

export type { ToolContext, TokenManager, TokenVerifier } from './context.js';
export { setupToken, TOKEN_MESSAGES, type SetupTokenResult } from './token-tools.js';
