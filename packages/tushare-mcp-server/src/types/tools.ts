/**
 * 工具相关类型定义
 */

import { z } from 'zod';
import type { TOOL_CATEGORIES } from '../config/constants.js';

export type ToolCategory = (typeof TOOL_CATEGORIES)[keyof typeof TOOL_CATEGORIES];

/**
 * 工具参数 Schema 基类
 */
export type ToolSchema = z.ZodObject<z.ZodRawShape>;

/**
 * 工具定义
 */
export interface ToolDefinition<S extends ToolSchema = ToolSchema> {
    name: string;
    description: string;
    category: ToolCategory;
    inputSchema: S;
    /** 工具标签，用于分组和筛选 */
    tags?: string[];
}

/**
 * 工具调用结果
 * 失败也以文本返回给客户端，success 只用于标记 isError
 */
export interface ToolResult {
    success: boolean;
    text: string;
}

/**
 * 工具处理器函数，参数已经过 inputSchema 校验
 */
export type ToolHandler<T> = (params: T) => Promise<string>;

/**
 * 工具注册表项
 */
export interface ToolRegistryItem {
    definition: ToolDefinition;
    handler: (args: unknown) => Promise<ToolResult>;
}

/**
 * MCP 提示定义
 */
export interface PromptDefinition {
    name: string;
    description: string;
    text: string;
}
