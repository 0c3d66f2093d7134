/**
 * 工具定义辅助
 * 统一做参数校验、异常转文本和日志
 */

import type { z } from 'zod';
import type { Logger } from '../logger.js';
import type { ToolDefinition, ToolHandler, ToolRegistryItem, ToolSchema } from '../types/tools.js';
import { errorMessage, toToolFailureMessage, ValidationError } from '../utils/error-handler.js';
import { formatIssues } from '../utils/validation.js';

export function defineTool<S extends ToolSchema>(
    definition: ToolDefinition<S>,
    handler: ToolHandler<z.infer<S>>,
    logger: Logger,
): ToolRegistryItem {
    return {
        definition,
        handler: async (args: unknown) => {
            const parsed = definition.inputSchema.safeParse(args ?? {});
            if (!parsed.success) {
                const error = new ValidationError(`参数错误 ${formatIssues(parsed.error)}`);
                return { success: false, text: toToolFailureMessage(definition.name, error) };
            }

            try {
                const text = await handler(parsed.data);
                return { success: true, text };
            } catch (error) {
                logger.error('Tool call failed', { tool: definition.name, error: errorMessage(error) });
                return { success: false, text: toToolFailureMessage(definition.name, error) };
            }
        },
    };
}
