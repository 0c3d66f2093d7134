/**
 * zod 校验辅助
 */

import { z } from 'zod';
import { ValidationError } from './error-handler.js';

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * 校验失败时抛出 ValidationError
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(formatIssues(parsed.error));
    }
    return parsed.data;
}
