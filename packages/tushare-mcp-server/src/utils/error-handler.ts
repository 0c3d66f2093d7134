/**
 * 统一错误处理工具
 * 错误类型定义、错误分类和面向用户的失败消息
 */

import axios from 'axios';

/**
 * Tushare 接口返回 code !== 0
 */
export class TushareApiError extends Error {
    readonly code: number;
    readonly apiName: string;

    constructor(apiName: string, code: number, message: string) {
        super(`Tushare API 错误 (${apiName}, code=${code}): ${message}`);
        this.name = 'TushareApiError';
        this.apiName = apiName;
        this.code = code;
    }
}

export class TokenMissingError extends Error {
    constructor(message = 'Tushare token 未配置，请使用 setup_tushare_token 或设置 TUSHARE_TOKEN') {
        super(message);
        this.name = 'TokenMissingError';
    }
}

/**
 * 参数组合或格式不合法
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * 上游返回了数据但无法解析（如收盘价不是数字）
 */
export class InvalidDataError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidDataError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * 检查是否为网络错误：请求已发出但没有收到响应
 */
export function isNetworkError(error: unknown): boolean {
    return axios.isAxiosError(error) && error.response === undefined;
}

/**
 * 检查是否为 HTTP 429 限流
 * Tushare 自身的频次限制以 code != 0 返回，按原文透传
 */
export function isRateLimitError(error: unknown): boolean {
    return axios.isAxiosError(error) && error.response?.status === 429;
}

/**
 * 检查是否为积分不足（接口权限）错误
 */
export function isCreditError(error: unknown): boolean {
    const message = errorMessage(error);
    return message.includes('积分') || message.toLowerCase().includes('credits');
}

/**
 * 获取友好的错误消息
 */
export function getFriendlyErrorMessage(error: unknown): string {
    if (isNetworkError(error)) {
        return '网络连接失败，请检查网络设置或稍后重试';
    }

    if (isRateLimitError(error)) {
        return '请求过于频繁，请稍后再试';
    }

    const message = errorMessage(error);
    return message || '操作失败，请稍后重试';
}

/**
 * 工具失败时返回给用户的文本
 * 前缀由工具名决定：get_/search_ 为查询，setup_/set_ 为设置，其余为操作
 */
export function toToolFailureMessage(toolName: string, error: unknown): string {
    if (error instanceof TokenMissingError) {
        return '错误：Tushare token 未配置或无法获取。请使用 setup_tushare_token 配置。';
    }

    let prefix = '操作失败';
    if (toolName.startsWith('get_') || toolName.startsWith('search_')) {
        prefix = '查询失败';
    } else if (toolName.startsWith('setup_') || toolName.startsWith('set_')) {
        prefix = '设置失败';
    }

    if (isCreditError(error)) {
        return `${prefix}：Tushare积分不足，当前账户无权调用该接口。(${errorMessage(error)})`;
    }

    return `${prefix}：${getFriendlyErrorMessage(error)}`;
}
