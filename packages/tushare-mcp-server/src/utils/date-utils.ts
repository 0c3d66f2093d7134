/**
 * 日期/报告期工具函数
 * Tushare 的日期统一为 YYYYMMDD 字符串
 */

import { YMD_REGEX } from '../config/constants.js';
import { ValidationError } from './error-handler.js';

export function isYmd(value: string): boolean {
    return YMD_REGEX.test(value);
}

/**
 * 校验 YYYYMMDD 格式，不合法时抛出 ValidationError
 */
export function assertYmd(value: string, field: string): string {
    const trimmed = value.trim();
    if (!isYmd(trimmed)) {
        throw new ValidationError(`Invalid '${field}' format. Expected YYYYMMDD.`);
    }
    return trimmed;
}

/**
 * 上一年同期，如 20231231 → 20221231
 */
export function previousYearPeriod(period: string): string {
    const year = parseInt(period.slice(0, 4), 10);
    return `${year - 1}${period.slice(4)}`;
}

/**
 * 日期所在月份的首尾日期
 */
export function monthRange(ymd: string): { startDate: string; endDate: string } {
    const year = parseInt(ymd.slice(0, 4), 10);
    const month = parseInt(ymd.slice(4, 6), 10);
    const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
    const prefix = ymd.slice(0, 6);
    return {
        startDate: `${prefix}01`,
        endDate: `${prefix}${String(lastDay).padStart(2, '0')}`,
    };
}

/**
 * YYYYMMDD → YYYY-MM-DD，其他格式原样返回
 */
export function formatYmd(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return '';
    const raw = String(value);
    if (!isYmd(raw)) return raw;
    return `${raw.slice(0, 4)}-${raw.slice(4, 6)}-${raw.slice(6, 8)}`;
}
