/**
 * 工具文本输出格式化
 */

import type { JsonRecord, TushareScalar } from '../types/tushare.js';

export const SEPARATOR = '------------------------';

/** 字段名 → 中文标签，按输出顺序排列 */
export type FieldLabels = ReadonlyArray<readonly [string, string]>;

export function displayValue(value: TushareScalar | undefined): string {
    if (value === null || value === undefined) return 'N/A';
    if (typeof value === 'number' && !Number.isInteger(value)) {
        return String(Number(value.toFixed(4)));
    }
    return String(value);
}

export function formatPercent(value: number | null): string {
    return value === null ? 'N/A' : `${value.toFixed(2)}%`;
}

/**
 * 一条记录的多行文本，空值字段跳过
 */
export function formatRecord(record: JsonRecord, labels: FieldLabels): string {
    return labels
        .filter(([field]) => record[field] !== null && record[field] !== undefined)
        .map(([field, label]) => `${label}: ${displayValue(record[field])}`)
        .join('\n');
}

export interface BlockOptions {
    limit: number;
    header?: string;
    /** 超出 limit 时追加的提示，默认给出总数 */
    truncatedNote?: (total: number, limit: number) => string;
}

export function defaultTruncatedNote(total: number, limit: number): string {
    return `注意: 结果超过 ${limit} 条，仅显示前 ${limit} 条。共有 ${total} 条数据。`;
}

/**
 * 多条记录，每条之后跟分隔线
 */
export function formatBlocks(records: readonly JsonRecord[], labels: FieldLabels, options: BlockOptions): string {
    const lines: string[] = [];
    if (options.header) {
        lines.push(options.header);
    }
    for (const record of records.slice(0, options.limit)) {
        lines.push(`${formatRecord(record, labels)}\n${SEPARATOR}`);
    }
    if (records.length > options.limit) {
        const note = options.truncatedNote ?? defaultTruncatedNote;
        lines.push(note(records.length, options.limit));
    }
    return lines.join('\n');
}
