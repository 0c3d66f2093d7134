/**
 * 结果集字段访问
 *
 * readField 区分三种状态：字段不在结构中、字段存在但为空、字段有值。
 * 降级逻辑依赖这个区分，调用方不应直接读取 row[name]。
 */

import type { JsonRecord, RecordSet, TushareRow, TushareScalar } from '../types/tushare.js';

export type FieldValue =
    | { kind: 'value'; value: string | number }
    | { kind: 'null' }
    | { kind: 'absent' };

export function emptyRecordSet(fields: readonly string[] = []): RecordSet {
    return { fields: [...fields], rows: [] };
}

/** 由 Tushare 的 fields + items 结构构建结果集 */
export function fromTable(fields: readonly string[], items: ReadonlyArray<ReadonlyArray<TushareScalar>>): RecordSet {
    const rows = items.map(item => {
        const row: TushareRow = {};
        fields.forEach((field, idx) => {
            row[field] = item[idx] ?? null;
        });
        return row;
    });
    return { fields: [...fields], rows };
}

export function hasField(records: RecordSet, name: string): boolean {
    return records.fields.includes(name);
}

export function readField(records: RecordSet, row: TushareRow, name: string): FieldValue {
    if (!hasField(records, name)) {
        return { kind: 'absent' };
    }
    const value = row[name];
    if (value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))) {
        return { kind: 'null' };
    }
    return { kind: 'value', value };
}

/** 字段值的字符串形式，缺失或为空时返回 null */
export function readText(records: RecordSet, row: TushareRow, name: string): string | null {
    const field = readField(records, row, name);
    return field.kind === 'value' ? String(field.value) : null;
}

/** 字段值的数值形式，无法解析为有限数时返回 null */
export function readNumber(records: RecordSet, row: TushareRow, name: string): number | null {
    const field = readField(records, row, name);
    if (field.kind !== 'value') return null;
    if (typeof field.value === 'number') return Number.isFinite(field.value) ? field.value : null;

    const trimmed = field.value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

export function withRows(records: RecordSet, rows: readonly TushareRow[]): RecordSet {
    return { fields: records.fields, rows: [...rows] };
}

/** 稳定排序，返回新的结果集 */
export function sortRecords(records: RecordSet, compare: (a: TushareRow, b: TushareRow) => number): RecordSet {
    return withRows(records, [...records.rows].sort(compare));
}

type SortKey = { field: string; direction: 'asc' | 'desc'; numeric?: boolean };

/**
 * 多字段比较器，空值始终排在最后
 */
export function compareBy(records: RecordSet, keys: readonly SortKey[]): (a: TushareRow, b: TushareRow) => number {
    return (a, b) => {
        for (const key of keys) {
            const result = key.numeric
                ? compareNullable(readNumber(records, a, key.field), readNumber(records, b, key.field), key.direction)
                : compareNullable(readText(records, a, key.field), readText(records, b, key.field), key.direction);
            if (result !== 0) return result;
        }
        return 0;
    };
}

function compareNullable<T extends string | number>(a: T | null, b: T | null, direction: 'asc' | 'desc'): number {
    if (a === null && b === null) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    if (a === b) return 0;
    const ascending = a < b ? -1 : 1;
    return direction === 'asc' ? ascending : -ascending;
}

export function toJsonRecord(records: RecordSet, row: TushareRow): JsonRecord {
    const out: JsonRecord = {};
    for (const field of records.fields) {
        const value = readField(records, row, field);
        out[field] = value.kind === 'value' ? value.value : null;
    }
    return out;
}

export function toJsonRecords(records: RecordSet): JsonRecord[] {
    return records.rows.map(row => toJsonRecord(records, row));
}

export function firstJsonRecord(records: RecordSet | null): JsonRecord | null {
    if (!records || records.rows.length === 0) return null;
    return toJsonRecord(records, records.rows[0]);
}
