/**
 * 最新公告解析
 *
 * 同一报告期可能有多次披露（更正、重述），这里从结果集中挑出
 * 指定报告期最近一次公告对应的记录。
 *
 * 字段缺失时按以下顺序降级，不抛异常：
 *   1. 结果集为空 → null
 *   2. 公告日期字段不在结构中 → 列表模式返回全部，单条模式返回第一条
 *   3. 报告期字段不在结构中 → 不过滤报告期，返回公告日期最大的全部记录（不区分模式）
 * 降级 2 和 3 的返回形态不一致，调用方按模式分别处理。
 */

import { logger as defaultLogger, type Logger } from '../logger.js';
import type { RecordSet, TushareRow } from '../types/tushare.js';
import { hasField, readField, readText, withRows } from './record.js';

export const DEFAULT_ANNOUNCEMENT_FIELD = 'ann_date';

export interface LatestReportOptions {
    /** 公告日期字段名，默认 ann_date */
    announcementField?: string;
    logger?: Logger;
}

export type FetchRecords<P> = (params: P) => Promise<RecordSet>;

/**
 * 按公告日期降序稳定排序；相同公告日期保留上游顺序，空值排最后
 */
function sortByAnnouncementDesc(records: RecordSet, rows: readonly TushareRow[], field: string): TushareRow[] {
    return [...rows].sort((a, b) => {
        const left = readText(records, a, field);
        const right = readText(records, b, field);
        if (left === right) return 0;
        if (left === null) return 1;
        if (right === null) return -1;
        return left > right ? -1 : 1;
    });
}

function rowsAtLatestAnnouncement(records: RecordSet, rows: readonly TushareRow[], field: string): TushareRow[] {
    const sorted = sortByAnnouncementDesc(records, rows, field);
    const latest = readText(records, sorted[0], field);
    return sorted.filter(row => readText(records, row, field) === latest);
}

function matchesPeriod(records: RecordSet, row: TushareRow, periodFieldName: string, target: string): boolean {
    const value = readField(records, row, periodFieldName);
    // 上游可能把报告期返回成数字，统一按字符串比较
    return value.kind === 'value' && String(value.value) === target;
}

export function selectLatestReport(
    records: RecordSet,
    periodFieldName: string,
    targetPeriodValue: string,
    returnAllForLatestAnnouncement: boolean,
    options: LatestReportOptions = {},
): RecordSet | null {
    const announcementField = options.announcementField ?? DEFAULT_ANNOUNCEMENT_FIELD;
    const log = options.logger ?? defaultLogger;

    if (records.rows.length === 0) {
        return null;
    }

    if (!hasField(records, announcementField)) {
        log.warn('Announcement field missing, returning unfiltered data', {
            announcementField,
            periodFieldName,
            targetPeriodValue,
            mode: returnAllForLatestAnnouncement ? 'list' : 'single',
        });
        return returnAllForLatestAnnouncement ? records : withRows(records, [records.rows[0]]);
    }

    if (!hasField(records, periodFieldName)) {
        log.warn('Period field missing, selecting by announcement date only', {
            announcementField,
            periodFieldName,
            targetPeriodValue,
        });
        return withRows(records, rowsAtLatestAnnouncement(records, records.rows, announcementField));
    }

    const target = String(targetPeriodValue);
    const matched = records.rows.filter(row => matchesPeriod(records, row, periodFieldName, target));
    if (matched.length === 0) {
        return null;
    }

    const latestRows = rowsAtLatestAnnouncement(records, matched, announcementField);
    return withRows(records, returnAllForLatestAnnouncement ? latestRows : [latestRows[0]]);
}

/**
 * 拉取数据并解析最新公告
 * fetchFn 抛出的异常原样向上传递，不重试也不包装
 */
export async function resolveLatestReport<P>(
    fetchFn: FetchRecords<P>,
    periodFieldName: string,
    targetPeriodValue: string,
    returnAllForLatestAnnouncement: boolean,
    fetchParameters: P,
    options: LatestReportOptions = {},
): Promise<RecordSet | null> {
    const records = await fetchFn(fetchParameters);
    return selectLatestReport(records, periodFieldName, targetPeriodValue, returnAllForLatestAnnouncement, options);
}
