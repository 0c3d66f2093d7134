/**
 * 服务层返回的组合数据类型
 */

import type { JsonRecord } from './tushare.js';

export type HolderType = 'H' | 'F';

export type MainBusinessType = 'P' | 'D' | 'I';

/**
 * 区间涨跌幅
 */
export interface PeriodPriceChange {
    tsCode: string;
    stockName: string;
    requestedStartDate: string;
    requestedEndDate: string;
    actualStartTradeDate: string;
    actualEndTradeDate: string;
    startClose: number;
    endClose: number;
    /** 起始收盘价为 0 时为 null */
    changePercent: number | null;
}

/**
 * 利润表及上年同期归母净利润对比
 */
export interface IncomeStatementSummary {
    current: JsonRecord;
    previousPeriod: {
        period: string;
        annDate: string | null;
        endDate: string | null;
        netIncomeAttrParent: number | null;
    };
    /** 归母净利润同比（%），上年同期缺失或为 0 时为 null */
    netIncomeAttrParentYoy: number | null;
}

export interface MainBusinessItem {
    record: JsonRecord;
    /** 占总收入比例（%） */
    salesRatio: number | null;
}

export interface MainBusinessComposition {
    totalSales: number | null;
    items: MainBusinessItem[];
    truncated: boolean;
}

export interface FinancialIndicatorQuery {
    tsCode: string;
    period?: string;
    annDate?: string;
    startDate?: string;
    endDate?: string;
    limit?: number;
}

export interface IndexFilters {
    tsCode?: string;
    name?: string;
    market?: string;
    publisher?: string;
    category?: string;
}

export interface DateSelection {
    tradeDate?: string;
    startDate?: string;
    endDate?: string;
}
