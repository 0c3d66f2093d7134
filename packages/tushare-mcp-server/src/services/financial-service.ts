/**
 * 财务数据服务
 *
 * 三大报表按报告期取最近一次公告（见 core/latest-report），
 * 同一报告期的更正公告会覆盖原始披露。
 */

import { FIELDS } from '../config/constants.js';
import { resolveLatestReport } from '../core/latest-report.js';
import {
    compareBy,
    firstJsonRecord,
    readNumber,
    readText,
    sortRecords,
    toJsonRecord,
    toJsonRecords,
    withRows,
} from '../core/record.js';
import type {
    FinancialIndicatorQuery,
    IncomeStatementSummary,
    MainBusinessComposition,
    MainBusinessType,
} from '../types/stock.js';
import type { JsonRecord, TushareParams } from '../types/tushare.js';
import { assertYmd, previousYearPeriod } from '../utils/date-utils.js';
import { ValidationError } from '../utils/error-handler.js';
import type { ServiceDeps } from './types.js';

const DEFAULT_INDICATOR_LIMIT = 10;
const MAX_INDICATOR_LIMIT = 100;

export class FinancialService {
    private readonly deps: ServiceDeps;

    constructor(deps: ServiceDeps) {
        this.deps = deps;
    }

    /**
     * 财务指标，按报告期、公告日期降序
     */
    async getFinancialIndicators(query: FinancialIndicatorQuery): Promise<JsonRecord[]> {
        const { tsCode, period, annDate, startDate, endDate } = query;
        const limit = query.limit ?? DEFAULT_INDICATOR_LIMIT;

        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_INDICATOR_LIMIT) {
            throw new ValidationError(`'limit' must be an integer between 1 and ${MAX_INDICATOR_LIMIT}.`);
        }
        if (!(period || annDate || (startDate && endDate))) {
            throw new ValidationError("Must provide 'period', 'ann_date', or both 'start_date' and 'end_date'.");
        }
        if (Boolean(startDate) !== Boolean(endDate)) {
            throw new ValidationError("'start_date' and 'end_date' must be provided together.");
        }

        const params: TushareParams = { ts_code: tsCode };
        if (period) params.period = assertYmd(period, 'period');
        if (annDate) params.ann_date = assertYmd(annDate, 'ann_date');
        if (startDate && endDate) {
            params.start_date = assertYmd(startDate, 'start_date');
            params.end_date = assertYmd(endDate, 'end_date');
        }

        const records = await this.deps.client.query('fina_indicator', params, FIELDS.FINA_INDICATOR);
        const sorted = sortRecords(records, compareBy(records, [
            { field: 'end_date', direction: 'desc' },
            { field: 'ann_date', direction: 'desc' },
        ]));
        return toJsonRecords(withRows(sorted, sorted.rows.slice(0, limit)));
    }

    /**
     * 利润表，附上年同期归母净利润及同比
     */
    async getIncomeStatement(tsCode: string, period: string, reportType = '1'): Promise<IncomeStatementSummary | null> {
        const target = assertYmd(period, 'period');
        const current = await resolveLatestReport(
            (p: TushareParams) => this.deps.client.query('income', p, FIELDS.INCOME),
            'end_date',
            target,
            false,
            { ts_code: tsCode, period: target, report_type: reportType },
            { logger: this.deps.logger },
        );
        if (!current || current.rows.length === 0) {
            return null;
        }
        const currentRow = current.rows[0];

        const lastYear = previousYearPeriod(target);
        const previous = await resolveLatestReport(
            (p: TushareParams) => this.deps.client.query('income', p, FIELDS.INCOME_PREVIOUS),
            'end_date',
            lastYear,
            false,
            { ts_code: tsCode, period: lastYear, report_type: reportType },
            { logger: this.deps.logger },
        );

        const previousRow = previous?.rows[0];
        const previousProfit = previous && previousRow ? readNumber(previous, previousRow, 'n_income_attr_p') : null;
        const currentProfit = readNumber(current, currentRow, 'n_income_attr_p');

        let yoy: number | null = null;
        if (currentProfit !== null && previousProfit !== null && previousProfit !== 0) {
            yoy = ((currentProfit - previousProfit) / Math.abs(previousProfit)) * 100;
        }

        return {
            current: toJsonRecord(current, currentRow),
            previousPeriod: {
                period: lastYear,
                annDate: previous && previousRow ? readText(previous, previousRow, 'ann_date') : null,
                endDate: previous && previousRow ? readText(previous, previousRow, 'end_date') : null,
                netIncomeAttrParent: previousProfit,
            },
            netIncomeAttrParentYoy: yoy,
        };
    }

    async getBalanceSheet(tsCode: string, period: string): Promise<JsonRecord | null> {
        return this.latestStatement('balancesheet', FIELDS.BALANCE_SHEET, tsCode, period);
    }

    async getCashFlow(tsCode: string, period: string): Promise<JsonRecord | null> {
        return this.latestStatement('cashflow', FIELDS.CASH_FLOW, tsCode, period);
    }

    /**
     * 主营业务构成，附各项占总收入比例
     * 总收入按全部条目合计，截断只影响返回的条目
     */
    async getMainBusiness(
        tsCode: string,
        period: string,
        type: MainBusinessType = 'P',
        limit = 10,
    ): Promise<MainBusinessComposition> {
        const target = assertYmd(period, 'period');
        const records = await this.deps.client.query(
            'fina_mainbz',
            { ts_code: tsCode, period: target, type },
            FIELDS.MAIN_BUSINESS,
        );

        const sales = records.rows.map(row => readNumber(records, row, 'bz_sales'));
        const known = sales.filter((value): value is number => value !== null);
        const totalSales = known.length > 0 ? known.reduce((sum, value) => sum + value, 0) : null;

        const items = records.rows.slice(0, limit).map((row, idx) => {
            const value = sales[idx];
            return {
                record: toJsonRecord(records, row),
                salesRatio: value !== null && totalSales ? (value / totalSales) * 100 : null,
            };
        });

        return { totalSales, items, truncated: records.rows.length > limit };
    }

    /**
     * 审计意见：报告期最近一次公告的全部记录
     */
    async getAuditOpinion(tsCode: string, period: string): Promise<JsonRecord[]> {
        const target = assertYmd(period, 'period');
        const latest = await resolveLatestReport(
            (p: TushareParams) => this.deps.client.query('fina_audit', p, FIELDS.AUDIT),
            'end_date',
            target,
            true,
            { ts_code: tsCode, period: target },
            { logger: this.deps.logger },
        );
        return latest ? toJsonRecords(latest) : [];
    }

    private async latestStatement(apiName: string, fields: string, tsCode: string, period: string): Promise<JsonRecord | null> {
        const target = assertYmd(period, 'period');
        const latest = await resolveLatestReport(
            (p: TushareParams) => this.deps.client.query(apiName, p, fields),
            'end_date',
            target,
            false,
            { ts_code: tsCode, period: target },
            { logger: this.deps.logger },
        );
        return firstJsonRecord(latest);
    }
}
