/**
 * 个股数据服务
 * 基本信息、行情、股东和质押数据
 */

import { CacheAdapter } from '../adapters/cache-adapter.js';
import { CACHE_TTL, FIELDS } from '../config/constants.js';
import { resolveLatestReport } from '../core/latest-report.js';
import {
    compareBy,
    firstJsonRecord,
    readNumber,
    readText,
    sortRecords,
    toJsonRecords,
    withRows,
} from '../core/record.js';
import type { HolderType, PeriodPriceChange } from '../types/stock.js';
import type { JsonRecord, RecordSet, TushareParams } from '../types/tushare.js';
import { assertYmd } from '../utils/date-utils.js';
import { errorMessage, InvalidDataError } from '../utils/error-handler.js';
import type { ServiceDeps } from './types.js';

export class StockService {
    private readonly deps: ServiceDeps;

    constructor(deps: ServiceDeps) {
        this.deps = deps;
    }

    async getStockBasic(query: { tsCode?: string; name?: string }, fields: string = FIELDS.STOCK_BASIC): Promise<RecordSet> {
        return this.deps.client.query('stock_basic', { ts_code: query.tsCode, name: query.name }, fields);
    }

    /**
     * 全市场股票列表，缓存一小时
     */
    async getStockList(): Promise<RecordSet> {
        return this.deps.cache.getOrSet(
            CacheAdapter.generateKey('stock_basic', 'all'),
            () => this.deps.client.query('stock_basic', {}, FIELDS.STOCK_SEARCH),
            CACHE_TTL.STOCK_LIST,
        );
    }

    /**
     * 按代码、名称或 symbol 模糊搜索（不区分大小写）
     */
    async searchStocks(keyword: string, limit = 50): Promise<JsonRecord[]> {
        const needle = keyword.trim().toLowerCase();
        const list = await this.getStockList();
        const matched = list.rows.filter(row =>
            ['ts_code', 'name', 'symbol'].some(field => {
                const value = readText(list, row, field);
                return value !== null && value.toLowerCase().includes(needle);
            }),
        );
        return toJsonRecords(withRows(list, matched.slice(0, limit)));
    }

    /**
     * 股票名称，查不到时返回代码本身
     */
    async getStockName(tsCode: string): Promise<string> {
        try {
            return await this.deps.cache.getOrSet(
                CacheAdapter.generateKey('stock_name', tsCode),
                async () => {
                    const records = await this.deps.client.query('stock_basic', { ts_code: tsCode }, FIELDS.STOCK_NAME);
                    const first = records.rows[0];
                    return (first && readText(records, first, 'name')) || tsCode;
                },
                CACHE_TTL.STOCK_NAME,
            );
        } catch (error) {
            this.deps.logger.warn('Stock name lookup failed, using code', { tsCode, error: errorMessage(error) });
            return tsCode;
        }
    }

    async getDailyPrices(tsCode: string, tradeDate: string): Promise<JsonRecord | null> {
        const date = assertYmd(tradeDate, 'trade_date');
        const records = await this.deps.client.query('daily', { ts_code: tsCode, trade_date: date }, FIELDS.DAILY);
        return firstJsonRecord(records);
    }

    async getDailyMetrics(tsCode: string, tradeDate: string, fields: string = FIELDS.DAILY_METRICS): Promise<JsonRecord | null> {
        const date = assertYmd(tradeDate, 'trade_date');
        const records = await this.deps.client.query('daily_basic', { ts_code: tsCode, trade_date: date }, fields);
        return firstJsonRecord(records);
    }

    /**
     * 区间涨跌幅：区间内最早和最晚交易日的收盘价
     */
    async getPeriodPriceChange(tsCode: string, startDate: string, endDate: string): Promise<PeriodPriceChange | null> {
        const start = assertYmd(startDate, 'start_date');
        const end = assertYmd(endDate, 'end_date');

        const records = await this.deps.client.query(
            'daily',
            { ts_code: tsCode, start_date: start, end_date: end },
            FIELDS.DAILY_CLOSE,
        );
        if (records.rows.length === 0) {
            return null;
        }

        const sorted = sortRecords(records, compareBy(records, [{ field: 'trade_date', direction: 'desc' }]));
        const latest = sorted.rows[0];
        const earliest = sorted.rows[sorted.rows.length - 1];
        const endClose = readNumber(sorted, latest, 'close');
        const startClose = readNumber(sorted, earliest, 'close');
        const actualStart = readText(sorted, earliest, 'trade_date') ?? '';
        const actualEnd = readText(sorted, latest, 'trade_date') ?? '';

        if (startClose === null || endClose === null) {
            throw new InvalidDataError(
                `Could not parse start or end closing price for ${tsCode} between ${actualStart} and ${actualEnd}.`,
            );
        }

        return {
            tsCode,
            stockName: await this.getStockName(tsCode),
            requestedStartDate: start,
            requestedEndDate: end,
            actualStartTradeDate: actualStart,
            actualEndTradeDate: actualEnd,
            startClose,
            endClose,
            changePercent: startClose !== 0 ? ((endClose - startClose) / startClose) * 100 : null,
        };
    }

    /**
     * 股东户数：指定截止日期最近一次公告；不传截止日期时取最新一期
     */
    async getShareholderCount(tsCode: string, endDate?: string): Promise<JsonRecord | null> {
        const params: TushareParams = { ts_code: tsCode };
        if (endDate) {
            params.enddate = assertYmd(endDate, 'end_date');
        }

        const fetch = (p: TushareParams) => this.deps.client.query('stk_holdernumber', p, FIELDS.HOLDER_NUMBER);

        if (params.enddate !== undefined) {
            const latest = await resolveLatestReport(fetch, 'enddate', String(params.enddate), false, params, {
                logger: this.deps.logger,
            });
            return firstJsonRecord(latest);
        }

        const records = await fetch(params);
        const sorted = sortRecords(records, compareBy(records, [
            { field: 'enddate', direction: 'desc' },
            { field: 'ann_date', direction: 'desc' },
        ]));
        return firstJsonRecord(sorted);
    }

    /**
     * 前十大股东 / 前十大流通股东：报告期最近一次公告的全部股东，按持股比例降序
     */
    async getTopHolders(tsCode: string, period: string, holderType: HolderType = 'H'): Promise<JsonRecord[]> {
        const target = assertYmd(period, 'period');
        const apiName = holderType === 'H' ? 'top10_holders' : 'top10_floatholders';

        const latest = await resolveLatestReport(
            (p: TushareParams) => this.deps.client.query(apiName, p, FIELDS.TOP_HOLDERS),
            'end_date',
            target,
            true,
            { ts_code: tsCode, period: target },
            { logger: this.deps.logger },
        );
        if (!latest) {
            return [];
        }

        return toJsonRecords(sortRecords(latest, compareBy(latest, [{ field: 'hold_ratio', direction: 'desc', numeric: true }])));
    }

    async getPledgeStat(tsCode: string, endDate?: string): Promise<JsonRecord[]> {
        const params: TushareParams = { ts_code: tsCode };
        if (endDate) {
            params.end_date = assertYmd(endDate, 'end_date');
        }
        const records = await this.deps.client.query('pledge_stat', params, FIELDS.PLEDGE_STAT);
        return toJsonRecords(sortRecords(records, compareBy(records, [{ field: 'end_date', direction: 'desc' }])));
    }
}
