/**
 * 指数数据服务
 */

import { FIELDS } from '../config/constants.js';
import { compareBy, sortRecords, toJsonRecords, withRows } from '../core/record.js';
import type { DateSelection, IndexFilters } from '../types/stock.js';
import type { JsonRecord, RecordSet, TushareParams } from '../types/tushare.js';
import { assertYmd, monthRange } from '../utils/date-utils.js';
import { ValidationError } from '../utils/error-handler.js';
import type { ServiceDeps } from './types.js';

const INDEX_ORDER = [
    { field: 'market', direction: 'asc' },
    { field: 'list_date', direction: 'desc' },
    { field: 'ts_code', direction: 'asc' },
] as const;

export class IndexService {
    private readonly deps: ServiceDeps;

    constructor(deps: ServiceDeps) {
        this.deps = deps;
    }

    async searchIndex(name: string, filters: Omit<IndexFilters, 'tsCode' | 'name'> = {}, limit = 20): Promise<JsonRecord[]> {
        if (!name.trim()) {
            throw new ValidationError("'index_name' is required.");
        }
        const records = await this.deps.client.query(
            'index_basic',
            { name: name.trim(), market: filters.market, publisher: filters.publisher, category: filters.category },
            FIELDS.INDEX_BASIC,
        );
        return this.sortAndLimit(records, limit);
    }

    /**
     * 指数列表，至少需要一个过滤条件
     */
    async listIndexes(filters: IndexFilters, limit = 30): Promise<JsonRecord[]> {
        const { tsCode, name, market, publisher, category } = filters;
        if (![tsCode, name, market, publisher, category].some(value => value && value.trim())) {
            throw new ValidationError(
                'At least one query parameter (ts_code, name, market, publisher, or category) must be provided.',
            );
        }
        const records = await this.deps.client.query(
            'index_basic',
            { ts_code: tsCode, name, market, publisher, category },
            FIELDS.INDEX_BASIC_FULL,
        );
        return this.sortAndLimit(records, limit);
    }

    /**
     * 指数成分和权重（月度数据）
     * 传 tradeDate 时查询其所在月份；按交易日降序、权重降序返回区间内全部记录
     */
    async getIndexConstituents(indexCode: string, selection: DateSelection): Promise<JsonRecord[]> {
        const params: TushareParams = { index_code: indexCode };
        if (selection.tradeDate) {
            const range = monthRange(assertYmd(selection.tradeDate, 'trade_date'));
            params.start_date = range.startDate;
            params.end_date = range.endDate;
        } else if (selection.startDate && selection.endDate) {
            params.start_date = assertYmd(selection.startDate, 'start_date');
            params.end_date = assertYmd(selection.endDate, 'end_date');
        } else {
            throw new ValidationError("Either 'trade_date' or both 'start_date' and 'end_date' must be provided.");
        }

        const records = await this.deps.client.query('index_weight', params, FIELDS.INDEX_WEIGHT);
        return toJsonRecords(sortRecords(records, compareBy(records, [
            { field: 'trade_date', direction: 'desc' },
            { field: 'weight', direction: 'desc', numeric: true },
        ])));
    }

    /**
     * 区间内最新一期的成分股，权重降序
     */
    async getLatestIndexConstituents(indexCode: string, selection: DateSelection): Promise<JsonRecord[]> {
        const records = await this.getIndexConstituents(indexCode, selection);
        if (records.length === 0) {
            return [];
        }
        const latestDate = records[0].trade_date;
        return records.filter(record => record.trade_date === latestDate);
    }

    /**
     * 国际指数行情，单日和区间二选一，按交易日升序
     */
    async getGlobalIndexQuotes(tsCode: string, selection: DateSelection): Promise<JsonRecord[]> {
        const { tradeDate, startDate, endDate } = selection;
        if (tradeDate && (startDate || endDate)) {
            throw new ValidationError(
                "Cannot provide 'trade_date' along with 'start_date'/'end_date'. Use one or the other.",
            );
        }
        if (!tradeDate && !(startDate && endDate)) {
            throw new ValidationError("Either 'trade_date' or both 'start_date' and 'end_date' must be provided.");
        }

        const params: TushareParams = { ts_code: tsCode };
        if (tradeDate) {
            params.trade_date = assertYmd(tradeDate, 'trade_date');
        } else if (startDate && endDate) {
            params.start_date = assertYmd(startDate, 'start_date');
            params.end_date = assertYmd(endDate, 'end_date');
        }

        const records = await this.deps.client.query('index_global', params, FIELDS.INDEX_GLOBAL);
        return toJsonRecords(sortRecords(records, compareBy(records, [{ field: 'trade_date', direction: 'asc' }])));
    }

    private sortAndLimit(records: RecordSet, limit: number): JsonRecord[] {
        const sorted = sortRecords(records, compareBy(records, INDEX_ORDER));
        return toJsonRecords(withRows(sorted, sorted.rows.slice(0, limit)));
    }
}
