/**
 * 市场数据服务：龙虎榜、开盘啦题材
 */

import { FIELDS } from '../config/constants.js';
import { toJsonRecords } from '../core/record.js';
import type { JsonRecord } from '../types/tushare.js';
import { assertYmd } from '../utils/date-utils.js';
import type { ServiceDeps } from './types.js';

export interface KplConceptQuery {
    tradeDate?: string;
    tsCode?: string;
    name?: string;
}

export class MarketService {
    private readonly deps: ServiceDeps;

    constructor(deps: ServiceDeps) {
        this.deps = deps;
    }

    async getTopList(tradeDate: string, tsCode?: string): Promise<JsonRecord[]> {
        const date = assertYmd(tradeDate, 'trade_date');
        const records = await this.deps.client.query('top_list', { trade_date: date, ts_code: tsCode }, FIELDS.TOP_LIST);
        return toJsonRecords(records);
    }

    async getTopInstitutions(tradeDate: string, tsCode?: string): Promise<JsonRecord[]> {
        const date = assertYmd(tradeDate, 'trade_date');
        const records = await this.deps.client.query('top_inst', { trade_date: date, ts_code: tsCode }, FIELDS.TOP_INST);
        return toJsonRecords(records);
    }

    /**
     * 开盘啦题材库，参数均可选，不传时由接口返回最新数据
     */
    async getKplConcepts(query: KplConceptQuery = {}): Promise<JsonRecord[]> {
        const records = await this.deps.client.query(
            'kpl_concept',
            {
                trade_date: query.tradeDate ? assertYmd(query.tradeDate, 'trade_date') : undefined,
                ts_code: query.tsCode,
                name: query.name,
            },
            FIELDS.KPL_CONCEPT,
        );
        return toJsonRecords(records);
    }
}
