/**
 * A 股 / 港股代码与名称互转
 *
 * 首次转换前一次性加载 A 股和港股（上市、退市、暂停）列表，
 * 按 ts_code 去重，先出现的记录优先。
 */

import { FIELDS } from '../config/constants.js';
import { readText } from '../core/record.js';
import type { Logger } from '../logger.js';
import type { TushareQuery } from '../types/adapters.js';

interface ListedSecurity {
    tsCode: string;
    name: string;
}

const HK_LIST_STATUSES = ['L', 'D', 'P'] as const;

/**
 * 用户输入的代码 → 候选 ts_code，按优先级排列
 *   sz000001 → 000001.SZ
 *   hk700    → 00700.HK
 *   000001   → 000001.SZ, 000001.SH, 00001.HK（港股补足 5 位）
 */
export function normalizeCode(query: string): string[] {
    const code = query.trim().toLowerCase();
    if (!code.includes('.')) {
        if (code.startsWith('sz')) return [`${code.slice(2)}.SZ`.toUpperCase()];
        if (code.startsWith('sh')) return [`${code.slice(2)}.SH`.toUpperCase()];
        if (code.startsWith('hk')) return [`${code.slice(2).padStart(5, '0')}.HK`.toUpperCase()];
    }
    if (/^\d+$/.test(code)) {
        return [`${code}.SZ`, `${code}.SH`, `${code.padStart(5, '0')}.HK`];
    }
    return [code.toUpperCase()];
}

/**
 * 000001.SZ → sz000001，00700.HK → hk00700
 */
export function formatDisplayCode(tsCode: string): string {
    for (const suffix of ['SZ', 'SH', 'HK']) {
        if (tsCode.endsWith(`.${suffix}`)) {
            return `${suffix.toLowerCase()}${tsCode.slice(0, -3)}`;
        }
    }
    return tsCode;
}

export class StockNameConverter {
    private readonly client: TushareQuery;
    private readonly logger?: Logger;
    private securities: ListedSecurity[] | null = null;

    constructor(client: TushareQuery, logger?: Logger) {
        this.client = client;
        this.logger = logger;
    }

    async load(): Promise<number> {
        if (this.securities) {
            return this.securities.length;
        }

        const sets = [
            await this.client.query('stock_basic', {}, FIELDS.STOCK_NAME),
            ...(await Promise.all(
                HK_LIST_STATUSES.map(status => this.client.query('hk_basic', { list_status: status }, FIELDS.HK_NAME)),
            )),
        ];

        const seen = new Set<string>();
        const securities: ListedSecurity[] = [];
        for (const records of sets) {
            for (const row of records.rows) {
                const tsCode = readText(records, row, 'ts_code');
                if (!tsCode || seen.has(tsCode)) continue;
                seen.add(tsCode);
                securities.push({ tsCode, name: readText(records, row, 'name') ?? '' });
            }
        }

        this.securities = securities;
        this.logger?.info('Stock listings loaded', { count: securities.length });
        return securities.length;
    }

    /**
     * 先按名称精确匹配，再按代码候选匹配；结果形如 平安银行(sz000001)
     */
    async convert(query: string): Promise<string> {
        await this.load();
        const securities = this.securities ?? [];
        const trimmed = query.trim();

        const byName = securities.find(item => item.name === trimmed);
        if (byName) {
            return `${byName.name}(${formatDisplayCode(byName.tsCode)})`;
        }

        for (const candidate of normalizeCode(trimmed)) {
            const byCode = securities.find(item => item.tsCode === candidate);
            if (byCode) {
                return `${byCode.name}(${formatDisplayCode(byCode.tsCode)})`;
            }
        }

        return `查询失败：未找到与 '${trimmed}' 匹配的股票。`;
    }
}
