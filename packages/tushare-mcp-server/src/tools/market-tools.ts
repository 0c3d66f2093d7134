/**
 * 市场工具：龙虎榜、开盘啦题材
 */

import { z } from 'zod';
import { OUTPUT_LIMITS, TOOL_CATEGORIES } from '../config/constants.js';
import type { ToolRegistryItem } from '../types/tools.js';
import type { ToolContext } from './context.js';
import { defineTool } from './define.js';
import { formatBlocks, type FieldLabels } from './format.js';

const TOP_LIST_LABELS: FieldLabels = [
    ['trade_date', '交易日期'],
    ['ts_code', '股票代码'],
    ['name', '股票名称'],
    ['close', '收盘价'],
    ['pct_chg', '涨跌幅(%)'],
    ['turnover_rate', '换手率(%)'],
    ['amount', '总成交额'],
    ['l_buy', '龙虎榜买入额'],
    ['l_sell', '龙虎榜卖出额'],
    ['net_amount', '龙虎榜净买入额'],
    ['reason', '上榜理由'],
];

const TOP_INST_LABELS: FieldLabels = [
    ['trade_date', '交易日期'],
    ['ts_code', '股票代码'],
    ['exalter', '营业部名称'],
    ['side', '买卖类型'],
    ['buy', '买入额'],
    ['sell', '卖出额'],
    ['net_buy', '净成交额'],
    ['reason', '上榜理由'],
];

const KPL_LABELS: FieldLabels = [
    ['trade_date', '交易日期'],
    ['ts_code', '题材代码'],
    ['name', '题材名称'],
    ['z_t_num', '涨停数量'],
    ['up_num', '排名上升位数'],
];

const tradeDate = z.string().describe('交易日期（YYYYMMDD）');

export function createMarketTools(ctx: ToolContext): ToolRegistryItem[] {
    const { market } = ctx.services;

    return [
        defineTool(
            {
                name: 'get_top_list_detail',
                description: '获取龙虎榜每日明细',
                category: TOOL_CATEGORIES.MARKET,
                inputSchema: z.object({
                    trade_date: tradeDate,
                    ts_code: z.string().optional().describe('股票代码（可选）'),
                }),
            },
            async params => {
                const records = await market.getTopList(params.trade_date, params.ts_code);
                if (records.length === 0) {
                    return `未找到 ${params.trade_date} 的龙虎榜数据`;
                }
                return formatBlocks(records, TOP_LIST_LABELS, {
                    limit: OUTPUT_LIMITS.TOP_LIST,
                    header: `--- 龙虎榜明细 (${params.trade_date}) ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_top_institution_detail',
                description: '获取龙虎榜机构（营业部）成交明细',
                category: TOOL_CATEGORIES.MARKET,
                inputSchema: z.object({
                    trade_date: tradeDate,
                    ts_code: z.string().optional().describe('股票代码（可选）'),
                }),
            },
            async params => {
                const records = await market.getTopInstitutions(params.trade_date, params.ts_code);
                if (records.length === 0) {
                    return `未找到 ${params.trade_date} 的龙虎榜机构明细`;
                }
                return formatBlocks(records, TOP_INST_LABELS, {
                    limit: OUTPUT_LIMITS.TOP_LIST,
                    header: `--- 龙虎榜机构明细 (${params.trade_date}) ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_kpl_concept_list',
                description: '获取开盘啦概念题材列表，可按交易日期、题材代码或题材名称筛选',
                category: TOOL_CATEGORIES.MARKET,
                inputSchema: z.object({
                    trade_date: tradeDate.optional(),
                    ts_code: z.string().optional().describe('题材代码（xxxxxx.KP 格式）'),
                    name: z.string().optional().describe('题材名称（如：化债概念）'),
                }),
            },
            async params => {
                const query = { tradeDate: params.trade_date, tsCode: params.ts_code, name: params.name };
                const records = await market.getKplConcepts(query);
                const desc = [
                    params.trade_date && `trade_date=${params.trade_date}`,
                    params.ts_code && `ts_code=${params.ts_code}`,
                    params.name && `name=${params.name}`,
                ].filter(Boolean).join(', ');

                if (records.length === 0) {
                    return `未找到符合条件的开盘啦题材数据。查询参数: ${desc || '无'}`;
                }
                return formatBlocks(records, KPL_LABELS, {
                    limit: OUTPUT_LIMITS.KPL_CONCEPT,
                    header: `--- 开盘啦题材库查询结果 (${desc || '默认/最新'}) ---`,
                });
            },
            ctx.logger,
        ),
    ];
}
