/**
 * 指数工具
 */

import { z } from 'zod';
import { OUTPUT_LIMITS, TOOL_CATEGORIES } from '../config/constants.js';
import type { ToolRegistryItem } from '../types/tools.js';
import type { ToolContext } from './context.js';
import { defineTool } from './define.js';
import { displayValue, formatBlocks, type FieldLabels } from './format.js';

const INDEX_BASIC_LABELS: FieldLabels = [
    ['ts_code', '指数代码'],
    ['name', '指数简称'],
    ['fullname', '指数全称'],
    ['market', '市场'],
    ['publisher', '发布方'],
    ['category', '指数类别'],
    ['index_type', '指数风格'],
    ['base_date', '基期'],
    ['base_point', '基点'],
    ['list_date', '发布日期'],
    ['weight_rule', '加权方式'],
    ['exp_date', '终止日期'],
];

const GLOBAL_QUOTE_LABELS: FieldLabels = [
    ['trade_date', '交易日期'],
    ['open', '开盘点位'],
    ['high', '最高点位'],
    ['low', '最低点位'],
    ['close', '收盘点位'],
    ['pre_close', '昨收点位'],
    ['change', '涨跌点'],
    ['pct_chg', '涨跌幅(%)'],
    ['swing', '振幅(%)'],
    ['vol', '成交量'],
];

const filterShape = {
    market: z.string().optional().describe('市场（如：CSI、SSE、SZSE、MSCI、OTH）'),
    publisher: z.string().optional().describe('发布方（如：中证公司、申万）'),
    category: z.string().optional().describe('指数类别（如：规模指数、行业指数）'),
};

export function createIndexTools(ctx: ToolContext): ToolRegistryItem[] {
    const { index } = ctx.services;

    return [
        defineTool(
            {
                name: 'search_index',
                description: '按名称关键词搜索指数，可按市场、发布方、类别过滤',
                category: TOOL_CATEGORIES.INDEX,
                inputSchema: z.object({
                    index_name: z.string().min(1).describe('指数简称或全称关键词（如：沪深300）'),
                    ...filterShape,
                    limit: z.number().int().min(1).max(100).default(20).describe('返回条数上限'),
                }),
            },
            async params => {
                const records = await index.searchIndex(
                    params.index_name,
                    { market: params.market, publisher: params.publisher, category: params.category },
                    params.limit,
                );
                if (records.length === 0) {
                    return `未找到与 '${params.index_name}' 匹配的指数`;
                }
                return formatBlocks(records, INDEX_BASIC_LABELS, {
                    limit: params.limit,
                    header: `--- 指数搜索结果: ${params.index_name} ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_index_list',
                description: '按代码、名称、市场、发布方或类别列出指数（至少提供一个条件）',
                category: TOOL_CATEGORIES.INDEX,
                inputSchema: z.object({
                    ts_code: z.string().optional().describe('指数代码（如：000300.SH）'),
                    name: z.string().optional().describe('指数简称或全称关键词'),
                    ...filterShape,
                    limit: z.number().int().min(1).max(200).default(30).describe('返回条数上限'),
                }),
            },
            async params => {
                const records = await index.listIndexes(
                    {
                        tsCode: params.ts_code,
                        name: params.name,
                        market: params.market,
                        publisher: params.publisher,
                        category: params.category,
                    },
                    params.limit,
                );
                if (records.length === 0) {
                    return '未找到符合条件的指数';
                }
                return formatBlocks(records, INDEX_BASIC_LABELS, { limit: params.limit });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_index_constituents',
                description: '获取指数成分股及权重（月度数据，传交易日期时查询所在月份）',
                category: TOOL_CATEGORIES.INDEX,
                inputSchema: z.object({
                    index_code: z.string().min(1).describe('指数代码（如：000300.SH）'),
                    trade_date: z.string().optional().describe('交易日期（YYYYMMDD），查询所在月份'),
                    start_date: z.string().optional().describe('开始日期（YYYYMMDD）'),
                    end_date: z.string().optional().describe('结束日期（YYYYMMDD）'),
                }),
            },
            async params => {
                const records = await index.getLatestIndexConstituents(params.index_code, {
                    tradeDate: params.trade_date,
                    startDate: params.start_date,
                    endDate: params.end_date,
                });
                if (records.length === 0) {
                    return `未找到 ${params.index_code} 的成分股数据`;
                }
                const limit = OUTPUT_LIMITS.INDEX_CONSTITUENTS;
                const lines = [`--- ${params.index_code} 成分股权重 (${displayValue(records[0].trade_date)}) ---`];
                for (const record of records.slice(0, limit)) {
                    lines.push(`${displayValue(record.con_code)}: ${displayValue(record.weight)}%`);
                }
                if (records.length > limit) {
                    lines.push(`注意: 共有 ${records.length} 只成分股，仅显示权重最高的 ${limit} 只。`);
                }
                return lines.join('\n');
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_global_index_quotes',
                description: '获取国际主要指数行情，单个交易日或日期区间二选一',
                category: TOOL_CATEGORIES.INDEX,
                inputSchema: z.object({
                    ts_code: z.string().min(1).describe('指数代码（如：XIN9、HSI、SPX）'),
                    trade_date: z.string().optional().describe('交易日期（YYYYMMDD）'),
                    start_date: z.string().optional().describe('开始日期（YYYYMMDD）'),
                    end_date: z.string().optional().describe('结束日期（YYYYMMDD）'),
                }),
            },
            async params => {
                const records = await index.getGlobalIndexQuotes(params.ts_code, {
                    tradeDate: params.trade_date,
                    startDate: params.start_date,
                    endDate: params.end_date,
                });
                if (records.length === 0) {
                    return `未找到 ${params.ts_code} 的行情数据`;
                }
                return formatBlocks(records, GLOBAL_QUOTE_LABELS, {
                    limit: records.length,
                    header: `--- ${params.ts_code} 指数行情 ---`,
                });
            },
            ctx.logger,
        ),
    ];
}
