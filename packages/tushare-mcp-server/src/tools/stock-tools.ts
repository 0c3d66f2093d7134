/**
 * 个股工具
 * 基本信息、搜索、行情、股东和质押
 */

import { z } from 'zod';
import { OUTPUT_LIMITS, TOOL_CATEGORIES } from '../config/constants.js';
import { toJsonRecords } from '../core/record.js';
import type { ToolRegistryItem } from '../types/tools.js';
import { formatYmd } from '../utils/date-utils.js';
import type { ToolContext } from './context.js';
import { defineTool } from './define.js';
import { displayValue, formatBlocks, formatPercent, formatRecord, type FieldLabels } from './format.js';

const STOCK_BASIC_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['name', '股票名称'],
    ['area', '所属地区'],
    ['industry', '所属行业'],
    ['list_date', '上市日期'],
    ['market', '市场类型'],
    ['exchange', '交易所'],
    ['list_status', '上市状态'],
    ['delist_date', '退市日期'],
];

const SEARCH_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['name', '股票名称'],
    ['symbol', '股票简码'],
    ['area', '所属地区'],
    ['industry', '所属行业'],
    ['market', '市场类型'],
    ['list_date', '上市日期'],
];

const DAILY_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['trade_date', '交易日期'],
    ['open', '开盘价'],
    ['high', '最高价'],
    ['low', '最低价'],
    ['close', '收盘价'],
    ['pre_close', '昨收价'],
    ['change', '涨跌额'],
    ['pct_chg', '涨跌幅(%)'],
    ['vol', '成交量(手)'],
    ['amount', '成交额(千元)'],
];

const METRICS_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['trade_date', '交易日期'],
    ['close', '收盘价'],
    ['turnover_rate', '换手率(%)'],
    ['turnover_rate_f', '换手率(自由流通股)(%)'],
    ['volume_ratio', '量比'],
    ['pe', '市盈率'],
    ['pe_ttm', '市盈率(TTM)'],
    ['pb', '市净率'],
    ['ps', '市销率'],
    ['ps_ttm', '市销率(TTM)'],
    ['dv_ratio', '股息率(%)'],
    ['dv_ttm', '股息率(TTM)(%)'],
    ['total_share', '总股本(万股)'],
    ['float_share', '流通股本(万股)'],
    ['free_share', '自由流通股本(万股)'],
    ['total_mv', '总市值(万元)'],
    ['circ_mv', '流通市值(万元)'],
];

const HOLDER_NUMBER_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['ann_date', '公告日期'],
    ['enddate', '截止日期'],
    ['holder_num', '股东户数'],
];

const TOP_HOLDER_LABELS: FieldLabels = [
    ['holder_name', '股东名称'],
    ['hold_amount', '持股数量(股)'],
    ['hold_ratio', '持股比例(%)'],
];

const PLEDGE_LABELS: FieldLabels = [
    ['end_date', '截止日期'],
    ['pledge_count', '质押次数'],
    ['unrest_pledge', '无限售股质押数量(万股)'],
    ['rest_pledge', '限售股质押数量(万股)'],
    ['total_share', '总股本(万股)'],
    ['pledge_ratio', '质押比例(%)'],
];

const tsCode = z.string().min(1).describe('股票代码（如：000001.SZ）');
const ymd = (label: string) => z.string().describe(`${label}（YYYYMMDD，如：20240930）`);

export function createStockTools(ctx: ToolContext): ToolRegistryItem[] {
    const { stock } = ctx.services;

    return [
        defineTool(
            {
                name: 'get_stock_basic_info',
                description: '获取股票基本信息，可按代码或名称查询',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    ts_code: z.string().optional().describe('股票代码（如：000001.SZ）'),
                    name: z.string().optional().describe('股票名称（如：平安银行）'),
                }),
                tags: ['core'],
            },
            async params => {
                const records = toJsonRecords(await stock.getStockBasic({ tsCode: params.ts_code, name: params.name }));
                if (records.length === 0) {
                    return '未找到符合条件的股票';
                }
                return formatBlocks(records, STOCK_BASIC_LABELS, {
                    limit: OUTPUT_LIMITS.STOCK_BASIC,
                    truncatedNote: (_total, limit) =>
                        `注意: 结果超过${limit}条，仅显示前${limit}条。如需精确查找请提供 ts_code 或更具体的 name。`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'search_stocks',
                description: '按代码、名称或简码关键词搜索股票',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    keyword: z.string().min(1).describe('关键词（如：平安、000001）'),
                    limit: z.number().int().min(1).max(100).default(20).describe('返回条数上限'),
                }),
                tags: ['core'],
            },
            async params => {
                const records = await stock.searchStocks(params.keyword, params.limit);
                if (records.length === 0) {
                    return `未找到与 '${params.keyword}' 匹配的股票`;
                }
                return formatBlocks(records, SEARCH_LABELS, {
                    limit: params.limit,
                    header: `--- 股票搜索结果: ${params.keyword} ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_daily_prices',
                description: '获取股票指定交易日的开高低收等日线行情',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({ ts_code: tsCode, trade_date: ymd('交易日期') }),
            },
            async params => {
                const record = await stock.getDailyPrices(params.ts_code, params.trade_date);
                if (!record) {
                    return `未找到 ${params.ts_code} 在 ${params.trade_date} 的日线行情`;
                }
                return formatRecord(record, DAILY_LABELS);
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_daily_metrics',
                description: '获取股票指定交易日的估值、换手率和市值等指标',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({ ts_code: tsCode, trade_date: ymd('交易日期') }),
            },
            async params => {
                const record = await stock.getDailyMetrics(params.ts_code, params.trade_date);
                if (!record) {
                    return `未找到 ${params.ts_code} 在 ${params.trade_date} 的每日指标`;
                }
                return formatRecord(record, METRICS_LABELS);
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_period_price_change',
                description: '计算股票在指定区间内的涨跌幅（区间首尾交易日收盘价）',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    ts_code: tsCode,
                    start_date: ymd('区间开始日期'),
                    end_date: ymd('区间结束日期'),
                }),
            },
            async params => {
                const change = await stock.getPeriodPriceChange(params.ts_code, params.start_date, params.end_date);
                if (!change) {
                    return `未找到 ${params.ts_code} 在 ${params.start_date} 至 ${params.end_date} 的日线数据`;
                }
                return [
                    `${change.stockName}(${change.tsCode}) 区间涨跌幅`,
                    `实际区间: ${formatYmd(change.actualStartTradeDate)} 至 ${formatYmd(change.actualEndTradeDate)}`,
                    `起始收盘价: ${displayValue(change.startClose)}`,
                    `结束收盘价: ${displayValue(change.endClose)}`,
                    `涨跌幅: ${formatPercent(change.changePercent)}`,
                ].join('\n');
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_shareholder_count',
                description: '获取股东户数，不传截止日期时返回最新一期',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    ts_code: tsCode,
                    end_date: ymd('截止日期').optional(),
                }),
            },
            async params => {
                const record = await stock.getShareholderCount(params.ts_code, params.end_date);
                if (!record) {
                    return `未找到 ${params.ts_code} 的股东户数数据`;
                }
                return formatRecord(record, HOLDER_NUMBER_LABELS);
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_top_holders',
                description: '获取前十大股东或前十大流通股东（报告期最近一次公告）',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    ts_code: tsCode,
                    period: ymd('报告期'),
                    holder_type: z.enum(['H', 'F']).default('H').describe('H=前十大股东，F=前十大流通股东'),
                }),
            },
            async params => {
                const records = await stock.getTopHolders(params.ts_code, params.period, params.holder_type);
                const title = params.holder_type === 'H' ? '前十大股东' : '前十大流通股东';
                if (records.length === 0) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的${title}数据`;
                }
                const annDate = records[0].ann_date;
                return formatBlocks(records, TOP_HOLDER_LABELS, {
                    limit: records.length,
                    header: `--- ${params.ts_code} ${title} (报告期 ${params.period}，公告日期 ${displayValue(annDate)}) ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_pledge_detail',
                description: '获取股权质押统计，按截止日期降序',
                category: TOOL_CATEGORIES.STOCK,
                inputSchema: z.object({
                    ts_code: tsCode,
                    end_date: ymd('截止日期').optional(),
                }),
            },
            async params => {
                const records = await stock.getPledgeStat(params.ts_code, params.end_date);
                if (records.length === 0) {
                    return `未找到 ${params.ts_code} 的股权质押数据`;
                }
                return formatBlocks(records, PLEDGE_LABELS, {
                    limit: OUTPUT_LIMITS.PLEDGE,
                    header: `--- ${params.ts_code} 股权质押统计 ---`,
                });
            },
            ctx.logger,
        ),
    ];
}
