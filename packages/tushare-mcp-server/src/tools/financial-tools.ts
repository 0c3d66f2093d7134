/**
 * 财务工具
 */

import { z } from 'zod';
import { TOOL_CATEGORIES } from '../config/constants.js';
import type { ToolRegistryItem } from '../types/tools.js';
import type { ToolContext } from './context.js';
import { defineTool } from './define.js';
import { displayValue, formatBlocks, formatPercent, formatRecord, SEPARATOR, type FieldLabels } from './format.js';

const INDICATOR_LABELS: FieldLabels = [
    ['end_date', '报告期'],
    ['ann_date', '公告日期'],
    ['eps', '基本每股收益'],
    ['dt_eps', '稀释每股收益'],
    ['bps', '每股净资产'],
    ['ocfps', '每股经营现金流'],
    ['grossprofit_margin', '销售毛利率(%)'],
    ['netprofit_margin', '销售净利率(%)'],
    ['roe_yearly', '年化净资产收益率(%)'],
    ['roe_waa', '加权平均净资产收益率(%)'],
    ['roe_dt', '扣非净资产收益率(%)'],
    ['n_income_attr_p', '归母净利润'],
    ['total_revenue', '营业总收入'],
    ['rd_exp', '研发费用'],
    ['debt_to_assets', '资产负债率(%)'],
    ['n_income_attr_p_yoy', '归母净利润同比(%)'],
    ['dtprofit_yoy', '扣非净利润同比(%)'],
    ['tr_yoy', '营业总收入同比(%)'],
    ['or_yoy', '营业收入同比(%)'],
];

const INCOME_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['end_date', '报告期'],
    ['ann_date', '公告日期'],
    ['report_type', '报告类型'],
    ['basic_eps', '基本每股收益'],
    ['diluted_eps', '稀释每股收益'],
    ['total_revenue', '营业总收入'],
    ['revenue', '营业收入'],
    ['total_cogs', '营业总成本'],
    ['oper_cost', '营业成本'],
    ['sell_exp', '销售费用'],
    ['admin_exp', '管理费用'],
    ['fin_exp', '财务费用'],
    ['oper_profit', '营业利润'],
    ['n_income', '净利润'],
    ['n_income_attr_p', '归母净利润'],
    ['minority_gain', '少数股东损益'],
    ['ebit', '息税前利润'],
    ['ebitda', '息税折旧摊销前利润'],
];

const BALANCE_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['end_date', '报告期'],
    ['ann_date', '公告日期'],
    ['total_share', '期末总股本'],
    ['money_cap', '货币资金'],
    ['accounts_receiv', '应收账款'],
    ['inventories', '存货'],
    ['total_cur_assets', '流动资产合计'],
    ['total_assets', '资产总计'],
    ['accounts_payable', '应付账款'],
    ['total_cur_liab', '流动负债合计'],
    ['total_liab', '负债合计'],
    ['lt_borr', '长期借款'],
    ['cap_rese', '资本公积'],
    ['surplus_rese', '盈余公积'],
    ['undistr_porfit', '未分配利润'],
    ['total_hldr_eqy_exc_min_int', '归母股东权益'],
];

const CASH_FLOW_LABELS: FieldLabels = [
    ['ts_code', '股票代码'],
    ['end_date', '报告期'],
    ['ann_date', '公告日期'],
    ['net_profit', '净利润'],
    ['c_fr_sale_sg', '销售商品、提供劳务收到的现金'],
    ['n_cashflow_act', '经营活动现金流量净额'],
    ['n_cashflow_inv_act', '投资活动现金流量净额'],
    ['n_cashflow_fin_act', '筹资活动现金流量净额'],
    ['free_cashflow', '企业自由现金流量'],
];

const MAIN_BUSINESS_LABELS: FieldLabels = [
    ['bz_item', '主营业务'],
    ['bz_sales', '主营收入'],
    ['bz_profit', '主营利润'],
    ['bz_cost', '主营成本'],
    ['curr_type', '货币'],
];

const AUDIT_LABELS: FieldLabels = [
    ['end_date', '报告期'],
    ['ann_date', '公告日期'],
    ['audit_result', '审计结果'],
    ['audit_fees', '审计费用'],
    ['audit_agency', '会计事务所'],
    ['audit_sign', '签字会计师'],
];

const MAIN_BUSINESS_TYPES = { P: '产品', D: '地区', I: '行业' } as const;

const tsCode = z.string().min(1).describe('股票代码（如：600519.SH）');
const period = z.string().describe('报告期（YYYYMMDD，如：20231231）');

export function createFinancialTools(ctx: ToolContext): ToolRegistryItem[] {
    const { financial } = ctx.services;

    return [
        defineTool(
            {
                name: 'get_financial_indicator',
                description: '获取财务指标；需提供报告期、公告日期或公告日期区间之一',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({
                    ts_code: tsCode,
                    period: period.optional(),
                    ann_date: z.string().optional().describe('公告日期（YYYYMMDD）'),
                    start_date: z.string().optional().describe('公告开始日期（YYYYMMDD）'),
                    end_date: z.string().optional().describe('公告结束日期（YYYYMMDD）'),
                    limit: z.number().int().min(1).max(100).default(10).describe('返回条数上限'),
                }),
            },
            async params => {
                const records = await financial.getFinancialIndicators({
                    tsCode: params.ts_code,
                    period: params.period,
                    annDate: params.ann_date,
                    startDate: params.start_date,
                    endDate: params.end_date,
                    limit: params.limit,
                });
                if (records.length === 0) {
                    return `未找到 ${params.ts_code} 的财务指标数据`;
                }
                return formatBlocks(records, INDICATOR_LABELS, {
                    limit: params.limit,
                    header: `--- ${params.ts_code} 财务指标 ---`,
                });
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_income_statement',
                description: '获取利润表（报告期最近一次公告），附归母净利润同比',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({
                    ts_code: tsCode,
                    period,
                    report_type: z.string().default('1').describe('报告类型，默认 1（合并报表）'),
                }),
            },
            async params => {
                const summary = await financial.getIncomeStatement(params.ts_code, params.period, params.report_type);
                if (!summary) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的利润表数据`;
                }
                const previous = summary.previousPeriod;
                return [
                    formatRecord(summary.current, INCOME_LABELS),
                    SEPARATOR,
                    `上年同期(${previous.period})归母净利润: ${displayValue(previous.netIncomeAttrParent)}`,
                    `归母净利润同比: ${formatPercent(summary.netIncomeAttrParentYoy)}`,
                ].join('\n');
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_balance_sheet',
                description: '获取资产负债表（报告期最近一次公告）',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({ ts_code: tsCode, period }),
            },
            async params => {
                const record = await financial.getBalanceSheet(params.ts_code, params.period);
                if (!record) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的资产负债表数据`;
                }
                return formatRecord(record, BALANCE_LABELS);
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_cash_flow',
                description: '获取现金流量表（报告期最近一次公告）',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({ ts_code: tsCode, period }),
            },
            async params => {
                const record = await financial.getCashFlow(params.ts_code, params.period);
                if (!record) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的现金流量表数据`;
                }
                return formatRecord(record, CASH_FLOW_LABELS);
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_fina_mainbz',
                description: '获取主营业务构成（按产品、地区或行业），附各项收入占比',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({
                    ts_code: tsCode,
                    period,
                    type: z.enum(['P', 'D', 'I']).default('P').describe('P=按产品，D=按地区，I=按行业'),
                    limit: z.number().int().min(1).max(50).default(10).describe('返回条数上限'),
                }),
            },
            async params => {
                const composition = await financial.getMainBusiness(params.ts_code, params.period, params.type, params.limit);
                if (composition.items.length === 0) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的主营业务构成数据`;
                }
                const lines = [
                    `--- ${params.ts_code} 主营业务构成（按${MAIN_BUSINESS_TYPES[params.type]}，报告期 ${params.period}）---`,
                    `主营收入合计: ${displayValue(composition.totalSales)}`,
                ];
                for (const item of composition.items) {
                    lines.push(formatRecord(item.record, MAIN_BUSINESS_LABELS));
                    lines.push(`收入占比: ${formatPercent(item.salesRatio)}`);
                    lines.push(SEPARATOR);
                }
                if (composition.truncated) {
                    lines.push(`注意: 仅显示前 ${params.limit} 项。`);
                }
                return lines.join('\n');
            },
            ctx.logger,
        ),
        defineTool(
            {
                name: 'get_fina_audit',
                description: '获取财务审计意见（报告期最近一次公告）',
                category: TOOL_CATEGORIES.FINANCIAL,
                inputSchema: z.object({ ts_code: tsCode, period }),
            },
            async params => {
                const records = await financial.getAuditOpinion(params.ts_code, params.period);
                if (records.length === 0) {
                    return `未找到 ${params.ts_code} 在报告期 ${params.period} 的审计意见`;
                }
                return formatBlocks(records, AUDIT_LABELS, { limit: records.length });
            },
            ctx.logger,
        ),
    ];
}
