/**
 * REST 路由
 * 与 MCP 工具共用服务层，返回 JSON 记录；缺失值统一为 null
 *
 * 单条记录接口查不到数据时返回 404，列表接口返回空数组
 */

import { z } from 'zod';
import type { FastifyPluginAsync } from 'fastify';
import { FIELDS } from '../config/constants.js';
import { toJsonRecords } from '../core/record.js';
import type { Services } from '../services/index.js';
import type { JsonRecord } from '../types/tushare.js';
import { NotFoundError, ValidationError } from '../utils/error-handler.js';
import { parseWith } from '../utils/validation.js';

const tsCode = z.string().trim().min(1);
const ymd = z.string().trim();
const limit = (defaultValue: number, max: number) => z.coerce.number().int().min(1).max(max).default(defaultValue);

function required<T>(value: T | null, message: string): T {
    if (value === null) {
        throw new NotFoundError(message);
    }
    return value;
}

export const makeRestRoutes = (services: Services): FastifyPluginAsync => {
    const { stock, financial, index, market } = services;

    return async (fastify) => {
        // ========== /stock ==========

        fastify.get('/stock/basic_info', async (request) => {
            const query = parseWith(z.object({ ts_code: z.string().optional(), name: z.string().optional() }), request.query);
            if (!query.ts_code && !query.name) {
                throw new ValidationError("Either 'ts_code' or 'name' query parameter must be provided.");
            }
            const records = await stock.getStockBasic({ tsCode: query.ts_code, name: query.name }, FIELDS.STOCK_BASIC_FULL);
            return toJsonRecords(records);
        });

        fastify.get('/stock/search', async (request) => {
            const query = parseWith(z.object({ keyword: z.string().min(1), limit: limit(50, 200) }), request.query);
            return stock.searchStocks(query.keyword, query.limit);
        });

        fastify.get('/stock/shareholder_count', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, end_date: ymd }), request.query);
            const record = await stock.getShareholderCount(query.ts_code, query.end_date);
            return required(record, `No shareholder count data found for ${query.ts_code} on ${query.end_date}.`);
        });

        fastify.get('/stock/daily_basic_info', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, trade_date: ymd }), request.query);
            const record = await stock.getDailyMetrics(query.ts_code, query.trade_date, FIELDS.DAILY_BASIC_INFO);
            return required(record, `No daily basic info found for ${query.ts_code} on ${query.trade_date}.`);
        });

        fastify.get('/stock/top_holders', async (request) => {
            const query = parseWith(
                z.object({ ts_code: tsCode, period: ymd, holder_type: z.enum(['H', 'F']).default('H') }),
                request.query,
            );
            return stock.getTopHolders(query.ts_code, query.period, query.holder_type);
        });

        fastify.get('/stock/period_price_change', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, start_date: ymd, end_date: ymd }), request.query);
            const change = required(
                await stock.getPeriodPriceChange(query.ts_code, query.start_date, query.end_date),
                `No daily data found for ${query.ts_code} in the range ${query.start_date} to ${query.end_date}.`,
            );
            return {
                ts_code: change.tsCode,
                stock_name: change.stockName,
                requested_start_date: change.requestedStartDate,
                requested_end_date: change.requestedEndDate,
                actual_start_trade_date: change.actualStartTradeDate,
                actual_end_trade_date: change.actualEndTradeDate,
                start_close_price: change.startClose,
                end_close_price: change.endClose,
                price_change_percentage: change.changePercent,
            };
        });

        fastify.get('/stock/pledge_detail', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, end_date: ymd.optional() }), request.query);
            return stock.getPledgeStat(query.ts_code, query.end_date);
        });

        // ========== /market ==========

        fastify.get('/market/daily_prices', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, trade_date: ymd }), request.query);
            const record = await stock.getDailyPrices(query.ts_code, query.trade_date);
            return required(record, `No daily price data found for ${query.ts_code} on ${query.trade_date}.`);
        });

        fastify.get('/market/daily_metrics', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, trade_date: ymd }), request.query);
            const record = await stock.getDailyMetrics(query.ts_code, query.trade_date);
            return required(record, `No daily metrics found for ${query.ts_code} on ${query.trade_date}.`);
        });

        fastify.get('/market/top_list_detail', async (request) => {
            const query = parseWith(z.object({ trade_date: ymd, ts_code: z.string().optional() }), request.query);
            return market.getTopList(query.trade_date, query.ts_code);
        });

        fastify.get('/market/top_institution_detail', async (request) => {
            const query = parseWith(z.object({ trade_date: ymd, ts_code: z.string().optional() }), request.query);
            return market.getTopInstitutions(query.trade_date, query.ts_code);
        });

        fastify.get('/market/kpl_concept', async (request) => {
            const query = parseWith(
                z.object({ trade_date: z.string().optional(), ts_code: z.string().optional(), name: z.string().optional() }),
                request.query,
            );
            return market.getKplConcepts({ tradeDate: query.trade_date, tsCode: query.ts_code, name: query.name });
        });

        // ========== /financial ==========

        fastify.get('/financial/indicator', async (request) => {
            const query = parseWith(
                z.object({
                    ts_code: tsCode,
                    period: z.string().optional(),
                    ann_date: z.string().optional(),
                    start_date: z.string().optional(),
                    end_date: z.string().optional(),
                    limit: limit(10, 100),
                }),
                request.query,
            );
            return financial.getFinancialIndicators({
                tsCode: query.ts_code,
                period: query.period,
                annDate: query.ann_date,
                startDate: query.start_date,
                endDate: query.end_date,
                limit: query.limit,
            });
        });

        fastify.get('/financial/income_statement', async (request) => {
            const query = parseWith(
                z.object({ ts_code: tsCode, period: ymd, report_type: z.string().default('1') }),
                request.query,
            );
            const summary = required(
                await financial.getIncomeStatement(query.ts_code, query.period, query.report_type),
                `No income statement data found for ${query.ts_code} for period ${query.period}.`,
            );
            return {
                current_period_data: summary.current,
                previous_period_comparable: {
                    period: summary.previousPeriod.period,
                    ann_date: summary.previousPeriod.annDate,
                    end_date: summary.previousPeriod.endDate,
                    n_income_attr_p: summary.previousPeriod.netIncomeAttrParent,
                },
                calculated_metrics: {
                    n_income_attr_p_yoy_pct: summary.netIncomeAttrParentYoy,
                },
            };
        });

        fastify.get('/financial/balance_sheet', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, period: ymd }), request.query);
            const record = await financial.getBalanceSheet(query.ts_code, query.period);
            return required(record, `No balance sheet data found for ${query.ts_code} for period ${query.period}.`);
        });

        fastify.get('/financial/cash_flow', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, period: ymd }), request.query);
            const record = await financial.getCashFlow(query.ts_code, query.period);
            return required(record, `No cash flow data found for ${query.ts_code} for period ${query.period}.`);
        });

        fastify.get('/financial/main_business_composition', async (request) => {
            const query = parseWith(
                z.object({ ts_code: tsCode, period: ymd, type: z.enum(['P', 'D', 'I']).default('P'), limit: limit(10, 50) }),
                request.query,
            );
            const composition = await financial.getMainBusiness(query.ts_code, query.period, query.type, query.limit);
            return composition.items.map((item): JsonRecord => ({ ...item.record, sales_ratio: item.salesRatio }));
        });

        fastify.get('/financial/audit_opinion', async (request) => {
            const query = parseWith(z.object({ ts_code: tsCode, period: ymd }), request.query);
            return financial.getAuditOpinion(query.ts_code, query.period);
        });

        // ========== /index ==========

        fastify.get('/index/search', async (request) => {
            const query = parseWith(
                z.object({
                    index_name: z.string().min(1),
                    market: z.string().optional(),
                    publisher: z.string().optional(),
                    category: z.string().optional(),
                    limit: limit(20, 100),
                }),
                request.query,
            );
            return index.searchIndex(
                query.index_name,
                { market: query.market, publisher: query.publisher, category: query.category },
                query.limit,
            );
        });

        fastify.get('/index/list', async (request) => {
            const query = parseWith(
                z.object({
                    ts_code: z.string().optional(),
                    name: z.string().optional(),
                    market: z.string().optional(),
                    publisher: z.string().optional(),
                    category: z.string().optional(),
                    limit: limit(30, 200),
                }),
                request.query,
            );
            return index.listIndexes(
                {
                    tsCode: query.ts_code,
                    name: query.name,
                    market: query.market,
                    publisher: query.publisher,
                    category: query.category,
                },
                query.limit,
            );
        });

        fastify.get('/index/constituents', async (request) => {
            const query = parseWith(
                z.object({
                    index_code: tsCode,
                    trade_date: z.string().optional(),
                    start_date: z.string().optional(),
                    end_date: z.string().optional(),
                }),
                request.query,
            );
            return index.getIndexConstituents(query.index_code, {
                tradeDate: query.trade_date,
                startDate: query.start_date,
                endDate: query.end_date,
            });
        });

        fastify.get('/index/global_quotes', async (request) => {
            const query = parseWith(
                z.object({
                    ts_code: tsCode,
                    trade_date: z.string().optional(),
                    start_date: z.string().optional(),
                    end_date: z.string().optional(),
                }),
                request.query,
            );
            return index.getGlobalIndexQuotes(query.ts_code, {
                tradeDate: query.trade_date,
                startDate: query.start_date,
                endDate: query.end_date,
            });
        });
    };
};
