import { describe, it, expect } from 'vitest';
import { createTools, findTool, getToolDefinitions } from '../../src/tools/index.js';
import { TokenMissingError } from '../../src/utils/error-handler.js';
import { table } from '../helpers/fake-tushare.js';
import { makeToolContext } from '../helpers/tool-context.js';

function setup() {
    const ctx = makeToolContext({ token: 'test-secret' });
    const tools = createTools(ctx);
    const call = async (name: string, args: unknown) => {
        const tool = findTool(tools, name);
        if (!tool) throw new Error(`unknown tool ${name}`);
        return tool.handler(args);
    };
    return { ctx, tools, call };
}

describe('tool registry', () => {
    it('should register every tool once', () => {
        const names = getToolDefinitions(setup().tools).map(d => d.name);

        expect(names).toHaveLength(23);
        expect(new Set(names).size).toBe(23);
        expect(names).toContain('get_kpl_concept_list');
    });
});

describe('tool handlers', () => {
    it('should render the period price change', async () => {
        const { ctx, call } = setup();
        ctx.fake.on('daily', table(['trade_date', 'close'], ['20240102', 10], ['20240105', 15]));
        ctx.fake.on('stock_basic', table(['ts_code', 'name'], ['000001.SZ', '平安银行']));

        const result = await call('get_period_price_change', {
            ts_code: '000001.SZ',
            start_date: '20240101',
            end_date: '20240107',
        });

        expect(result).toEqual({
            success: true,
            text: [
                '平安银行(000001.SZ) 区间涨跌幅',
                '实际区间: 2024-01-02 至 2024-01-05',
                '起始收盘价: 10',
                '结束收盘价: 15',
                '涨跌幅: 50.00%',
            ].join('\n'),
        });
    });

    it('should list the latest index constituents by weight', async () => {
        const { ctx, call } = setup();
        ctx.fake.on('index_weight', table(
            ['index_code', 'con_code', 'trade_date', 'weight'],
            ['000300.SH', '600519.SH', '20240229', 6.5],
            ['000300.SH', '601318.SH', '20240229', 12],
            ['000300.SH', '601318.SH', '20240131', 11],
        ));

        const result = await call('get_index_constituents', { index_code: '000300.SH', trade_date: '20240215' });

        expect(result.text).toBe('--- 000300.SH 成分股权重 (20240229) ---\n601318.SH: 12%\n600519.SH: 6.5%');
    });

    it('should describe an empty concept query', async () => {
        const { call } = setup();
        const result = await call('get_kpl_concept_list', { name: '不存在的题材' });
        expect(result.text).toBe('未找到符合条件的开盘啦题材数据。查询参数: name=不存在的题材');
    });

    it('should turn a validation error into failure text', async () => {
        const { ctx, call } = setup();

        const result = await call('get_daily_prices', { ts_code: '000001.SZ', trade_date: '2024-01-02' });

        expect(result).toEqual({ success: false, text: "查询失败：Invalid 'trade_date' format. Expected YYYYMMDD." });
        expect(ctx.logger.messages('error')).toEqual(['Tool call failed']);
    });

    it('should explain a missing token', async () => {
        const { ctx, call } = setup();
        ctx.fake.on('top_list', new TokenMissingError());

        const result = await call('get_top_list_detail', { trade_date: '20240102' });

        expect(result.text).toBe('错误：Tushare token 未配置或无法获取。请使用 setup_tushare_token 配置。');
    });

    it('should report a missing required argument', async () => {
        const { call } = setup();
        const result = await call('get_top_holders', {});
        expect(result.success).toBe(false);
        expect(result.text.startsWith('查询失败：参数错误 ts_code: Required')).toBe(true);
    });
});
