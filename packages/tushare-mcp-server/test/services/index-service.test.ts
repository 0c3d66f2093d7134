import { describe, it, expect } from 'vitest';
import { IndexService } from '../../src/services/index-service.js';
import { makeDeps, table } from '../helpers/fake-tushare.js';

function setup() {
    const deps = makeDeps();
    return { fake: deps.client, service: new IndexService(deps) };
}

describe('IndexService', () => {
    const basicFields = ['ts_code', 'name', 'market', 'list_date'];

    it('should require an index name', async () => {
        const { service } = setup();
        await expect(service.searchIndex('  ')).rejects.toThrow("'index_name' is required.");
    });

    it('should order search results by market, listing date and code', async () => {
        const { fake, service } = setup();
        fake.on('index_basic', table(
            basicFields,
            ['000300.SH', '沪深300', 'SSE', '20050408'],
            ['399300.SZ', '沪深300', 'SZSE', '20050408'],
            ['000300.CSI', '沪深300', 'CSI', '20050408'],
            ['H30001.CSI', '沪深300新', 'CSI', '20200101'],
        ));

        const rows = await service.searchIndex('沪深300', {}, 3);

        expect(rows.map(r => r.ts_code)).toEqual(['H30001.CSI', '000300.CSI', '000300.SH']);
        expect(fake.calls[0].params).toEqual({ name: '沪深300', market: undefined, publisher: undefined, category: undefined });
    });

    it('should require at least one filter for listing', async () => {
        const { fake, service } = setup();
        await expect(service.listIndexes({ name: ' ' })).rejects.toThrow(
            'At least one query parameter (ts_code, name, market, publisher, or category) must be provided.',
        );
        expect(fake.calls).toHaveLength(0);
    });

    describe('getIndexConstituents', () => {
        const fields = ['index_code', 'con_code', 'trade_date', 'weight'];

        const monthly = table(
            fields,
            ['000300.SH', '600519.SH', '20240201', 5],
            ['000300.SH', '600519.SH', '20240229', 6],
            ['000300.SH', '300750.SZ', '20240229', '3.1'],
            ['000300.SH', '601318.SH', '20240229', 12],
            ['000300.SH', '601318.SH', '20240201', 11],
        );

        it('should query the whole month of a trade date and return every snapshot', async () => {
            const { fake, service } = setup();
            fake.on('index_weight', monthly);

            const rows = await service.getIndexConstituents('000300.SH', { tradeDate: '20240215' });

            expect(rows.map(r => [r.trade_date, r.con_code, r.weight])).toEqual([
                ['20240229', '601318.SH', 12],
                ['20240229', '600519.SH', 6],
                ['20240229', '300750.SZ', '3.1'],
                ['20240201', '601318.SH', 11],
                ['20240201', '600519.SH', 5],
            ]);
            expect(fake.calls[0].params).toEqual({ index_code: '000300.SH', start_date: '20240201', end_date: '20240229' });
        });

        it('should keep only the latest snapshot when asked for the latest constituents', async () => {
            const { fake, service } = setup();
            fake.on('index_weight', monthly);

            const rows = await service.getLatestIndexConstituents('000300.SH', { startDate: '20240101', endDate: '20240229' });

            expect(rows.map(r => r.con_code)).toEqual(['601318.SH', '600519.SH', '300750.SZ']);
        });

        it('should return no latest constituents for an empty month', async () => {
            const { service } = setup();
            expect(await service.getLatestIndexConstituents('000300.SH', { tradeDate: '20240215' })).toEqual([]);
        });

        it('should require a trade date or a full range', async () => {
            const { service } = setup();
            await expect(service.getIndexConstituents('000300.SH', { startDate: '20240101' })).rejects.toThrow(
                "Either 'trade_date' or both 'start_date' and 'end_date' must be provided.",
            );
        });
    });

    describe('getGlobalIndexQuotes', () => {
        it('should reject a trade date combined with a range', async () => {
            const { service } = setup();
            await expect(
                service.getGlobalIndexQuotes('SPX', { tradeDate: '20240102', endDate: '20240105' }),
            ).rejects.toThrow("Cannot provide 'trade_date' along with 'start_date'/'end_date'. Use one or the other.");
        });

        it('should return quotes in ascending date order', async () => {
            const { fake, service } = setup();
            fake.on('index_global', table(['ts_code', 'trade_date', 'close'], ['SPX', '20240105', 3], ['SPX', '20240102', 1]));

            const rows = await service.getGlobalIndexQuotes('SPX', { startDate: '20240101', endDate: '20240110' });

            expect(rows.map(r => r.trade_date)).toEqual(['20240102', '20240105']);
        });
    });
});
