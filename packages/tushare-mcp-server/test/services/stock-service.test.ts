import { describe, it, expect } from 'vitest';
import { StockService } from '../../src/services/stock-service.js';
import { InvalidDataError, ValidationError } from '../../src/utils/error-handler.js';
import { FakeTushare, makeDeps, table } from '../helpers/fake-tushare.js';

function setup() {
    const deps = makeDeps();
    return { deps, fake: deps.client, service: new StockService(deps) };
}

describe('StockService', () => {
    describe('searchStocks', () => {
        it('should match code, name and symbol case-insensitively', async () => {
            const { fake, service } = setup();
            fake.on('stock_basic', table(
                ['ts_code', 'symbol', 'name'],
                ['000001.SZ', '000001', '平安银行'],
                ['600000.SH', '600000', '浦发银行'],
                ['688981.SH', '688981', '中芯国际'],
            ));

            const result = await service.searchStocks('.sh');

            expect(result.map(r => r.ts_code)).toEqual(['600000.SH', '688981.SH']);
        });

        it('should cache the stock list between searches', async () => {
            const { fake, service } = setup();
            fake.on('stock_basic', table(['ts_code', 'symbol', 'name'], ['000001.SZ', '000001', '平安银行']));

            await service.searchStocks('银行');
            await service.searchStocks('平安');

            expect(fake.callsTo('stock_basic')).toHaveLength(1);
        });

        it('should honour the limit', async () => {
            const { fake, service } = setup();
            fake.on('stock_basic', table(
                ['ts_code', 'symbol', 'name'],
                ['000001.SZ', '000001', 'A银行'],
                ['000002.SZ', '000002', 'B银行'],
            ));
            expect(await service.searchStocks('银行', 1)).toHaveLength(1);
        });
    });

    describe('getStockName', () => {
        it('should fall back to the code when the lookup fails', async () => {
            const { deps, fake, service } = setup();
            fake.on('stock_basic', new Error('upstream down'));

            expect(await service.getStockName('000001.SZ')).toBe('000001.SZ');
            expect(deps.logger.messages('warn')).toEqual(['Stock name lookup failed, using code']);
        });

        it('should fall back to the code when nothing is found', async () => {
            const { service } = setup();
            expect(await service.getStockName('999999.SZ')).toBe('999999.SZ');
        });
    });

    describe('getDailyPrices', () => {
        it('should reject a malformed trade date before calling upstream', async () => {
            const { fake, service } = setup();
            await expect(service.getDailyPrices('000001.SZ', '2024-01-02')).rejects.toBeInstanceOf(ValidationError);
            expect(fake.calls).toHaveLength(0);
        });

        it('should return null when the stock did not trade', async () => {
            const { service } = setup();
            expect(await service.getDailyPrices('000001.SZ', '20240102')).toBeNull();
        });
    });

    describe('getPeriodPriceChange', () => {
        it('should use the earliest and latest closes in the range', async () => {
            const { fake, service } = setup();
            fake.on('daily', table(['trade_date', 'close'], ['20240105', 15], ['20240102', 10], ['20240103', 10.5]));
            fake.on('stock_basic', table(['ts_code', 'name'], ['000001.SZ', '平安银行']));

            const change = await service.getPeriodPriceChange('000001.SZ', '20240101', '20240107');

            expect(change).toEqual({
                tsCode: '000001.SZ',
                stockName: '平安银行',
                requestedStartDate: '20240101',
                requestedEndDate: '20240107',
                actualStartTradeDate: '20240102',
                actualEndTradeDate: '20240105',
                startClose: 10,
                endClose: 15,
                changePercent: 50,
            });
        });

        it('should report a null change when the start close is zero', async () => {
            const { fake, service } = setup();
            fake.on('daily', table(['trade_date', 'close'], ['20240102', 0], ['20240105', 3]));
            const change = await service.getPeriodPriceChange('000001.SZ', '20240101', '20240107');
            expect(change?.changePercent).toBeNull();
        });

        it('should raise InvalidDataError for an unparsable close', async () => {
            const { fake, service } = setup();
            fake.on('daily', table(['trade_date', 'close'], ['20240102', null], ['20240105', 3]));

            await expect(service.getPeriodPriceChange('000001.SZ', '20240101', '20240107')).rejects.toThrow(
                new InvalidDataError('Could not parse start or end closing price for 000001.SZ between 20240102 and 20240105.'),
            );
        });

        it('should return null when there is no trading data', async () => {
            const { service } = setup();
            expect(await service.getPeriodPriceChange('000001.SZ', '20240101', '20240107')).toBeNull();
        });
    });

    describe('getShareholderCount', () => {
        const fields = ['ts_code', 'ann_date', 'enddate', 'holder_num'];

        it('should resolve the latest announcement for an end date', async () => {
            const { fake, service } = setup();
            fake.on('stk_holdernumber', table(
                fields,
                ['000001.SZ', '20240110', '20231231', 500],
                ['000001.SZ', '20240120', '20231231', 520],
            ));

            const result = await service.getShareholderCount('000001.SZ', '20231231');

            expect(result?.holder_num).toBe(520);
            expect(fake.calls[0].params).toEqual({ ts_code: '000001.SZ', enddate: '20231231' });
        });

        it('should take the newest period when no end date is given', async () => {
            const { fake, service } = setup();
            fake.on('stk_holdernumber', table(
                fields,
                ['000001.SZ', '20230801', '20230630', 400],
                ['000001.SZ', '20240110', '20231231', 500],
                ['000001.SZ', '20240120', '20231231', 520],
            ));

            expect((await service.getShareholderCount('000001.SZ'))?.holder_num).toBe(520);
        });
    });

    describe('getTopHolders', () => {
        const fields = ['ts_code', 'ann_date', 'end_date', 'holder_name', 'hold_amount', 'hold_ratio'];

        it('should return the latest announcement sorted by holding ratio', async () => {
            const { fake, service } = setup();
            fake.on('top10_holders', table(
                fields,
                ['000001.SZ', '20240301', '20231231', '旧股东', 1, 99],
                ['000001.SZ', '20240315', '20231231', '乙', 2, '5.5'],
                ['000001.SZ', '20240315', '20231231', '甲', 3, 40],
            ));

            const holders = await service.getTopHolders('000001.SZ', '20231231');

            expect(holders.map(h => h.holder_name)).toEqual(['甲', '乙']);
            expect(fake.calls[0].params).toEqual({ ts_code: '000001.SZ', period: '20231231' });
        });

        it('should query float holders for type F', async () => {
            const fake = new FakeTushare();
            const service = new StockService(makeDeps(fake));

            expect(await service.getTopHolders('000001.SZ', '20231231', 'F')).toEqual([]);
            expect(fake.calls.map(c => c.apiName)).toEqual(['top10_floatholders']);
        });
    });

    it('should sort pledge statistics newest first', async () => {
        const { fake, service } = setup();
        fake.on('pledge_stat', table(['ts_code', 'end_date', 'pledge_ratio'], ['000001.SZ', '20240105', 1], ['000001.SZ', '20240112', 2]));

        const rows = await service.getPledgeStat('000001.SZ');

        expect(rows.map(r => r.end_date)).toEqual(['20240112', '20240105']);
    });
});
