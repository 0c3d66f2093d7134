import { describe, it, expect } from 'vitest';
import { MarketService } from '../../src/services/market-service.js';
import { makeDeps, table } from '../helpers/fake-tushare.js';

describe('MarketService', () => {
    it('should pass the stock filter to the top list query', async () => {
        const deps = makeDeps();
        deps.client.on('top_list', table(['trade_date', 'ts_code', 'reason'], ['20240102', '000001.SZ', '日涨幅偏离值达7%']));
        const service = new MarketService(deps);

        const rows = await service.getTopList('20240102', '000001.SZ');

        expect(rows).toEqual([{ trade_date: '20240102', ts_code: '000001.SZ', reason: '日涨幅偏离值达7%' }]);
        expect(deps.client.calls[0].params).toEqual({ trade_date: '20240102', ts_code: '000001.SZ' });
    });

    it('should query institution seats', async () => {
        const deps = makeDeps();
        const service = new MarketService(deps);

        expect(await service.getTopInstitutions('20240102')).toEqual([]);
        expect(deps.client.calls[0].apiName).toBe('top_inst');
    });

    it('should allow a concept query without parameters', async () => {
        const deps = makeDeps();
        deps.client.on('kpl_concept', table(['trade_date', 'ts_code', 'name'], ['20241014', '000111.KP', '华为概念']));
        const service = new MarketService(deps);

        const rows = await service.getKplConcepts();

        expect(rows).toHaveLength(1);
        expect(deps.client.calls[0].params).toEqual({ trade_date: undefined, ts_code: undefined, name: undefined });
    });
});
