import { describe, it, expect } from 'vitest';
import { FinancialService } from '../../src/services/financial-service.js';
import { ValidationError } from '../../src/utils/error-handler.js';
import { makeDeps, table } from '../helpers/fake-tushare.js';

function setup() {
    const deps = makeDeps();
    return { fake: deps.client, service: new FinancialService(deps) };
}

describe('FinancialService', () => {
    describe('getFinancialIndicators', () => {
        it('should require a period, announcement date or full range', async () => {
            const { service } = setup();
            await expect(service.getFinancialIndicators({ tsCode: '000001.SZ' })).rejects.toThrow(
                "Must provide 'period', 'ann_date', or both 'start_date' and 'end_date'.",
            );
        });

        it('should reject a half-open range', async () => {
            const { service } = setup();
            await expect(
                service.getFinancialIndicators({ tsCode: '000001.SZ', period: '20231231', startDate: '20230101' }),
            ).rejects.toThrow("'start_date' and 'end_date' must be provided together.");
        });

        it('should reject an out-of-range limit', async () => {
            const { service } = setup();
            await expect(
                service.getFinancialIndicators({ tsCode: '000001.SZ', period: '20231231', limit: 101 }),
            ).rejects.toBeInstanceOf(ValidationError);
        });

        it('should sort by period and announcement date and apply the limit', async () => {
            const { fake, service } = setup();
            fake.on('fina_indicator', table(
                ['ts_code', 'ann_date', 'end_date', 'eps'],
                ['000001.SZ', '20230820', '20230630', 1],
                ['000001.SZ', '20240315', '20231231', 2],
                ['000001.SZ', '20240320', '20231231', 3],
            ));

            const rows = await service.getFinancialIndicators({
                tsCode: '000001.SZ',
                startDate: '20230101',
                endDate: '20231231',
                limit: 2,
            });

            expect(rows.map(r => r.eps)).toEqual([3, 2]);
            expect(fake.calls[0].params).toEqual({ ts_code: '000001.SZ', start_date: '20230101', end_date: '20231231' });
        });
    });

    describe('getIncomeStatement', () => {
        const fields = ['ts_code', 'ann_date', 'end_date', 'n_income_attr_p'];

        it('should compare with the same period last year', async () => {
            const { fake, service } = setup();
            fake.on('income', params => params.period === '20231231'
                ? table(fields, ['000001.SZ', '20240301', '20231231', 100], ['000001.SZ', '20240315', '20231231', 150])
                : table(fields, ['000001.SZ', '20230310', '20221231', -100]));

            const summary = await service.getIncomeStatement('000001.SZ', '20231231');

            expect(summary).toEqual({
                current: { ts_code: '000001.SZ', ann_date: '20240315', end_date: '20231231', n_income_attr_p: 150 },
                previousPeriod: { period: '20221231', annDate: '20230310', endDate: '20221231', netIncomeAttrParent: -100 },
                netIncomeAttrParentYoy: 250,
            });
            expect(fake.calls.map(c => c.params)).toEqual([
                { ts_code: '000001.SZ', period: '20231231', report_type: '1' },
                { ts_code: '000001.SZ', period: '20221231', report_type: '1' },
            ]);
        });

        it('should leave the growth empty without a comparable period', async () => {
            const { fake, service } = setup();
            fake.on('income', params => params.period === '20231231'
                ? table(fields, ['000001.SZ', '20240301', '20231231', 100])
                : table(fields));

            const summary = await service.getIncomeStatement('000001.SZ', '20231231');

            expect(summary?.previousPeriod).toEqual({ period: '20221231', annDate: null, endDate: null, netIncomeAttrParent: null });
            expect(summary?.netIncomeAttrParentYoy).toBeNull();
        });

        it('should return null when the period has no report', async () => {
            const { fake, service } = setup();
            expect(await service.getIncomeStatement('000001.SZ', '20231231')).toBeNull();
            expect(fake.calls).toHaveLength(1);
        });
    });

    it('should pick the latest balance sheet announcement', async () => {
        const { fake, service } = setup();
        fake.on('balancesheet', table(
            ['ts_code', 'ann_date', 'end_date', 'total_assets'],
            ['000001.SZ', '20240301', '20231231', 1],
            ['000001.SZ', '20240401', '20231231', 2],
        ));

        expect((await service.getBalanceSheet('000001.SZ', '20231231'))?.total_assets).toBe(2);
    });

    it('should return null for a missing cash flow statement', async () => {
        const { service } = setup();
        expect(await service.getCashFlow('000001.SZ', '20231231')).toBeNull();
    });

    describe('getMainBusiness', () => {
        it('should compute ratios against the total of every item', async () => {
            const { fake, service } = setup();
            fake.on('fina_mainbz', table(
                ['ts_code', 'end_date', 'bz_item', 'bz_sales'],
                ['000001.SZ', '20231231', '零售', 50],
                ['000001.SZ', '20231231', '对公', 30],
                ['000001.SZ', '20231231', '其他', 20],
            ));

            const result = await service.getMainBusiness('000001.SZ', '20231231', 'P', 2);

            expect(result.totalSales).toBe(100);
            expect(result.truncated).toBe(true);
            expect(result.items.map(item => [item.record.bz_item, item.salesRatio])).toEqual([
                ['零售', 50],
                ['对公', 30],
            ]);
        });

        it('should report no total when sales are missing', async () => {
            const { fake, service } = setup();
            fake.on('fina_mainbz', table(['bz_item', 'bz_sales'], ['零售', null]));

            const result = await service.getMainBusiness('000001.SZ', '20231231');

            expect(result.totalSales).toBeNull();
            expect(result.items[0].salesRatio).toBeNull();
            expect(result.truncated).toBe(false);
        });
    });

    it('should return every audit record of the latest announcement', async () => {
        const { fake, service } = setup();
        fake.on('fina_audit', table(
            ['ts_code', 'ann_date', 'end_date', 'audit_agency'],
            ['000001.SZ', '20240315', '20231231', '甲所'],
            ['000001.SZ', '20240315', '20231231', '乙所'],
            ['000001.SZ', '20240101', '20231231', '丙所'],
        ));

        const rows = await service.getAuditOpinion('000001.SZ', '20231231');

        expect(rows.map(r => r.audit_agency)).toEqual(['甲所', '乙所']);
    });
});
