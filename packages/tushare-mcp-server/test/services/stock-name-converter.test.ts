import { describe, it, expect } from 'vitest';
import { formatDisplayCode, normalizeCode, StockNameConverter } from '../../src/services/stock-name-converter.js';
import { FakeTushare, MemoryLogger, table } from '../helpers/fake-tushare.js';

describe('normalizeCode', () => {
    it('should expand exchange prefixes', () => {
        expect(normalizeCode('sz000001')).toEqual(['000001.SZ']);
        expect(normalizeCode('SH600000')).toEqual(['600000.SH']);
        expect(normalizeCode('hk700')).toEqual(['00700.HK']);
    });

    it('should try every market for bare digits', () => {
        expect(normalizeCode('700')).toEqual(['700.SZ', '700.SH', '00700.HK']);
    });

    it('should upper-case full codes', () => {
        expect(normalizeCode('000001.sz')).toEqual(['000001.SZ']);
    });
});

describe('formatDisplayCode', () => {
    it('should move the exchange to a lower-case prefix', () => {
        expect(formatDisplayCode('000001.SZ')).toBe('sz000001');
        expect(formatDisplayCode('00700.HK')).toBe('hk00700');
        expect(formatDisplayCode('AAPL.O')).toBe('AAPL.O');
    });
});

describe('StockNameConverter', () => {
    function makeConverter() {
        const fake = new FakeTushare()
            .on('stock_basic', table(['ts_code', 'name'], ['000001.SZ', '平安银行'], ['600000.SH', '浦发银行']))
            .on('hk_basic', params => params.list_status === 'L'
                ? table(['ts_code', 'name'], ['00700.HK', '腾讯控股'], ['000001.SZ', '重复记录'])
                : table(['ts_code', 'name']));
        const logger = new MemoryLogger();
        return { fake, logger, converter: new StockNameConverter(fake, logger) };
    }

    it('should load A-share and every Hong Kong listing status once', async () => {
        const { fake, logger, converter } = makeConverter();

        expect(await converter.load()).toBe(3);
        expect(await converter.load()).toBe(3);

        expect(fake.callsTo('hk_basic').map(call => call.params.list_status)).toEqual(['L', 'D', 'P']);
        expect(fake.callsTo('stock_basic')).toHaveLength(1);
        expect(logger.messages('info')).toEqual(['Stock listings loaded']);
    });

    it('should convert names and codes', async () => {
        const { converter } = makeConverter();

        expect(await converter.convert('平安银行')).toBe('平安银行(sz000001)');
        expect(await converter.convert('sh600000')).toBe('浦发银行(sh600000)');
        expect(await converter.convert('700')).toBe('腾讯控股(hk00700)');
        expect(await converter.convert(' 000001 ')).toBe('平安银行(sz000001)');
    });

    it('should report an unknown query', async () => {
        const { converter } = makeConverter();
        expect(await converter.convert('不存在')).toBe("查询失败：未找到与 '不存在' 匹配的股票。");
    });
});
