import { describe, it, expect } from 'vitest';
import { displayValue, formatBlocks, formatPercent, formatRecord, SEPARATOR } from '../../src/tools/format.js';

describe('tool text formatting', () => {
    const labels = [['ts_code', '代码'], ['close', '收盘价']] as const;

    it('should round decimals to four places and mark missing values', () => {
        expect(displayValue(1.23456789)).toBe('1.2346');
        expect(displayValue(100)).toBe('100');
        expect(displayValue(null)).toBe('N/A');
        expect(formatPercent(12.345)).toBe('12.35%');
        expect(formatPercent(null)).toBe('N/A');
    });

    it('should skip null fields in a record', () => {
        expect(formatRecord({ ts_code: '000001.SZ', close: null }, labels)).toBe('代码: 000001.SZ');
    });

    it('should append a note when records exceed the limit', () => {
        const text = formatBlocks(
            [{ ts_code: 'A', close: 1 }, { ts_code: 'B', close: 2 }, { ts_code: 'C', close: 3 }],
            labels,
            { limit: 2, header: '--- 结果 ---' },
        );

        expect(text).toBe([
            '--- 结果 ---',
            `代码: A\n收盘价: 1\n${SEPARATOR}`,
            `代码: B\n收盘价: 2\n${SEPARATOR}`,
            '注意: 结果超过 2 条，仅显示前 2 条。共有 3 条数据。',
        ].join('\n'));
    });
});
