import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import {
    getFriendlyErrorMessage,
    isCreditError,
    isNetworkError,
    isRateLimitError,
    TokenMissingError,
    toToolFailureMessage,
    TushareApiError,
} from '../../src/utils/error-handler.js';

function httpError(status: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, {
        data: {},
        status,
        statusText: '',
        headers: {},
        config,
    });
}

describe('error classification', () => {
    it('should treat axios errors without a response as network errors', () => {
        expect(isNetworkError(new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED'))).toBe(true);
        expect(isNetworkError(httpError(500))).toBe(false);
        expect(isNetworkError(new Error('timeout of 45000ms exceeded'))).toBe(false);
    });

    it('should only treat HTTP 429 responses as rate limiting', () => {
        expect(isRateLimitError(httpError(429))).toBe(true);
        expect(isRateLimitError(httpError(500))).toBe(false);
        expect(isRateLimitError(new Error('Request failed with status code 429'))).toBe(false);
    });

    it('should detect credit errors', () => {
        expect(isCreditError(new TushareApiError('top_inst', 40203, '积分不足'))).toBe(true);
        expect(isCreditError(new Error('ok'))).toBe(false);
    });

    it('should fall back to the raw message', () => {
        expect(getFriendlyErrorMessage(new Error('字段错误'))).toBe('字段错误');
        expect(getFriendlyErrorMessage(new Error(''))).toBe('操作失败，请稍后重试');
    });
});

describe('toToolFailureMessage', () => {
    it('should prefix by tool kind', () => {
        expect(toToolFailureMessage('get_daily_prices', new Error('boom'))).toBe('查询失败：boom');
        expect(toToolFailureMessage('search_index', new Error('boom'))).toBe('查询失败：boom');
        expect(toToolFailureMessage('setup_tushare_token', new Error('boom'))).toBe('设置失败：boom');
        expect(toToolFailureMessage('check_token_status', new Error('boom'))).toBe('操作失败：boom');
    });

    it('should explain a missing token', () => {
        expect(toToolFailureMessage('get_daily_prices', new TokenMissingError())).toBe(
            '错误：Tushare token 未配置或无法获取。请使用 setup_tushare_token 配置。',
        );
    });

    it('should explain insufficient credits', () => {
        const error = new TushareApiError('top_inst', 40203, '积分不足');
        expect(toToolFailureMessage('get_top_institution_detail', error)).toBe(
            '查询失败：Tushare积分不足，当前账户无权调用该接口。(Tushare API 错误 (top_inst, code=40203): 积分不足)',
        );
    });

    it('should keep upstream messages that merely contain 429 or timeout', () => {
        expect(toToolFailureMessage('get_daily_prices', new TushareApiError('daily', 40101, '股票代码 600429.SH 不存在'))).toBe(
            '查询失败：Tushare API 错误 (daily, code=40101): 股票代码 600429.SH 不存在',
        );
        expect(toToolFailureMessage('get_daily_prices', new Error('trade_date 20240429 timeout window'))).toBe(
            '查询失败：trade_date 20240429 timeout window',
        );
    });

    it('should use the friendly texts for transport failures', () => {
        expect(toToolFailureMessage('get_daily_prices', new AxiosError('socket hang up', 'ECONNRESET'))).toBe(
            '查询失败：网络连接失败，请检查网络设置或稍后重试',
        );
        expect(toToolFailureMessage('get_daily_prices', httpError(429))).toBe('查询失败：请求过于频繁，请稍后再试');
    });
});
