/**
 * 工具和 HTTP 测试共用的运行依赖
 */

import { createServices } from '../../src/services/index.js';
import type { TokenManager, TokenVerifier, ToolContext } from '../../src/tools/index.js';
import { FakeTushare, makeDeps, MemoryLogger } from './fake-tushare.js';

export class MemoryTokens implements TokenManager {
    token: string | undefined;

    constructor(token?: string) {
        this.token = token;
    }

    async getToken(): Promise<string | undefined> {
        return this.token;
    }

    async setToken(token: string): Promise<void> {
        this.token = token;
    }
}

/** 只接受 accepted 中的 token */
export class FakeVerifier implements TokenVerifier {
    readonly verified: Array<string | undefined> = [];

    constructor(private readonly accepted: readonly string[] = ['test-secret']) {}

    async verifyToken(token?: string): Promise<void> {
        this.verified.push(token);
        if (!token || !this.accepted.includes(token)) {
            throw new Error('token不对，请确认');
        }
    }
}

export function makeToolContext(options: { token?: string; fake?: FakeTushare } = {}): ToolContext & {
    fake: FakeTushare;
    tokens: MemoryTokens;
    verifier: FakeVerifier;
    logger: MemoryLogger;
} {
    const deps = makeDeps(options.fake);
    return {
        fake: deps.client,
        services: createServices(deps),
        tokens: new MemoryTokens(options.token),
        verifier: new FakeVerifier(),
        logger: deps.logger,
    };
}
