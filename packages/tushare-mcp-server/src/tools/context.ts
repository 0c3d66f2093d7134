/**
 * 工具运行依赖
 * 启动时由 bootstrap 组装一次，传给各组工具的工厂函数
 */

import type { Logger } from '../logger.js';
import type { Services } from '../services/index.js';
import type { TokenSource } from '../types/adapters.js';

export interface TokenManager extends TokenSource {
    setToken(token: string): Promise<void>;
}

export interface TokenVerifier {
    /** 校验失败时抛出异常 */
    verifyToken(token?: string): Promise<void>;
}

export interface ToolContext {
    services: Services;
    tokens: TokenManager;
    verifier: TokenVerifier;
    logger: Logger;
}
