/**
 * 服务层入口
 */

import { FinancialService } from './financial-service.js';
import { IndexService } from './index-service.js';
import { MarketService } from './market-service.js';
import { StockService } from './stock-service.js';
import type { ServiceDeps } from './types.js';

export interface Services {
    stock: StockService;
    financial: FinancialService;
    index: IndexService;
    market: MarketService;
}

export function createServices(deps: ServiceDeps): Services {
    return {
        stock: new StockService(deps),
        financial: new FinancialService(deps),
        index: new IndexService(deps),
        market: new MarketService(deps),
    };
}

export { FinancialService, IndexService, MarketService, StockService };
export { StockNameConverter, normalizeCode, formatDisplayCode } from './stock-name-converter.js';
export type { ServiceDeps } from './types.js';
export type { KplConceptQuery } from './market-service.js';
