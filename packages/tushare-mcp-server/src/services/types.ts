import type { CacheAdapter } from '../adapters/cache-adapter.js';
import type { Logger } from '../logger.js';
import type { TushareQuery } from '../types/adapters.js';

export interface ServiceDeps {
    client: TushareQuery;
    cache: CacheAdapter;
    logger: Logger;
}
