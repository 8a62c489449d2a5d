import { OrderStore } from '../services/orders/types';
import { InMemoryOrderStore } from '../services/orders/memoryStore';
import { PostgresOrderStore } from '../services/orders/postgresStore';
import { logger } from '../utils/logger';
import type { EnvironmentConfig } from './environment';

/**
 * Create the order store selected by ORDER_STORE
 */
export function createOrderStore(config: EnvironmentConfig['storage']): OrderStore {
  logger.info('Initializing order store', {
    operation: 'order_store_config'
  }, { driver: config.driver });

  switch (config.driver) {
    case 'postgres':
      return new PostgresOrderStore({
        connectionString: config.databaseUrl,
        poolSize: config.poolSize
      });

    case 'memory':
      return new InMemoryOrderStore({ seedFile: config.seedFile || undefined });
  }
}
