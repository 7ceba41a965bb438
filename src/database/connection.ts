/**
 * Database connection configuration and utilities
 */

import { Pool, PoolConfig, QueryResult, QueryResultRow, types } from 'pg';
import { createLogger } from '../utils/logger';

const logger = createLogger('Database');

// BIGINT columns (Telegram ids, counts) fit safely in a double
const INT8_OID = 20;
types.setTypeParser(INT8_OID, (value: string) => parseInt(value, 10));

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  max?: number; // Maximum number of clients in pool
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export interface DatabaseStatus {
  connected: boolean;
  totalCount?: number;
  idleCount?: number;
  waitingCount?: number;
}

class DatabaseConnection {
  private pool: Pool | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Initialize database connection pool
   */
  async connect(): Promise<void> {
    try {
      const poolConfig: PoolConfig = this.config.connectionString
        ? { connectionString: this.config.connectionString }
        : {
            host: this.config.host,
            port: this.config.port,
            database: this.config.database,
            user: this.config.user,
            password: this.config.password,
          };

      this.pool = new Pool({
        ...poolConfig,
        ssl: this.config.ssl ? { rejectUnauthorized: false } : undefined,
        max: this.config.max || 10,
        idleTimeoutMillis: this.config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis || 5000,
      });

      this.pool.on('error', (error) => {
        logger.error('Idle database client error', { error: error.message });
      });

      // Test connection
      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      logger.info('Database connected successfully');
    } catch (error) {
      logger.error('Failed to connect to database:', error);
      throw error;
    }
  }

  /**
   * Execute a query
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    if (!this.pool) {
      throw new Error('Database not connected. Call connect() first.');
    }

    try {
      const start = Date.now();
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug(`Query executed in ${duration}ms`, {
        query: text,
        rowCount: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Query execution failed:', {
        query: text,
        error: error instanceof Error ? error.message : error,
      });
      throw error;
    }
  }

  /**
   * Close database connection
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('Database connection closed');
    }
  }

  /**
   * Get pool status
   */
  getStatus(): DatabaseStatus {
    if (!this.pool) {
      return { connected: false };
    }

    return {
      connected: true,
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }
}

// Default database configuration from environment variables
const getDefaultConfig = (): DatabaseConfig => ({
  connectionString: process.env.DATABASE_URL || undefined,
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'group_digest',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || '',
  ssl: process.env.DB_SSL === 'true',
  max: parseInt(process.env.DB_POOL_MAX || '10', 10),
  idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
  connectionTimeoutMillis: parseInt(
    process.env.DB_CONNECTION_TIMEOUT || '5000',
    10,
  ),
});

// Export singleton instance
export const db = new DatabaseConnection(getDefaultConfig());

export default DatabaseConnection;
