import neo4j, { type Driver, type QueryResult, type Session } from 'neo4j-driver';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { GraphPersistenceError } from '../../utils/errors.js';

const DEFAULT_QUERY_TIMEOUT_MS = 30_000;

/** One driver shared by every Neo4j-backed component. */
export class Neo4jClient {
  private driver: Driver | null = null;

  async connect(): Promise<void> {
    if (this.driver) return;
    try {
      this.driver = neo4j.driver(config.neo4j.uri, neo4j.auth.basic(config.neo4j.user, config.neo4j.password), {
        maxConnectionLifetime: 30 * 60 * 1000,
        maxConnectionPoolSize: 50,
        connectionAcquisitionTimeout: 30 * 1000,
        connectionTimeout: 30 * 1000,
      });
      await this.driver.verifyConnectivity();
      logger.info({ uri: config.neo4j.uri }, 'Connected to Neo4j');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Neo4j');
      this.driver = null;
      throw new GraphPersistenceError('Neo4j connection failed', error);
    }
  }

  async disconnect(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
      logger.info('Disconnected from Neo4j');
    }
  }

  async testConnection(): Promise<boolean> {
    if (!this.driver) return false;
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Neo4j connectivity check failed');
      return false;
    }
  }

  session(): Session {
    if (!this.driver) {
      throw new GraphPersistenceError('Neo4j driver not initialized');
    }
    return this.driver.session();
  }

  /** Runs one statement in its own session, failing after `timeoutMs`. */
  async run(
    query: string,
    params: Record<string, unknown> = {},
    timeoutMs = DEFAULT_QUERY_TIMEOUT_MS
  ): Promise<QueryResult> {
    const session = this.session();
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new GraphPersistenceError(`Query timeout after ${timeoutMs}ms`)), timeoutMs);
      });
      return await Promise.race([session.run(query, params), timeout]);
    } finally {
      if (timer) clearTimeout(timer);
      await session.close();
    }
  }
}
