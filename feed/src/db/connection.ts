import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { config, Config } from '../config';
import { QuestDBResult } from '../types/database';
import { databaseLogger, Logger } from '../utils/logger';
import { getTableName } from './tables';

interface ConnectionHealth {
  isConnected: boolean;
  lastSuccessfulQuery: Date | null;
  totalQueries: number;
  totalErrors: number;
  connectionAttempts: number;
  uptime: number;
}

export interface QuestDBConnectionOptions {
  connectRetries?: number;
  queryRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

export type QueryParam = string | number | boolean | Date | null;

/**
 * Render a parameter as a QuestDB SQL literal
 */
export function toSqlLiteral(param: QueryParam): string {
  if (param === null) {
    return 'NULL';
  }
  if (param instanceof Date) {
    return `'${param.toISOString()}'`;
  }
  if (typeof param === 'string') {
    return `'${param.replace(/'/g, "''")}'`;
  }
  return String(param);
}

/**
 * Substitute $1, $2, ... placeholders in one pass so values are never rescanned
 */
export function bindParams(text: string, params: QueryParam[]): string {
  return text.replace(/\$(\d+)\b/g, (placeholder, position: string) => {
    const index = parseInt(position, 10) - 1;
    if (index < 0 || index >= params.length) {
      throw new Error(`No value bound for placeholder ${placeholder}`);
    }
    return toSqlLiteral(params[index]);
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class QuestDBConnection {
  private baseUrl: string;
  private auth: { username: string; password: string };
  private isConnected = false;
  private lastSuccessfulQuery: Date | null = null;
  private totalQueries = 0;
  private totalErrors = 0;
  private connectionAttempts = 0;
  private startTime = Date.now();
  private readonly connectRetries: number;
  private readonly queryRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;

  constructor(questdbConfig: Config['questdb'] = config.questdb, options: QuestDBConnectionOptions = {}) {
    this.baseUrl = `http://${questdbConfig.host}:${questdbConfig.port}`;
    this.auth = { username: questdbConfig.user, password: questdbConfig.password };
    this.connectRetries = options.connectRetries ?? 5;
    this.queryRetries = options.queryRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.logger = options.logger ?? databaseLogger;
  }

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    let retryCount = 0;

    while (!this.isConnected) {
      this.connectionAttempts++;
      try {
        this.logger.info('Connecting to QuestDB', {
          baseUrl: this.baseUrl,
          attempt: retryCount + 1,
          maxAttempts: this.connectRetries,
        });

        const response = await axios.get(`${this.baseUrl}/exec`, {
          params: { query: 'SELECT 1' },
          auth: this.auth,
          timeout: 10000,
        });

        if (response.status !== 200) {
          throw new Error(`QuestDB connection failed with status: ${response.status}`);
        }

        this.isConnected = true;
        this.lastSuccessfulQuery = new Date();
        this.logger.info('Connected to QuestDB', { baseUrl: this.baseUrl });
      } catch (error) {
        retryCount++;
        this.totalErrors++;

        if (retryCount >= this.connectRetries) {
          this.logger.error(
            'Failed to connect to QuestDB after all retry attempts',
            { attempts: retryCount },
            error instanceof Error ? error : undefined
          );
          throw error;
        }

        const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, retryCount - 1), 10000);
        this.logger.warn('Failed to connect to QuestDB, retrying', {
          attempt: retryCount,
          maxAttempts: this.connectRetries,
          delayMs: delay,
          error: error instanceof Error ? error.message : String(error),
        });
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
    this.logger.info('Disconnected from QuestDB');
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      return (
        message.includes('timeout') ||
        message.includes('econnreset') ||
        message.includes('socket hang up') ||
        message.includes('etimedout') ||
        message.includes('network') ||
        message.includes('econnrefused')
      );
    }
    return false;
  }

  public getHealthStatus(): ConnectionHealth {
    return {
      isConnected: this.isConnected,
      lastSuccessfulQuery: this.lastSuccessfulQuery,
      totalQueries: this.totalQueries,
      totalErrors: this.totalErrors,
      connectionAttempts: this.connectionAttempts,
      uptime: Date.now() - this.startTime,
    };
  }

  async query(text: string, params: QueryParam[] = []): Promise<QuestDBResult> {
    if (!this.isConnected) {
      throw new Error('Database not connected');
    }

    const query = params.length > 0 ? bindParams(text, params) : text;
    let retryCount = 0;

    for (;;) {
      const startedAt = Date.now();
      try {
        this.totalQueries++;

        const response = await axios.get(`${this.baseUrl}/exec`, {
          params: { query },
          auth: this.auth,
          timeout: 30000,
          headers: {
            Connection: 'keep-alive',
          },
        });

        const data: unknown = response.data;
        if (!isRecord(data)) {
          throw new Error('QuestDB returned an unexpected response body');
        }
        if (typeof data.error === 'string') {
          throw new Error(`QuestDB query error: ${data.error}`);
        }

        this.lastSuccessfulQuery = new Date();
        this.logger.databaseOperation('query', { query: query.slice(0, 200), duration: Date.now() - startedAt });

        return {
          query: typeof data.query === 'string' ? data.query : undefined,
          columns: Array.isArray(data.columns) ? data.columns : [],
          dataset: Array.isArray(data.dataset) ? data.dataset : [],
          count: typeof data.count === 'number' ? data.count : undefined,
        };
      } catch (error) {
        retryCount++;
        this.totalErrors++;

        if (this.isRetryableError(error) && retryCount < this.queryRetries) {
          const delay = Math.min(this.retryBaseDelayMs * Math.pow(2, retryCount - 1), 5000);
          this.logger.warn('Database query failed, retrying', {
            attempt: retryCount,
            maxAttempts: this.queryRetries,
            delayMs: delay,
          });
          await new Promise(resolve => setTimeout(resolve, delay));
          continue;
        }

        this.logger.databaseOperation(
          'query',
          { query: query.slice(0, 200) },
          error instanceof Error ? error : new Error(String(error))
        );
        throw error;
      }
    }
  }

  /**
   * Apply schema.sql. Table names get the environment's prefix.
   */
  async executeSchema(): Promise<void> {
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = await fs.readFile(schemaPath, 'utf-8');

    const statements = schema
      .split('\n')
      .filter(line => !line.trim().startsWith('--'))
      .join('\n')
      .split(';')
      .map(statement => statement.trim())
      .filter(statement => statement.length > 0)
      .map(statement =>
        statement.replace(/CREATE TABLE IF NOT EXISTS (\w+)/i, (_match, table: string) => {
          return `CREATE TABLE IF NOT EXISTS ${getTableName(table)}`;
        })
      );

    for (const statement of statements) {
      await this.query(statement);
    }

    this.logger.info('Database schema initialized', { statements: statements.length });
  }

  async dropTables(tables: string[]): Promise<void> {
    for (const table of tables) {
      await this.query(`DROP TABLE IF EXISTS ${getTableName(table)}`);
      this.logger.info('Dropped table', { table: getTableName(table) });
    }
  }
}

export const db = new QuestDBConnection();
