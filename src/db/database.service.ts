import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Kysely, MysqlDialect } from 'kysely';
import { createPool, PoolOptions } from 'mysql2';
import { DbRouter } from './db-router';
import type { DB } from './types';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  // Entry point for repositories
  public readonly db: DbRouter;

  private readonly replicaCount: number;

  constructor() {
    // 1. Common Configuration
    const connectionLimit = parseInt(process.env.DB_CONNECTION_LIMIT || '10');

    const commonConfig: PoolOptions = {
      user: process.env.DATABASE_USER || 'root',
      password: process.env.DATABASE_PASSWORD || '',
      database: process.env.DATABASE_NAME || 'concept_curation',
      connectionLimit,
      // MySQL DATETIME/TIMESTAMP -> Date
      typeCast: function (field, next) {
        if (field.type === 'DATETIME' || field.type === 'TIMESTAMP') {
          return new Date(`${field.string()}`);
        }
        return next();
      },
    };

    // 2. Master
    const writeDb = this.createKysely({
      ...commonConfig,
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '3306'),
    });

    // 3. Read replicas
    const replicas: Kysely<DB>[] = [];
    if (process.env.DATABASE_SLAVE1_HOST) {
      replicas.push(
        this.createKysely({
          ...commonConfig,
          host: process.env.DATABASE_SLAVE1_HOST,
          port: parseInt(process.env.DATABASE_SLAVE1_PORT || '3307'),
        }),
      );
    }
    if (process.env.DATABASE_SLAVE2_HOST) {
      replicas.push(
        this.createKysely({
          ...commonConfig,
          host: process.env.DATABASE_SLAVE2_HOST,
          port: parseInt(process.env.DATABASE_SLAVE2_PORT || '3308'),
        }),
      );
    }
    this.replicaCount = replicas.length;

    // 4. Router
    this.db = new DbRouter(writeDb, replicas);
  }

  private createKysely(options: PoolOptions): Kysely<DB> {
    return new Kysely<DB>({
      dialect: new MysqlDialect({ pool: createPool(options) }),
      log: (event) => {
        if (event.level === 'error') {
          this.logger.error(`Query failed: ${event.query.sql}`);
        } else {
          this.logger.debug(`${event.query.sql} (${event.queryDurationMillis.toFixed(1)}ms)`);
        }
      },
    });
  }

  async onModuleInit() {
    try {
      // Health check on Master
      await this.db
        .write()
        .selectFrom('general_concepts')
        .select('general_concept_id')
        .limit(1)
        .execute();
      this.logger.log(
        `Curation database initialized. Replicas connected: ${this.replicaCount}`,
      );
    } catch (error) {
      this.logger.error('Failed to connect to curation database', error);
      throw error;
    }
  }

  async onModuleDestroy() {
    // Kysely destroys the pools it owns
    await this.db.destroy();
    this.logger.log('Curation database connections closed');
  }
}
