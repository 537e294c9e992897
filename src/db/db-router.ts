import { Logger } from '@nestjs/common';
import type { Kysely, Transaction } from 'kysely';
import type { DB } from './types';

export class DbRouter {
  private readonly logger = new Logger(DbRouter.name);
  private currentSlaveIndex = 0;

  constructor(
    private readonly writeDb: Kysely<DB>, // Master instance (Write)
    private readonly slaves: Kysely<DB>[] = [], // Read replicas
  ) {}

  /**
   * Get the write connection (Master).
   */
  write(): Kysely<DB> {
    return this.writeDb;
  }

  /**
   * Get a read connection using Round-Robin load balancing.
   */
  read(): Kysely<DB> {
    if (this.slaves.length === 0) {
      return this.writeDb; // Fallback to Master if no Slaves
    }

    const slave = this.slaves[this.currentSlaveIndex];
    this.currentSlaveIndex = (this.currentSlaveIndex + 1) % this.slaves.length;

    return slave;
  }

  /**
   * Executes a read operation with automatic Master fallback.
   */
  async executeRead<T>(operation: (db: Kysely<DB>) => Promise<T>): Promise<T> {
    const replica = this.read();
    if (replica === this.writeDb) return operation(replica);

    try {
      return await operation(replica);
    } catch (error) {
      this.logger.warn(
        `Replica read failed, falling back to master: ${error instanceof Error ? error.message : String(error)}`,
      );
      return await operation(this.writeDb);
    }
  }

  /**
   * Runs `operation` in one transaction on the master. Any error rolls the
   * whole unit back.
   */
  async transaction<T>(operation: (trx: Transaction<DB>) => Promise<T>): Promise<T> {
    return this.writeDb.transaction().execute(operation);
  }

  async destroy(): Promise<void> {
    await Promise.all([this.writeDb, ...this.slaves].map((db) => db.destroy()));
  }
}
