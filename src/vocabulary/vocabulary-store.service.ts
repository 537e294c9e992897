import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'fs';
import { Kysely } from 'kysely';
import { errorMessage, StoreUnavailableError } from '../common/errors';
import type { VocabularyDB, VocabularyTableName } from './types';
import { openSnapshot } from './vocabulary-loader';
import {
  describeLocation,
  VocabularyLocation,
  VocabularySnapshot,
} from './vocabulary-snapshot';

export type OpenResult =
  | { ok: true; snapshot: VocabularySnapshot }
  | { ok: false; error: StoreUnavailableError };

export interface VocabularyStatus {
  loaded: boolean;
  location: string | null;
  tables: VocabularyTableName[];
  loadedAt: string | null;
}

@Injectable()
export class VocabularyStoreService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(VocabularyStoreService.name);

  private snapshot: VocabularySnapshot | null = null;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit() {
    if (this.configService.get<string>('VOCABULARY_AUTOLOAD', 'true') === 'false') {
      return;
    }

    const location = this.configuredLocation();
    if (!location) {
      this.logger.warn('No vocabulary location configured, starting without one');
      return;
    }

    // A failed open leaves the service running without a snapshot
    await this.open(location);
  }

  async onModuleDestroy() {
    const current = this.snapshot;
    this.snapshot = null;
    if (current) await current.destroy();
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  async open(location: VocabularyLocation): Promise<OpenResult> {
    const started = Date.now();
    try {
      const snapshot = await openSnapshot(location);
      await this.publish(snapshot);
      this.logger.log(
        `Vocabulary opened from ${describeLocation(location)} in ${Date.now() - started}ms`,
      );
      return { ok: true, snapshot };
    } catch (error) {
      const failure =
        error instanceof StoreUnavailableError
          ? error
          : new StoreUnavailableError(errorMessage(error));
      this.logger.error(`Failed to open vocabulary: ${failure.message}`);
      return { ok: false, error: failure };
    }
  }

  /**
   * Makes a fully loaded snapshot current and closes the one it replaces.
   */
  async publish(snapshot: VocabularySnapshot): Promise<void> {
    const previous = this.snapshot;
    this.snapshot = snapshot;
    if (previous && previous !== snapshot) {
      await previous.destroy();
    }
  }

  // ============================================
  // READ ACCESS
  // ============================================

  getSnapshot(): VocabularySnapshot | null {
    return this.snapshot;
  }

  isAvailable(): boolean {
    return this.snapshot !== null;
  }

  async executeRead<T>(
    operation: (
      db: Kysely<VocabularyDB>,
      snapshot: VocabularySnapshot,
    ) => Promise<T>,
  ): Promise<T> {
    const snapshot = this.snapshot;
    if (!snapshot) throw new StoreUnavailableError();
    return operation(snapshot.db, snapshot);
  }

  status(): VocabularyStatus {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return { loaded: false, location: null, tables: [], loadedAt: null };
    }
    return {
      loaded: true,
      location: describeLocation(snapshot.location),
      tables: [...snapshot.tables],
      loadedAt: snapshot.loadedAt.toISOString(),
    };
  }

  private configuredLocation(): VocabularyLocation | null {
    const databasePath = this.configService.get<string>('VOCABULARY_DATABASE_PATH');
    const folder = this.configService.get<string>('VOCABULARY_FOLDER');

    if (databasePath && existsSync(databasePath)) {
      return { kind: 'sqlite', path: databasePath };
    }
    if (folder) {
      return { kind: 'folder', path: folder, databasePath };
    }
    return null;
  }
}
