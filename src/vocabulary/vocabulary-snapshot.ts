import { Kysely } from 'kysely';
import type { VocabularyDB, VocabularyTableName } from './types';

export type VocabularyLocation =
  | { kind: 'folder'; path: string; databasePath?: string }
  | { kind: 'sqlite'; path: string };

/**
 * A fully loaded, read-only view of the vocabulary tables.
 * Any number of readers may query it concurrently.
 */
export class VocabularySnapshot {
  constructor(
    public readonly db: Kysely<VocabularyDB>,
    public readonly tables: ReadonlySet<VocabularyTableName>,
    public readonly location: VocabularyLocation,
    public readonly loadedAt: Date = new Date(),
  ) {}

  hasTable(table: VocabularyTableName): boolean {
    return this.tables.has(table);
  }

  async destroy(): Promise<void> {
    await this.db.destroy();
  }
}

export function describeLocation(location: VocabularyLocation): string {
  if (location.kind === 'sqlite') return `sqlite:${location.path}`;
  return location.databasePath
    ? `folder:${location.path} -> ${location.databasePath}`
    : `folder:${location.path}`;
}
