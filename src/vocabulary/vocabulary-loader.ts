import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import csv from 'csv-parser';
import { createReadStream, existsSync } from 'fs';
import { readdir, rm, stat } from 'fs/promises';
import { Kysely, SqliteDialect } from 'kysely';
import { join } from 'path';
import { errorMessage, StoreUnavailableError } from '../common/errors';
import { jaroWinklerSimilarity, normalizeSearchText } from '../common/text';
import type { VocabularyDB, VocabularyTableName } from './types';
import {
  VocabularyLocation,
  VocabularySnapshot,
} from './vocabulary-snapshot';
import {
  REQUIRED_TABLES,
  VOCABULARY_TABLES,
  VocabularyTableDefinition,
} from './vocabulary-tables';

export type CellValue = string | number | null;
export type TableRecord = Record<string, CellValue | undefined>;

const logger = new Logger('VocabularyLoader');

// Keeps each statement batch well under SQLite's bound-parameter limit
const INSERT_BATCH_SIZE = 500;

// ============================================
// SCHEMA
// ============================================

export function createTables(
  database: Database.Database,
  definitions: readonly VocabularyTableDefinition[] = VOCABULARY_TABLES,
): void {
  for (const def of definitions) {
    const columns = def.columns
      .map(
        (c) =>
          `${c.name} ${c.kind === 'integer' ? 'INTEGER' : 'TEXT'}${c.nullable ? '' : ' NOT NULL'}`,
      )
      .join(', ');
    database.exec(`CREATE TABLE IF NOT EXISTS ${def.table} (${columns})`);
  }
}

export function createIndexes(
  database: Database.Database,
  definitions: readonly VocabularyTableDefinition[] = VOCABULARY_TABLES,
): void {
  for (const def of definitions) {
    for (const columns of def.indexes) {
      const name = `idx_${def.table}_${columns.join('_')}`;
      database.exec(
        `CREATE INDEX IF NOT EXISTS ${name} ON ${def.table} (${columns.join(', ')})`,
      );
    }
  }
}

export function insertRecords(
  database: Database.Database,
  def: VocabularyTableDefinition,
  records: TableRecord[],
): void {
  const names = def.columns.map((c) => c.name);
  const insert = database.prepare(
    `INSERT INTO ${def.table} (${names.join(', ')}) VALUES (${names.map(() => '?').join(', ')})`,
  );
  const insertMany = database.transaction((batch: TableRecord[]) => {
    for (const record of batch) {
      insert.run(...names.map((name) => record[name] ?? null));
    }
  });
  insertMany(records);
}

// ============================================
// FLAT FILE IMPORT
// ============================================

function toRecord(
  def: VocabularyTableDefinition,
  raw: Record<string, string | undefined>,
  line: number,
): TableRecord {
  const record: TableRecord = {};
  for (const column of def.columns) {
    const value = (raw[column.name] ?? '').trim();
    if (value === '') {
      if (!column.nullable && column.kind === 'integer') {
        throw new Error(`${def.fileName}: missing ${column.name} on line ${line}`);
      }
      record[column.name] = column.nullable ? null : '';
      continue;
    }
    if (column.kind === 'integer') {
      const parsed = Number(value);
      if (!Number.isInteger(parsed)) {
        throw new Error(
          `${def.fileName}: invalid integer "${value}" for ${column.name} on line ${line}`,
        );
      }
      record[column.name] = parsed;
    } else {
      record[column.name] = value;
    }
  }
  return record;
}

async function loadTableFile(
  database: Database.Database,
  def: VocabularyTableDefinition,
  filePath: string,
): Promise<number> {
  // Athena exports are tab-separated and unquoted; names may contain '"'
  const parser = createReadStream(filePath).pipe(
    csv({
      separator: '\t',
      quote: '\u0000',
      mapHeaders: ({ header }) => header.trim().toLowerCase(),
    }),
  );

  let batch: TableRecord[] = [];
  let count = 0;
  for await (const row of parser) {
    batch.push(toRecord(def, row, count + batch.length + 2));
    if (batch.length >= INSERT_BATCH_SIZE) {
      insertRecords(database, def, batch);
      count += batch.length;
      batch = [];
    }
  }
  if (batch.length > 0) {
    insertRecords(database, def, batch);
    count += batch.length;
  }
  return count;
}

async function resolveTableFiles(
  folder: string,
): Promise<Map<VocabularyTableName, string>> {
  const info = await stat(folder).catch(() => null);
  if (!info || !info.isDirectory()) {
    throw new StoreUnavailableError(`Vocabulary folder not found: ${folder}`);
  }

  const entries = await readdir(folder);
  const byLowerName = new Map(entries.map((e) => [e.toLowerCase(), e]));

  const files = new Map<VocabularyTableName, string>();
  for (const def of VOCABULARY_TABLES) {
    const entry = byLowerName.get(`${def.fileName.toLowerCase()}.csv`);
    if (entry) files.set(def.table, join(folder, entry));
  }

  const missing = VOCABULARY_TABLES.filter(
    (def) => def.required && !files.has(def.table),
  ).map((def) => `${def.fileName}.csv`);
  if (missing.length > 0) {
    throw new StoreUnavailableError(
      `Missing required vocabulary files in ${folder}: ${missing.join(', ')}`,
    );
  }
  return files;
}

async function importFolder(
  folder: string,
  databasePath: string | undefined,
): Promise<Database.Database> {
  const files = await resolveTableFiles(folder);

  if (databasePath && existsSync(databasePath)) {
    await rm(databasePath);
  }
  const database = new Database(databasePath ?? ':memory:');

  try {
    database.pragma('journal_mode = OFF');
    database.pragma('synchronous = OFF');
    createTables(database);

    // Files are independent: parse them concurrently
    const started = Date.now();
    const counts = await Promise.all(
      VOCABULARY_TABLES.map(async (def) => {
        const filePath = files.get(def.table);
        if (!filePath) {
          logger.warn(`${def.fileName}.csv not found, ${def.table} left empty`);
          return 0;
        }
        const rows = await loadTableFile(database, def, filePath);
        logger.log(`Loaded ${rows} rows into ${def.table}`);
        return rows;
      }),
    );

    createIndexes(database);
    logger.log(
      `Imported ${counts.reduce((a, b) => a + b, 0)} vocabulary rows in ${Date.now() - started}ms`,
    );
    return database;
  } catch (error) {
    database.close();
    if (databasePath) await rm(databasePath, { force: true });
    throw error;
  }
}

// ============================================
// SNAPSHOT
// ============================================

function listTables(database: Database.Database): Set<VocabularyTableName> {
  const rows = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table'",
    )
    .all();
  const present = new Set(rows.map((r) => r.name.toLowerCase()));
  return new Set(
    VOCABULARY_TABLES.map((t) => t.table).filter((t) => present.has(t)),
  );
}

function openDatabaseFile(path: string): Database.Database {
  if (!existsSync(path)) {
    throw new StoreUnavailableError(`Vocabulary database not found: ${path}`);
  }
  return new Database(path, { readonly: true, fileMustExist: true });
}

/** SQL functions the concept search calls. */
function registerSearchFunctions(database: Database.Database): void {
  database.function('search_text', { deterministic: true }, (text: unknown) =>
    typeof text === 'string' ? normalizeSearchText(text) : null,
  );
  database.function(
    'jaro_winkler_similarity',
    { deterministic: true },
    (a: unknown, b: unknown) =>
      typeof a === 'string' && typeof b === 'string'
        ? jaroWinklerSimilarity(a, b)
        : null,
  );
}

export function snapshotFromDatabase(
  database: Database.Database,
  location: VocabularyLocation,
): VocabularySnapshot {
  const tables = listTables(database);
  const missing = REQUIRED_TABLES.filter((t) => !tables.has(t));
  if (missing.length > 0) {
    database.close();
    throw new StoreUnavailableError(
      `Vocabulary database is missing required tables: ${missing.join(', ')}`,
    );
  }
  registerSearchFunctions(database);
  const db = new Kysely<VocabularyDB>({
    dialect: new SqliteDialect({ database }),
  });
  return new VocabularySnapshot(db, tables, location);
}

/**
 * Opens a vocabulary location. The snapshot is returned only once every
 * table is loaded and indexed.
 */
export async function openSnapshot(
  location: VocabularyLocation,
): Promise<VocabularySnapshot> {
  try {
    const database =
      location.kind === 'sqlite'
        ? openDatabaseFile(location.path)
        : await importFolder(location.path, location.databasePath);
    return snapshotFromDatabase(database, location);
  } catch (error) {
    if (error instanceof StoreUnavailableError) throw error;
    throw new StoreUnavailableError(
      `Failed to open vocabulary: ${errorMessage(error)}`,
    );
  }
}
