import { existsSync } from 'fs';
import { resolve } from 'path';
import { openSnapshot } from '../src/vocabulary/vocabulary-loader';

// Builds a SQLite vocabulary database from a folder of Athena export files.
// Usage: npm run import:vocabulary -- <folder> <database.sqlite>

async function main() {
  const [folderArg, databaseArg] = process.argv.slice(2);
  const folder = folderArg ?? process.env.VOCABULARY_FOLDER;
  const databasePath = databaseArg ?? process.env.VOCABULARY_DATABASE_PATH;

  if (!folder || !databasePath) {
    console.error('Usage: import-vocabulary <folder> <database.sqlite>');
    process.exit(1);
  }

  if (existsSync(databasePath)) {
    console.log(`🗑️  Replacing existing database ${databasePath}`);
  }

  console.log(`📥 Importing vocabulary from ${resolve(folder)}...`);
  const started = Date.now();
  const snapshot = await openSnapshot({
    kind: 'folder',
    path: folder,
    databasePath,
  });

  try {
    for (const table of snapshot.tables) {
      const res = await snapshot.db
        .selectFrom(table)
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .executeTakeFirst();
      console.log(`   ${table}: ${Number(res?.count ?? 0)} rows`);
    }
    console.log(
      `✅ Vocabulary database written to ${databasePath} in ${((Date.now() - started) / 1000).toFixed(1)}s`,
    );
  } finally {
    await snapshot.destroy();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Import failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
