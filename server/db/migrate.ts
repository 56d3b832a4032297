import { Migrator, type Kysely, type Migration, type MigrationProvider } from 'kysely';
import * as initialMigration from './migrations/001_initial.js';

/** Migrations are registered statically so the same list runs from sources and from dist/. */
const migrationProvider: MigrationProvider = {
  async getMigrations(): Promise<Record<string, Migration>> {
    return {
      '001_initial': initialMigration,
    };
  },
};

export async function runMigrations<DB>(db: Kysely<DB>): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: migrationProvider,
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((it) => {
    if (it.status === 'Success') {
      console.log(`[store] Migration "${it.migrationName}" was executed successfully`);
    } else if (it.status === 'Error') {
      console.error(`[store] Failed to execute migration "${it.migrationName}"`);
    }
  });

  if (error) {
    console.error('[store] Failed to run migrations');
    throw error;
  }
}
