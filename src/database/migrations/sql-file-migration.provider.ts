import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { type Kysely, type Migration, type MigrationProvider, sql } from 'kysely';

const SQL_MIGRATION_FILE_PATTERN: RegExp = /^\d+_[\w-]+\.sql$/;

export class SqlFileMigrationProvider implements MigrationProvider {
  public constructor(private readonly migrationDirectory: string) {}

  public async getMigrations(): Promise<Record<string, Migration>> {
    const fileNames: string[] = await readdir(this.migrationDirectory);
    const migrationFileNames: string[] = fileNames
      .filter((fileName: string): boolean => SQL_MIGRATION_FILE_PATTERN.test(fileName))
      .sort();
    const migrations: Record<string, Migration> = {};

    for (const fileName of migrationFileNames) {
      const script: string = await readFile(join(this.migrationDirectory, fileName), 'utf8');
      const migrationName: string = fileName.replace(/\.sql$/, '');

      migrations[migrationName] = {
        up: async (db: Kysely<unknown>): Promise<void> => {
          await sql.raw(script).execute(db);
        },
      };
    }

    return migrations;
  }
}
