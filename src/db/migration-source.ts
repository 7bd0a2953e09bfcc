import type { Knex } from 'knex'
import * as createTenants from './migrations/001_create_tenants.js'
import * as createSchedules from './migrations/002_create_schedules.js'

interface Migration {
  name: string
  up: (knex: Knex) => Promise<void>
  down: (knex: Knex) => Promise<void>
}

const migrations: Migration[] = [
  { name: '001_create_tenants', ...createTenants },
  { name: '002_create_schedules', ...createSchedules },
]

/**
 * Serves the bundled migrations to knex so they run the same way from
 * sources and from the compiled build.
 */
export class BundledMigrationSource implements Knex.MigrationSource<Migration> {
  async getMigrations(): Promise<Migration[]> {
    return migrations
  }

  getMigrationName(migration: Migration): string {
    return migration.name
  }

  async getMigration(migration: Migration): Promise<Knex.Migration> {
    return { up: migration.up, down: migration.down }
  }
}
