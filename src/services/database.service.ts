/**
 * Database Service
 *
 * Provides the primary interface for the application's better-sqlite3 database.
 * Exposed to the application via the 'database' Fastify plugin as `fastify.db`.
 *
 * Responsible for:
 * - Tenant records: desired state, observations and conditions
 * - Schedule metadata for the job scheduler
 *
 * Query methods live in `./database/methods/` and are attached to the
 * prototype below; their signatures are declared in `./database/types/`.
 */
import { BundledMigrationSource } from '@root/db/migration-source.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import * as scheduleMethods from './database/methods/schedule.js'
import * as tenantMethods from './database/methods/tenants.js'
import './database/types/scheduler-methods.js'
import './database/types/tenant-methods.js'

export class DatabaseService {
  readonly knex: Knex

  /**
   * Creates a new DatabaseService instance
   *
   * @param log - Logger for database operations
   * @param dbPath - Path to the SQLite database file
   */
  constructor(
    readonly log: FastifyBaseLogger,
    dbPath: string,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(dbPath, log))
  }

  /**
   * Creates a DatabaseService and brings the schema up to date
   *
   * @param log - Logger for database operations
   * @param dbPath - Path to the SQLite database file
   */
  static async create(
    log: FastifyBaseLogger,
    dbPath: string,
  ): Promise<DatabaseService> {
    const service = new DatabaseService(log, dbPath)
    const [, applied] = await service.knex.migrate.latest({
      migrationSource: new BundledMigrationSource(),
    })
    if (applied.length > 0) {
      log.info({ migrations: applied }, 'Applied database migrations')
    }
    return service
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * @param dbPath - Path to the SQLite database file
   * @param log - Logger to use for database operations
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Closes the database connection
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  /**
   * Current time as an ISO-8601 string
   */
  get timestamp(): string {
    return new Date().toISOString()
  }
}

Object.assign(DatabaseService.prototype, tenantMethods, scheduleMethods)
