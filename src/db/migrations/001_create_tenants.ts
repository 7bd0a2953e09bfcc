import type { Knex } from 'knex'

/**
 * Creates the `tenants` table holding each tenant's desired state alongside
 * the reconciler-owned observation and conditions.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('tenants', (table) => {
    table.string('uid').primary()
    table.string('name').notNullable().unique()
    table.string('tenant_id').notNullable() // Not unique: enforced at creation by the reconciler
    table.json('spec').notNullable()
    table.json('observation').nullable() // Null until the first successful create
    table.string('ready').notNullable().defaultTo('Creating')
    table.text('message').nullable()
    table.string('last_reconciled_at').nullable()
    table.string('deletion_requested_at').nullable()
    table.string('created_at').notNullable()
    table.string('updated_at').notNullable()

    table.index('tenant_id')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('tenants')
}
