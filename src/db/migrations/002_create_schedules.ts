import type { Knex } from 'knex'

/**
 * Creates the `schedules` table tracking registered jobs and their runs.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('schedules', (table) => {
    table.increments('id').primary()
    table.string('name').notNullable().unique()
    table.string('type').notNullable() // 'interval' only for now
    table.json('config').notNullable()
    table.boolean('enabled').defaultTo(true)
    table.json('last_run').nullable()
    table.json('next_run').nullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())

    table.index('name')
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTable('schedules')
}
