import { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (t) => {
    t.increments('id').primary()
    t.string('name', 100).notNullable()
    t.string('email', 100)
    t.string('mobile', 20)
    t.string('address', 200)
    t.string('gst_no', 50)
    t.string('pan_no', 50)
    t.string('state', 50)
    t.string('state_code', 10)
    t.index(['name'])
  })

  await knex.schema.createTable('invoices', (t) => {
    t.increments('id').primary()
    t.string('invoice_no', 50).notNullable().unique()
    t.date('invoice_date').notNullable()
    t.integer('customer_id').unsigned().notNullable()
      .references('id').inTable('customers').onDelete('RESTRICT')
    t.date('from_date')
    t.date('to_date')
    t.decimal('fuel_percentage', 5, 2).notNullable().defaultTo(0)
    t.string('gst_type', 10).notNullable().defaultTo('NONE')
    t.decimal('gst_rate', 5, 2).notNullable().defaultTo(0)
    t.decimal('additional_charges', 12, 2).notNullable().defaultTo(0)
    t.text('remarks')
    t.string('payment_status', 20).notNullable().defaultTo('Unpaid')
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now())
    t.index(['customer_id'])
  })

  await knex.schema.createTable('invoice_items', (t) => {
    t.increments('id').primary()
    t.integer('invoice_id').unsigned().notNullable()
      .references('id').inTable('invoices').onDelete('CASCADE')
    t.date('date')
    t.string('awb_no', 200).notNullable()
    t.string('destination', 200).notNullable()
    t.string('weight', 200).notNullable()
    t.decimal('amount', 12, 2).notNullable().defaultTo(0)
    t.index(['invoice_id'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('invoice_items')
  await knex.schema.dropTableIfExists('invoices')
  await knex.schema.dropTableIfExists('customers')
}
