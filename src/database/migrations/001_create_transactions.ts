import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('transactions')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('external_id', 'text', (col) => col.notNull())
    .addColumn('amount', 'text', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('reference', 'text')
    .addColumn('transaction_date', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('pending'))
    .addColumn('matched_transaction_id', 'text', (col) => col.references('transactions.id'))
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`))
    .addColumn('updated_at', 'text', (col) => col.notNull().defaultTo(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`))
    .addCheckConstraint('transactions_status_check', sql`status IN ('pending', 'matched')`)
    .addCheckConstraint(
      'transactions_match_link_check',
      sql`(status = 'matched') = (matched_transaction_id IS NOT NULL)`
    )
    .execute();

  // One record per provider-side identifier
  await db.schema
    .createIndex('idx_transactions_provider_external_id')
    .on('transactions')
    .columns(['provider', 'external_id'])
    .unique()
    .execute();

  // Pending lookups used to hydrate the match index
  await db.schema
    .createIndex('idx_transactions_status_currency_provider')
    .on('transactions')
    .columns(['status', 'currency', 'provider'])
    .execute();

  // A transaction can be the counterpart of at most one other (NULLs stay distinct)
  await db.schema
    .createIndex('idx_transactions_matched_transaction_id')
    .on('transactions')
    .column('matched_transaction_id')
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('transactions').ifExists().execute();
}
