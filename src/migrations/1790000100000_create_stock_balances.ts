import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_balances', {
    sku: {
      type: 'text',
      primaryKey: true,
      references: 'products',
      onDelete: 'RESTRICT'
    },
    quantity: { type: 'integer', notNull: true, default: 0 },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_balances', 'chk_stock_balances_nonnegative', 'CHECK (quantity >= 0)');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_balances');
}
