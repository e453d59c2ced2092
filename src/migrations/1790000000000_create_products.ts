import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('products', {
    sku: { type: 'text', primaryKey: true },
    name: { type: 'text', notNull: true },
    min_level: { type: 'integer', notNull: true, default: 0 },
    max_level: { type: 'integer', notNull: true, default: 1000 },
    cost: { type: 'numeric(14,4)', notNull: true, default: 0 },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('products', 'chk_products_levels', 'CHECK (min_level >= 0 AND max_level >= min_level)');
  pgm.addConstraint('products', 'chk_products_cost_nonnegative', 'CHECK (cost >= 0)');
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('products');
}
