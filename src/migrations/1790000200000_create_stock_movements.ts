import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_movements', {
    id: { type: 'bigserial', primaryKey: true },
    sku: { type: 'text', notNull: true, references: 'products', onDelete: 'RESTRICT' },
    direction: { type: 'char(1)', notNull: true },
    quantity: { type: 'integer', notNull: true },
    occurred_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('stock_movements', 'chk_stock_movements_direction', "CHECK (direction IN ('E', 'S'))");
  pgm.addConstraint('stock_movements', 'chk_stock_movements_qty_positive', 'CHECK (quantity > 0)');
  pgm.createIndex('stock_movements', ['sku', 'id'], { name: 'idx_stock_movements_sku_id' });

  // Movements are an append-only audit log.
  pgm.sql(`
    CREATE FUNCTION stock_movements_immutable() RETURNS trigger AS $$
    BEGIN
      RAISE EXCEPTION 'stock_movements rows are immutable';
    END;
    $$ LANGUAGE plpgsql;
  `);
  pgm.sql(`
    CREATE TRIGGER trg_stock_movements_immutable
      BEFORE UPDATE OR DELETE ON stock_movements
      FOR EACH ROW EXECUTE FUNCTION stock_movements_immutable();
  `);
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.sql('DROP TRIGGER IF EXISTS trg_stock_movements_immutable ON stock_movements');
  pgm.sql('DROP FUNCTION IF EXISTS stock_movements_immutable()');
  pgm.dropTable('stock_movements');
}
