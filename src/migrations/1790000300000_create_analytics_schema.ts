import type { MigrationBuilder } from 'node-pg-migrate';

const schema = 'analytics';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createSchema(schema, { ifNotExists: true });

  pgm.createTable({ schema, name: 'dim_date' }, {
    date_id: { type: 'date', primaryKey: true },
    year: { type: 'integer', notNull: true },
    month: { type: 'integer', notNull: true },
    day: { type: 'integer', notNull: true }
  });
  pgm.createTable({ schema, name: 'dim_product' }, {
    sku: { type: 'text', primaryKey: true },
    product_name: { type: 'text' },
    category: { type: 'text' },
    manufacturing_cost: { type: 'double precision' },
    sale_price: { type: 'double precision' }
  });
  pgm.createTable({ schema, name: 'dim_supplier' }, {
    supplier_id: { type: 'text', primaryKey: true },
    supplier_name: { type: 'text' },
    location: { type: 'text' }
  });
  pgm.createTable({ schema, name: 'dim_carrier' }, {
    carrier_id: { type: 'text', primaryKey: true },
    carrier_name: { type: 'text' },
    transport_mode: { type: 'text' }
  });

  pgm.createTable({ schema, name: 'fact_sales_logistics' }, {
    id: { type: 'serial', primaryKey: true },
    date_id: { type: 'date', references: { schema, name: 'dim_date' } },
    sku: { type: 'text', references: { schema, name: 'dim_product' } },
    supplier_id: { type: 'text', references: { schema, name: 'dim_supplier' } },
    carrier_id: { type: 'text', references: { schema, name: 'dim_carrier' } },
    revenue: { type: 'double precision' },
    cost: { type: 'double precision' },
    margin: { type: 'double precision' },
    units_sold: { type: 'integer' },
    shipping_cost: { type: 'double precision' },
    on_time_delivery: { type: 'smallint' },
    defect_rate: { type: 'double precision' }
  });
  pgm.createTable({ schema, name: 'fact_stock_analytics' }, {
    id: { type: 'serial', primaryKey: true },
    date_id: { type: 'date', references: { schema, name: 'dim_date' } },
    sku: { type: 'text', references: { schema, name: 'dim_product' } },
    stock_level: { type: 'integer' },
    monthly_turnover: { type: 'double precision' },
    stockout_risk: { type: 'double precision' }
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropSchema(schema, { cascade: true });
}
