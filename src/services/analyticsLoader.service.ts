import type { PoolClient } from 'pg';
import type { StarSchema } from './analyticsModel.service';

export const ANALYTICS_SCHEMA = 'analytics';

/** Dimension tables first, facts after; TRUNCATE ... CASCADE handles the reverse. */
export const ANALYTICS_TABLES = [
  'dim_date',
  'dim_product',
  'dim_supplier',
  'dim_carrier',
  'fact_sales_logistics',
  'fact_stock_analytics'
] as const;

const INSERT_BATCH_SIZE = 500;

export type LoadSummary = Record<(typeof ANALYTICS_TABLES)[number], number>;

type SqlValue = string | number | null;

async function insertRows(
  client: PoolClient,
  table: string,
  columns: string[],
  rows: SqlValue[][]
): Promise<number> {
  for (let start = 0; start < rows.length; start += INSERT_BATCH_SIZE) {
    const batch = rows.slice(start, start + INSERT_BATCH_SIZE);
    const params: SqlValue[] = [];
    const tuples = batch.map((row) => {
      const placeholders = row.map((value) => {
        params.push(value);
        return `$${params.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    await client.query(
      `INSERT INTO ${ANALYTICS_SCHEMA}.${table} (${columns.join(', ')}) VALUES ${tuples.join(', ')}`,
      params
    );
  }
  return rows.length;
}

/**
 * Replaces the analytic snapshot. Run inside a transaction so readers keep
 * the previous snapshot until the new one commits.
 */
export async function loadStarSchema(client: PoolClient, model: StarSchema): Promise<LoadSummary> {
  await client.query(
    `TRUNCATE TABLE ${ANALYTICS_TABLES.map((table) => `${ANALYTICS_SCHEMA}.${table}`).join(', ')} RESTART IDENTITY CASCADE`
  );

  const dim_date = await insertRows(
    client,
    'dim_date',
    ['date_id', 'year', 'month', 'day'],
    model.dates.map((d) => [d.dateId, d.year, d.month, d.day])
  );
  const dim_product = await insertRows(
    client,
    'dim_product',
    ['sku', 'product_name', 'category', 'manufacturing_cost', 'sale_price'],
    model.products.map((p) => [p.sku, p.name, p.category, p.manufacturingCost, p.price])
  );
  const dim_supplier = await insertRows(
    client,
    'dim_supplier',
    ['supplier_id', 'supplier_name', 'location'],
    model.suppliers.map((s) => [s.supplierId, s.name, s.location])
  );
  const dim_carrier = await insertRows(
    client,
    'dim_carrier',
    ['carrier_id', 'carrier_name', 'transport_mode'],
    model.carriers.map((c) => [c.carrierId, c.name, c.transportMode])
  );
  const fact_sales_logistics = await insertRows(
    client,
    'fact_sales_logistics',
    [
      'date_id',
      'sku',
      'supplier_id',
      'carrier_id',
      'revenue',
      'cost',
      'margin',
      'units_sold',
      'shipping_cost',
      'on_time_delivery',
      'defect_rate'
    ],
    model.sales.map((f) => [
      f.dateId,
      f.sku,
      f.supplierId,
      f.carrierId,
      f.revenue,
      f.cost,
      f.margin,
      f.unitsSold,
      f.shippingCost,
      f.onTimeDelivery,
      f.defectRate
    ])
  );
  const fact_stock_analytics = await insertRows(
    client,
    'fact_stock_analytics',
    ['date_id', 'sku', 'stock_level', 'monthly_turnover', 'stockout_risk'],
    model.stock.map((f) => [f.dateId, f.sku, f.stockLevel, f.monthlyTurnover, f.stockoutRisk])
  );

  return { dim_date, dim_product, dim_supplier, dim_carrier, fact_sales_logistics, fact_stock_analytics };
}
