import type { Pool } from 'pg';
import { query } from '../db';
import { roundTo, toNumber } from '../lib/numbers';
import { ANALYTICS_SCHEMA } from './analyticsLoader.service';

const STOCK_ROW_LIMIT = 200;
const SALES_ROW_LIMIT = 500;

export const STOCKOUT_CRITICAL_ABOVE = 0.7;
export const STOCKOUT_STABLE_BELOW = 0.2;
export const CARRIER_PREFERRED_ON_TIME_ABOVE = 0.9;
export const CARRIER_UNRELIABLE_ON_TIME_BELOW = 0.7;
export const CARRIER_EXPENSIVE_QUANTILE = 0.75;
export const SUPPLIER_DEFECT_ALERT_ABOVE = 0.1;

export type StockRow = {
  sku: string;
  productName: string | null;
  stockLevel: number | null;
  monthlyTurnover: number | null;
  stockoutRisk: number | null;
};

export type SalesRow = {
  sku: string | null;
  productName: string | null;
  carrierName: string | null;
  supplierName: string | null;
  revenue: number | null;
  shippingCost: number | null;
  onTimeDelivery: number | null;
  defectRate: number | null;
};

export type StockAction = 'critical' | 'monitor' | 'stable';

export type StockRecommendation = StockRow & {
  action: StockAction;
  recommendation: string;
};

export type StockReport = {
  averageStockoutRisk: number | null;
  averageMonthlyTurnover: number | null;
  items: StockRecommendation[];
};

export type RevenueLeader = {
  productName: string;
  revenue: number;
  flagship: boolean;
  recommendation: string;
};

export type CarrierAction = 'preferred' | 'unreliable' | 'expensive' | 'monitor';

export type CarrierDecision = {
  carrierName: string;
  averageShippingCost: number | null;
  onTimeRate: number | null;
  action: CarrierAction;
  recommendation: string;
};

export type SupplierAction = 'recommended' | 'corrective_action' | 'alert' | 'within_range';

export type SupplierRanking = {
  supplierName: string;
  averageDefectRate: number | null;
  action: SupplierAction;
  recommendation: string;
};

const STOCK_MESSAGES: Record<StockAction, string> = {
  critical: 'Imminent stockout risk. Raise an urgent purchase order.',
  monitor: 'Watch daily consumption.',
  stable: 'Safe stock level. No action needed.'
};

const CARRIER_MESSAGES: Record<CarrierAction, string> = {
  preferred: 'High punctuality at below-average cost. Increase volume.',
  unreliable: 'Punctuality is critical. Renegotiate or replace.',
  expensive: 'High cost. Check whether the route justifies the price.',
  monitor: 'Keep monitoring.'
};

function mean(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0) return null;
  return present.reduce((sum, value) => sum + value, 0) / present.length;
}

/** Linear interpolation between closest ranks. */
export function quantile(values: number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

function groupBy<T>(rows: T[], key: (row: T) => string | null): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const id = key(row);
    if (id === null) continue;
    const group = groups.get(id);
    if (group) {
      group.push(row);
    } else {
      groups.set(id, [row]);
    }
  }
  return groups;
}

// Comparisons against a missing value are false.
function above(value: number | null, limit: number | null): boolean {
  return value !== null && limit !== null && value > limit;
}

function below(value: number | null, limit: number | null): boolean {
  return value !== null && limit !== null && value < limit;
}

export function classifyStockoutRisk(risk: number | null): StockAction {
  if (above(risk, STOCKOUT_CRITICAL_ABOVE)) return 'critical';
  if (below(risk, STOCKOUT_STABLE_BELOW)) return 'stable';
  return 'monitor';
}

export function buildStockReport(rows: StockRow[]): StockReport {
  return {
    averageStockoutRisk: mean(rows.map((row) => row.stockoutRisk)),
    averageMonthlyTurnover: mean(rows.map((row) => row.monthlyTurnover)),
    items: rows.map((row) => {
      const action = classifyStockoutRisk(row.stockoutRisk);
      return { ...row, action, recommendation: STOCK_MESSAGES[action] };
    })
  };
}

/** Top products by summed revenue; the first one is the flagship. */
export function rankRevenueLeaders(rows: SalesRow[], limit = 10): RevenueLeader[] {
  const totals = [...groupBy(rows, (row) => row.productName)].map(([productName, group]) => ({
    productName,
    revenue: group.reduce((sum, row) => sum + (row.revenue ?? 0), 0)
  }));

  return totals
    .sort((a, b) => b.revenue - a.revenue)
    .slice(0, limit)
    .map((total, index) => ({
      productName: total.productName,
      revenue: roundTo(total.revenue, 2),
      flagship: index === 0,
      recommendation: index === 0 ? 'Flagship product. Keep it fully available.' : 'High-performing product.'
    }));
}

/**
 * Carriers are judged against each other: "preferred" needs an on-time rate
 * above 90% and a cost below the carriers' average, "expensive" a cost above
 * their 75th percentile. Rules apply in that order, with "unreliable" second.
 */
export function evaluateCarriers(rows: SalesRow[]): CarrierDecision[] {
  const carriers = [...groupBy(rows, (row) => row.carrierName)].map(([carrierName, group]) => ({
    carrierName,
    averageShippingCost: mean(group.map((row) => row.shippingCost)),
    onTimeRate: mean(group.map((row) => row.onTimeDelivery))
  }));

  const costs = carriers
    .map((carrier) => carrier.averageShippingCost)
    .filter((cost): cost is number => cost !== null);
  const averageCost = mean(costs);
  const expensiveAbove = quantile(costs, CARRIER_EXPENSIVE_QUANTILE);

  return carriers
    .sort((a, b) => a.carrierName.localeCompare(b.carrierName))
    .map((carrier) => {
      let action: CarrierAction = 'monitor';
      if (
        above(carrier.onTimeRate, CARRIER_PREFERRED_ON_TIME_ABOVE) &&
        below(carrier.averageShippingCost, averageCost)
      ) {
        action = 'preferred';
      } else if (below(carrier.onTimeRate, CARRIER_UNRELIABLE_ON_TIME_BELOW)) {
        action = 'unreliable';
      } else if (above(carrier.averageShippingCost, expensiveAbove)) {
        action = 'expensive';
      }
      return { ...carrier, action, recommendation: CARRIER_MESSAGES[action] };
    });
}

/** Suppliers ordered by average defect rate, best first; suppliers without a rate go last. */
export function rankSuppliers(rows: SalesRow[]): SupplierRanking[] {
  const suppliers = [...groupBy(rows, (row) => row.supplierName)].map(([supplierName, group]) => ({
    supplierName,
    averageDefectRate: mean(group.map((row) => row.defectRate))
  }));

  const rates = suppliers
    .map((supplier) => supplier.averageDefectRate)
    .filter((rate): rate is number => rate !== null);
  const best = rates.length > 0 ? Math.min(...rates) : null;
  const worst = rates.length > 0 ? Math.max(...rates) : null;

  return suppliers
    .sort((a, b) => {
      if (a.averageDefectRate === null) return b.averageDefectRate === null ? 0 : 1;
      if (b.averageDefectRate === null) return -1;
      return a.averageDefectRate - b.averageDefectRate;
    })
    .map((supplier) => {
      const rate = supplier.averageDefectRate;
      if (rate !== null && rate === best) {
        return {
          ...supplier,
          action: 'recommended' as const,
          recommendation: `Lowest defect rate (${rate.toFixed(2)}). Increase purchases from this partner.`
        };
      }
      if (rate !== null && rate === worst) {
        return {
          ...supplier,
          action: 'corrective_action' as const,
          recommendation: `Worst defect rate (${rate.toFixed(2)}). Require an immediate corrective action plan.`
        };
      }
      if (above(rate, SUPPLIER_DEFECT_ALERT_ABOVE)) {
        return {
          ...supplier,
          action: 'alert' as const,
          recommendation: 'Defect rate above the acceptable limit. Monitor incoming lots.'
        };
      }
      return { ...supplier, action: 'within_range' as const, recommendation: 'Supplier within the market average.' };
    });
}

type StockQueryRow = {
  sku: string;
  product_name: string | null;
  stock_level: number | null;
  monthly_turnover: number | string | null;
  stockout_risk: number | string | null;
};

type SalesQueryRow = {
  sku: string | null;
  product_name: string | null;
  carrier_name: string | null;
  supplier_name: string | null;
  revenue: number | string | null;
  shipping_cost: number | string | null;
  on_time_delivery: number | null;
  defect_rate: number | string | null;
};

function nullableNumber(value: number | string | null): number | null {
  return value === null ? null : toNumber(value);
}

/**
 * Read side of the analytic star schema. Each report reads a bounded sample
 * of the latest snapshot and applies the decision rules above.
 */
export class AnalyticsService {
  constructor(private readonly pool: Pool) {}

  async stockReport(): Promise<StockReport> {
    const res = await query<StockQueryRow>(
      this.pool,
      `SELECT f.sku, p.product_name, f.stock_level, f.monthly_turnover, f.stockout_risk
         FROM ${ANALYTICS_SCHEMA}.fact_stock_analytics f
         JOIN ${ANALYTICS_SCHEMA}.dim_product p ON p.sku = f.sku
        ORDER BY f.id
        LIMIT $1`,
      [STOCK_ROW_LIMIT]
    );
    return buildStockReport(
      res.rows.map((row) => ({
        sku: row.sku,
        productName: row.product_name,
        stockLevel: row.stock_level,
        monthlyTurnover: nullableNumber(row.monthly_turnover),
        stockoutRisk: nullableNumber(row.stockout_risk)
      }))
    );
  }

  async revenueLeaders(): Promise<RevenueLeader[]> {
    return rankRevenueLeaders(await this.salesRows());
  }

  async carrierDecisions(): Promise<CarrierDecision[]> {
    return evaluateCarriers(await this.salesRows());
  }

  async supplierRanking(): Promise<SupplierRanking[]> {
    return rankSuppliers(await this.salesRows());
  }

  private async salesRows(): Promise<SalesRow[]> {
    const res = await query<SalesQueryRow>(
      this.pool,
      `SELECT f.sku, p.product_name, c.carrier_name, s.supplier_name,
              f.revenue, f.shipping_cost, f.on_time_delivery, f.defect_rate
         FROM ${ANALYTICS_SCHEMA}.fact_sales_logistics f
         LEFT JOIN ${ANALYTICS_SCHEMA}.dim_product p ON p.sku = f.sku
         LEFT JOIN ${ANALYTICS_SCHEMA}.dim_carrier c ON c.carrier_id = f.carrier_id
         LEFT JOIN ${ANALYTICS_SCHEMA}.dim_supplier s ON s.supplier_id = f.supplier_id
        ORDER BY f.id
        LIMIT $1`,
      [SALES_ROW_LIMIT]
    );
    return res.rows.map((row) => ({
      sku: row.sku,
      productName: row.product_name,
      carrierName: row.carrier_name,
      supplierName: row.supplier_name,
      revenue: nullableNumber(row.revenue),
      shippingCost: nullableNumber(row.shipping_cost),
      onTimeDelivery: row.on_time_delivery,
      defectRate: nullableNumber(row.defect_rate)
    }));
  }
}
