import type { Pool } from 'pg';
import { describe, expect, it, vi } from 'vitest';
import {
  AnalyticsService,
  buildStockReport,
  classifyStockoutRisk,
  evaluateCarriers,
  quantile,
  rankRevenueLeaders,
  rankSuppliers,
  type SalesRow
} from './analytics.service';

function sale(overrides: Partial<SalesRow>): SalesRow {
  return {
    sku: 'P1',
    productName: null,
    carrierName: null,
    supplierName: null,
    revenue: null,
    shippingCost: null,
    onTimeDelivery: null,
    defectRate: null,
    ...overrides
  };
}

function fakePool(rows: unknown[]) {
  const poolQuery = vi.fn(async (_text: string, _params?: unknown[]) => ({ rows, rowCount: rows.length }));
  return { pool: { query: poolQuery } as unknown as Pool, poolQuery };
}

describe('classifyStockoutRisk', () => {
  it('flags risks above 0.70 as critical and below 0.20 as stable', () => {
    expect(classifyStockoutRisk(0.71)).toBe('critical');
    expect(classifyStockoutRisk(0.19)).toBe('stable');
  });

  it('keeps the boundaries and missing risks under monitoring', () => {
    expect(classifyStockoutRisk(0.7)).toBe('monitor');
    expect(classifyStockoutRisk(0.2)).toBe('monitor');
    expect(classifyStockoutRisk(null)).toBe('monitor');
  });
});

describe('buildStockReport', () => {
  it('averages risk and turnover over the rows that have them', () => {
    const report = buildStockReport([
      { sku: 'P1', productName: 'Drill', stockLevel: 3, monthlyTurnover: 2, stockoutRisk: 0.85 },
      { sku: 'P2', productName: 'Saw', stockLevel: 40, monthlyTurnover: 4, stockoutRisk: 0.1 },
      { sku: 'P3', productName: 'Tape', stockLevel: 12, monthlyTurnover: null, stockoutRisk: 0.5 },
      { sku: 'P4', productName: 'Glue', stockLevel: null, monthlyTurnover: 6, stockoutRisk: null }
    ]);

    expect(report.averageStockoutRisk).toBeCloseTo(0.48333, 4);
    expect(report.averageMonthlyTurnover).toBe(4);
    expect(report.items.map((item) => [item.sku, item.action])).toEqual([
      ['P1', 'critical'],
      ['P2', 'stable'],
      ['P3', 'monitor'],
      ['P4', 'monitor']
    ]);
    expect(report.items[0].recommendation).toBe('Imminent stockout risk. Raise an urgent purchase order.');
  });

  it('reports no averages for an empty snapshot', () => {
    expect(buildStockReport([])).toEqual({ averageStockoutRisk: null, averageMonthlyTurnover: null, items: [] });
  });
});

describe('rankRevenueLeaders', () => {
  const rows = [
    sale({ productName: 'Drill', revenue: 100 }),
    sale({ productName: 'Saw', revenue: 120 }),
    sale({ productName: 'Drill', revenue: 50 }),
    sale({ productName: 'Tape', revenue: null }),
    sale({ productName: null, revenue: 999 })
  ];

  it('sums revenue per product and marks the top one as flagship', () => {
    expect(rankRevenueLeaders(rows)).toEqual([
      { productName: 'Drill', revenue: 150, flagship: true, recommendation: 'Flagship product. Keep it fully available.' },
      { productName: 'Saw', revenue: 120, flagship: false, recommendation: 'High-performing product.' },
      { productName: 'Tape', revenue: 0, flagship: false, recommendation: 'High-performing product.' }
    ]);
  });

  it('keeps only the requested number of leaders', () => {
    expect(rankRevenueLeaders(rows, 2).map((leader) => leader.productName)).toEqual(['Drill', 'Saw']);
  });
});

describe('quantile', () => {
  it('interpolates linearly between ranks', () => {
    expect(quantile([9, 1, 3, 2], 0.75)).toBe(4.5);
    expect(quantile([5], 0.75)).toBe(5);
    expect(quantile([], 0.5)).toBeNull();
  });
});

describe('evaluateCarriers', () => {
  it('applies the punctuality and cost rules in order', () => {
    const rows = [
      sale({ carrierName: 'Xpress', shippingCost: 1, onTimeDelivery: 1 }),
      sale({ carrierName: 'Xpress', shippingCost: 1, onTimeDelivery: 1 }),
      sale({ carrierName: 'Yellow', shippingCost: 2, onTimeDelivery: 0 }),
      sale({ carrierName: 'Yellow', shippingCost: 2, onTimeDelivery: 1 }),
      sale({ carrierName: 'Zenith', shippingCost: 9, onTimeDelivery: 1 }),
      sale({ carrierName: 'Zenith', shippingCost: 9, onTimeDelivery: 1 }),
      sale({ carrierName: 'Zenith', shippingCost: 9, onTimeDelivery: 1 }),
      sale({ carrierName: 'Zenith', shippingCost: 9, onTimeDelivery: 0 }),
      sale({ carrierName: 'Wave', shippingCost: 3, onTimeDelivery: 1 }),
      sale({ carrierName: 'Wave', shippingCost: 3, onTimeDelivery: 1 }),
      sale({ carrierName: 'Wave', shippingCost: 3, onTimeDelivery: 1 }),
      sale({ carrierName: 'Wave', shippingCost: 3, onTimeDelivery: 1 }),
      sale({ carrierName: 'Wave', shippingCost: 3, onTimeDelivery: 0 }),
      sale({ carrierName: null, shippingCost: 100, onTimeDelivery: 0 })
    ];

    expect(evaluateCarriers(rows)).toEqual([
      {
        carrierName: 'Wave',
        averageShippingCost: 3,
        onTimeRate: 0.8,
        action: 'monitor',
        recommendation: 'Keep monitoring.'
      },
      {
        carrierName: 'Xpress',
        averageShippingCost: 1,
        onTimeRate: 1,
        action: 'preferred',
        recommendation: 'High punctuality at below-average cost. Increase volume.'
      },
      {
        carrierName: 'Yellow',
        averageShippingCost: 2,
        onTimeRate: 0.5,
        action: 'unreliable',
        recommendation: 'Punctuality is critical. Renegotiate or replace.'
      },
      {
        carrierName: 'Zenith',
        averageShippingCost: 9,
        onTimeRate: 0.75,
        action: 'expensive',
        recommendation: 'High cost. Check whether the route justifies the price.'
      }
    ]);
  });

  it('does not prefer a punctual carrier whose cost is unknown', () => {
    const decisions = evaluateCarriers([
      sale({ carrierName: 'Xpress', shippingCost: null, onTimeDelivery: 1 }),
      sale({ carrierName: 'Yellow', shippingCost: 2, onTimeDelivery: 1 })
    ]);

    expect(decisions.map((decision) => decision.action)).toEqual(['monitor', 'monitor']);
  });
});

describe('rankSuppliers', () => {
  it('orders suppliers by defect rate and labels the extremes', () => {
    const ranking = rankSuppliers([
      sale({ supplierName: 'Alpha', defectRate: 0.02 }),
      sale({ supplierName: 'Beta', defectRate: 0.3 }),
      sale({ supplierName: 'Beta', defectRate: 0.1 }),
      sale({ supplierName: 'Gamma', defectRate: 0.15 }),
      sale({ supplierName: 'Delta', defectRate: 0.05 }),
      sale({ supplierName: 'Omega', defectRate: null })
    ]);

    expect(ranking).toEqual([
      {
        supplierName: 'Alpha',
        averageDefectRate: 0.02,
        action: 'recommended',
        recommendation: 'Lowest defect rate (0.02). Increase purchases from this partner.'
      },
      {
        supplierName: 'Delta',
        averageDefectRate: 0.05,
        action: 'within_range',
        recommendation: 'Supplier within the market average.'
      },
      {
        supplierName: 'Gamma',
        averageDefectRate: 0.15,
        action: 'alert',
        recommendation: 'Defect rate above the acceptable limit. Monitor incoming lots.'
      },
      {
        supplierName: 'Beta',
        averageDefectRate: 0.2,
        action: 'corrective_action',
        recommendation: 'Worst defect rate (0.20). Require an immediate corrective action plan.'
      },
      {
        supplierName: 'Omega',
        averageDefectRate: null,
        action: 'within_range',
        recommendation: 'Supplier within the market average.'
      }
    ]);
  });
});

describe('AnalyticsService', () => {
  it('reads a bounded stock sample joined with product names', async () => {
    const { pool, poolQuery } = fakePool([
      { sku: 'P1', product_name: 'Drill', stock_level: 3, monthly_turnover: 2.5, stockout_risk: 0.9 }
    ]);

    const report = await new AnalyticsService(pool).stockReport();

    expect(poolQuery.mock.calls[0][0]).toContain('JOIN analytics.dim_product p ON p.sku = f.sku');
    expect(poolQuery.mock.calls[0][1]).toEqual([200]);
    expect(report.items).toEqual([
      {
        sku: 'P1',
        productName: 'Drill',
        stockLevel: 3,
        monthlyTurnover: 2.5,
        stockoutRisk: 0.9,
        action: 'critical',
        recommendation: 'Imminent stockout risk. Raise an urgent purchase order.'
      }
    ]);
  });

  it('ranks suppliers from the sales fact with its dimensions', async () => {
    const { pool, poolQuery } = fakePool([
      {
        sku: 'P1',
        product_name: 'Drill',
        carrier_name: 'Xpress',
        supplier_name: 'Alpha',
        revenue: '40.5',
        shipping_cost: 1.2,
        on_time_delivery: 1,
        defect_rate: 0.04
      }
    ]);

    const ranking = await new AnalyticsService(pool).supplierRanking();

    expect(poolQuery.mock.calls[0][0]).toContain('LEFT JOIN analytics.dim_supplier s ON s.supplier_id = f.supplier_id');
    expect(poolQuery.mock.calls[0][1]).toEqual([500]);
    expect(ranking).toEqual([
      {
        supplierName: 'Alpha',
        averageDefectRate: 0.04,
        action: 'recommended',
        recommendation: 'Lowest defect rate (0.04). Increase purchases from this partner.'
      }
    ]);
  });
});
