import { describe, expect, it } from 'vitest';
import type { CsvRecord } from '../lib/csv';
import { buildStarSchema } from './analyticsModel.service';

function sequence(values: number[]) {
  let index = 0;
  return () => values[index++ % values.length];
}

const records: CsvRecord[] = [
  {
    SKU: 'WID-100',
    'Product type': 'widgets',
    Price: '24.50',
    'Number of products sold': '120',
    'Revenue generated': '2940.00',
    'Stock levels': '35',
    'Supplier name': 'Supplier Beta',
    Location: 'Lyon',
    'Shipping carriers': 'Carrier North',
    'Shipping costs': '4.10',
    'Transportation modes': 'Road',
    'Manufacturing costs': '11.75',
    'Defect rates': '0.80'
  },
  {
    SKU: 'GAD-300',
    'Number of products sold': '310',
    'Revenue generated': '',
    'Stock levels': '63.6',
    'Supplier name': 'Supplier Alpha',
    'Shipping carriers': 'Carrier North',
    'Manufacturing costs': '5.60'
  },
  {
    SKU: 'ORPHAN-1',
    'Supplier name': 'Supplier Alpha',
    'Shipping carriers': ''
  }
];

describe('buildStarSchema', () => {
  const model = buildStarSchema(records, {
    today: new Date('2026-04-15T09:30:00.000Z'),
    random: sequence([0.1, 0.5, 0, 0.9, 0.2, 0.5])
  });

  it('skips rows without a SKU, supplier, or carrier', () => {
    expect(model.sourceRows).toBe(3);
    expect(model.skippedRows).toBe(1);
    expect(model.sales.map((fact) => fact.sku)).toEqual(['WID-100', 'GAD-300']);
  });

  it('codes suppliers and carriers by sorted name', () => {
    expect(model.suppliers).toEqual([
      { supplierId: 'SUP_1', name: 'Supplier Beta', location: 'Lyon' },
      { supplierId: 'SUP_0', name: 'Supplier Alpha', location: null }
    ]);
    expect(model.carriers).toEqual([{ carrierId: 'CAR_0', name: 'Carrier North', transportMode: 'Road' }]);
  });

  it('dates each row one day further back', () => {
    expect(model.dates).toEqual([
      { dateId: '2026-04-15', year: 2026, month: 4, day: 15 },
      { dateId: '2026-04-14', year: 2026, month: 4, day: 14 }
    ]);
  });

  it('builds product dimensions with missing values as null', () => {
    expect(model.products).toEqual([
      { sku: 'WID-100', name: 'WID-100', category: 'widgets', manufacturingCost: 11.75, price: 24.5 },
      { sku: 'GAD-300', name: 'GAD-300', category: null, manufacturingCost: 5.6, price: null }
    ]);
  });

  it('derives margin and draws the simulated delivery metric', () => {
    expect(model.sales).toEqual([
      {
        dateId: '2026-04-15',
        sku: 'WID-100',
        supplierId: 'SUP_1',
        carrierId: 'CAR_0',
        revenue: 2940,
        cost: 11.75,
        margin: 2928.25,
        unitsSold: 120,
        shippingCost: 4.1,
        onTimeDelivery: 0,
        defectRate: 0.8
      },
      {
        dateId: '2026-04-14',
        sku: 'GAD-300',
        supplierId: 'SUP_0',
        carrierId: 'CAR_0',
        revenue: null,
        cost: 5.6,
        margin: null,
        unitsSold: 310,
        shippingCost: null,
        onTimeDelivery: 1,
        defectRate: null
      }
    ]);
  });

  it('rounds stock levels and scales the simulated stock metrics', () => {
    expect(model.stock).toEqual([
      { dateId: '2026-04-15', sku: 'WID-100', stockLevel: 35, monthlyTurnover: 2.75, stockoutRisk: 0.01 },
      { dateId: '2026-04-14', sku: 'GAD-300', stockLevel: 64, monthlyTurnover: 1.4, stockoutRisk: 0.455 }
    ]);
  });

  it('keeps the first occurrence of a repeated SKU as its dimension row', () => {
    const repeated = buildStarSchema(
      [
        { SKU: 'R1', 'Supplier name': 'S', 'Shipping carriers': 'C', Price: '1' },
        { SKU: 'R1', 'Supplier name': 'S', 'Shipping carriers': 'C', Price: '2' }
      ],
      { today: new Date('2026-04-15T00:00:00.000Z'), random: () => 0.5 }
    );

    expect(repeated.products).toEqual([{ sku: 'R1', name: 'R1', category: null, manufacturingCost: null, price: 1 }]);
    expect(repeated.sales).toHaveLength(2);
  });
});
