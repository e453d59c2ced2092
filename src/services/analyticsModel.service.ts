import type { CsvRecord } from '../lib/csv';
import { parseOptionalNumber, roundTo } from '../lib/numbers';

/** Column headers of the supplier dataset. */
export const SOURCE_COLUMNS = {
  sku: 'SKU',
  productType: 'Product type',
  price: 'Price',
  unitsSold: 'Number of products sold',
  revenue: 'Revenue generated',
  stockLevel: 'Stock levels',
  supplierName: 'Supplier name',
  location: 'Location',
  carrier: 'Shipping carriers',
  shippingCost: 'Shipping costs',
  transportMode: 'Transportation modes',
  manufacturingCost: 'Manufacturing costs',
  defectRate: 'Defect rates'
} as const;

export type DimProduct = {
  sku: string;
  name: string;
  category: string | null;
  manufacturingCost: number | null;
  price: number | null;
};

export type DimSupplier = {
  supplierId: string;
  name: string;
  location: string | null;
};

export type DimCarrier = {
  carrierId: string;
  name: string;
  transportMode: string | null;
};

export type DimDate = {
  dateId: string;
  year: number;
  month: number;
  day: number;
};

export type SalesFact = {
  dateId: string;
  sku: string;
  supplierId: string;
  carrierId: string;
  revenue: number | null;
  cost: number | null;
  margin: number | null;
  unitsSold: number | null;
  shippingCost: number | null;
  onTimeDelivery: 0 | 1;
  defectRate: number | null;
};

export type StockFact = {
  dateId: string;
  sku: string;
  stockLevel: number | null;
  monthlyTurnover: number;
  stockoutRisk: number;
};

export type StarSchema = {
  products: DimProduct[];
  suppliers: DimSupplier[];
  carriers: DimCarrier[];
  dates: DimDate[];
  sales: SalesFact[];
  stock: StockFact[];
  sourceRows: number;
  skippedRows: number;
};

export type StarSchemaOptions = {
  /** Reference day for simulated order dates; row i is dated i days earlier. */
  today: Date;
  /** Uniform source in [0, 1) for the simulated delivery and stock metrics. */
  random: () => number;
};

const ON_TIME_PROBABILITY = 0.85;
const TURNOVER_RANGE: [number, number] = [0.5, 5.0];
const STOCKOUT_RISK_RANGE: [number, number] = [0.01, 0.9];

function optionalText(value: string | undefined): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed ? trimmed : null;
}

function optionalCount(value: string | undefined): number | null {
  const parsed = parseOptionalNumber(value);
  return parsed === null ? null : Math.round(parsed);
}

function uniform(random: () => number, [min, max]: [number, number]): number {
  return roundTo(min + random() * (max - min), 4);
}

function toDateDimension(today: Date, daysBack: number): DimDate {
  const date = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate() - daysBack));
  return {
    dateId: date.toISOString().slice(0, 10),
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate()
  };
}

/** Codes each distinct name by its rank in sorted order, e.g. SUP_0, SUP_1. */
function codeNames(names: Array<string | null>, prefix: string): Map<string, string> {
  const distinct = [...new Set(names.filter((name): name is string => name !== null))].sort();
  return new Map(distinct.map((name, index) => [name, `${prefix}_${index}`]));
}

function firstByKey<T>(items: T[], key: (item: T) => string): T[] {
  const seen = new Map<string, T>();
  for (const item of items) {
    const id = key(item);
    if (!seen.has(id)) seen.set(id, item);
  }
  return [...seen.values()];
}

/**
 * Reshapes flat supplier rows into the analytic star schema: four dimensions
 * (product, supplier, carrier, date) and two facts (sales/logistics, stock).
 */
export function buildStarSchema(records: CsvRecord[], options: StarSchemaOptions): StarSchema {
  const supplierIds = codeNames(
    records.map((record) => optionalText(record[SOURCE_COLUMNS.supplierName])),
    'SUP'
  );
  const carrierIds = codeNames(
    records.map((record) => optionalText(record[SOURCE_COLUMNS.carrier])),
    'CAR'
  );

  const products: DimProduct[] = [];
  const suppliers: DimSupplier[] = [];
  const carriers: DimCarrier[] = [];
  const dates: DimDate[] = [];
  const sales: SalesFact[] = [];
  const stock: StockFact[] = [];
  let skippedRows = 0;

  records.forEach((record, index) => {
    const sku = optionalText(record[SOURCE_COLUMNS.sku]);
    const supplierName = optionalText(record[SOURCE_COLUMNS.supplierName]);
    const carrierName = optionalText(record[SOURCE_COLUMNS.carrier]);
    const supplierId = supplierName ? supplierIds.get(supplierName) : undefined;
    const carrierId = carrierName ? carrierIds.get(carrierName) : undefined;
    if (!sku || !supplierName || !carrierName || !supplierId || !carrierId) {
      skippedRows += 1;
      return;
    }

    const date = toDateDimension(options.today, index);
    const revenue = parseOptionalNumber(record[SOURCE_COLUMNS.revenue]);
    const cost = parseOptionalNumber(record[SOURCE_COLUMNS.manufacturingCost]);

    products.push({
      sku,
      name: sku,
      category: optionalText(record[SOURCE_COLUMNS.productType]),
      manufacturingCost: cost,
      price: parseOptionalNumber(record[SOURCE_COLUMNS.price])
    });
    suppliers.push({ supplierId, name: supplierName, location: optionalText(record[SOURCE_COLUMNS.location]) });
    carriers.push({
      carrierId,
      name: carrierName,
      transportMode: optionalText(record[SOURCE_COLUMNS.transportMode])
    });
    dates.push(date);

    sales.push({
      dateId: date.dateId,
      sku,
      supplierId,
      carrierId,
      revenue,
      cost,
      margin: revenue !== null && cost !== null ? roundTo(revenue - cost, 6) : null,
      unitsSold: optionalCount(record[SOURCE_COLUMNS.unitsSold]),
      shippingCost: parseOptionalNumber(record[SOURCE_COLUMNS.shippingCost]),
      onTimeDelivery: options.random() < 1 - ON_TIME_PROBABILITY ? 0 : 1,
      defectRate: parseOptionalNumber(record[SOURCE_COLUMNS.defectRate])
    });
    stock.push({
      dateId: date.dateId,
      sku,
      stockLevel: optionalCount(record[SOURCE_COLUMNS.stockLevel]),
      monthlyTurnover: uniform(options.random, TURNOVER_RANGE),
      stockoutRisk: uniform(options.random, STOCKOUT_RISK_RANGE)
    });
  });

  return {
    products: firstByKey(products, (product) => product.sku),
    suppliers: firstByKey(suppliers, (supplier) => supplier.supplierId),
    carriers: firstByKey(carriers, (carrier) => carrier.carrierId),
    dates: firstByKey(dates, (date) => date.dateId),
    sales,
    stock,
    sourceRows: records.length,
    skippedRows
  };
}
