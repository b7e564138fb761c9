// Result variants shared by every statistics endpoint. Money is a plain
// number with two decimals.

export type PeriodUnit = "day" | "week" | "month";

export interface CountByCategory {
  category: string;
  count: number;
}

export interface RevenueByPeriod {
  period: string;
  orderCount: number;
  revenue: number;
}

/** A ranking of at most `limit` entries, highest `metric` first. */
export interface TopNByMetric<TEntry> {
  metric: keyof TEntry & string;
  limit: number;
  entries: TEntry[];
}

export type Overview<TField extends string> = Record<TField, number>;

export interface MonthlyOrderTrend {
  year: number;
  month: number;
  orderCount: number;
  revenue: number;
}

export interface MonthlySalesTrend {
  year: number;
  month: number;
  quantity: number;
  revenue: number;
}

export interface ProductSalesEntry {
  productId: number;
  productName: string;
  totalQuantitySold: number;
  totalRevenue: number;
}

export interface CustomerStatistics {
  totalCustomers: number;
  customersWithOrders: number;
  customersWithoutOrders: number;
  topCountries: TopNByMetric<CountByCategory>;
}

export interface SupplierProductCountEntry {
  supplierId: number;
  companyName: string;
  country: string | null;
  totalProducts: number;
  activeProducts: number;
}

export interface SupplierRevenueEntry {
  supplierId: number;
  companyName: string;
  totalRevenue: number;
}

export interface SupplierStatistics {
  overview: Overview<
    | "totalSuppliers"
    | "suppliersWithProducts"
    | "suppliersWithoutProducts"
    | "suppliersWithActiveProducts"
  >;
  topCountries: TopNByMetric<CountByCategory>;
  topSuppliersByProductCount: TopNByMetric<SupplierProductCountEntry>;
  topSuppliersByRevenue: TopNByMetric<SupplierRevenueEntry>;
}

export interface SupplierProductPerformance {
  productId: number;
  productName: string;
  unitPrice: number;
  isDiscontinued: boolean;
  quantitySold: number;
  revenue: number;
}

export interface SupplierPerformance {
  supplierInfo: {
    id: number;
    companyName: string;
    contactName: string | null;
    country: string | null;
    city: string | null;
  };
  productOverview: Overview<
    "totalProducts" | "activeProducts" | "discontinuedProducts" | "averageProductPrice"
  >;
  salesMetrics: Overview<
    "totalQuantitySold" | "totalRevenue" | "totalOrders" | "averageOrderValue"
  >;
  salesTrends: MonthlySalesTrend[];
  topProducts: TopNByMetric<SupplierProductPerformance>;
}

export interface PricedProduct {
  id: number;
  productName: string;
  unitPrice: number;
  supplierName: string | null;
}

export interface SupplierProductBreakdown {
  supplierId: number;
  supplierName: string | null;
  productCount: number;
  activeCount: number;
  averagePrice: number;
}

export interface ProductStatistics {
  overview: Overview<
    "totalProducts" | "activeProducts" | "discontinuedProducts" | "averagePrice"
  >;
  priceRange: {
    mostExpensive: PricedProduct | null;
    cheapest: PricedProduct | null;
  };
  bySupplier: SupplierProductBreakdown[];
  topSelling: TopNByMetric<ProductSalesEntry>;
}

export interface TopCustomer {
  customerId: number;
  customerName: string;
  totalOrders: number;
  totalSpent: number;
}

export type WindowTotals = Overview<"orders" | "revenue">;

export interface OrderStatistics {
  overview: Overview<"totalOrders" | "totalRevenue" | "averageOrderValue">;
  today: WindowTotals;
  last7Days: WindowTotals;
  last30Days: WindowTotals;
  topCustomer: TopCustomer | null;
  monthlyTrends: MonthlyOrderTrend[];
}

export interface OrderItemStatistics {
  totalOrderItems: number;
  totalQuantitySold: number;
  totalRevenue: number;
  averagePrice: number;
  averageQuantityPerItem: number;
  topSellingProducts: TopNByMetric<ProductSalesEntry>;
}

export interface ProductSales {
  productId: number;
  productName: string;
  totalQuantitySold: number;
  totalRevenue: number;
  orderCount: number;
  averageQuantityPerOrder: number;
  averagePrice: number;
  dateRange: {
    from: Date | null;
    to: Date | null;
  };
}

export interface RevenueReport {
  fromDate: Date;
  toDate: Date;
  period: PeriodUnit;
  buckets: RevenueByPeriod[];
}
