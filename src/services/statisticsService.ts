import { recordStore } from "@/database";
import type {
  Order,
  OrderItem,
  Product,
  Supplier,
} from "@/database/schema";
import {
  average,
  distinctCount,
  groupBy,
  groupCount,
  roundTo,
  topN,
} from "@/analytics/aggregations";
import {
  daysAgo,
  monthlyOrderTrend,
  monthsAgo,
  parsePeriodUnit,
  periodLabel,
  revenueByPeriod,
  startOfUtcDay,
} from "@/analytics/revenueSeries";
import { validateDateRange } from "@/query/filters";
import type { Predicate, RecordStore } from "@/types/store";
import type {
  CustomerStatistics,
  MonthlySalesTrend,
  OrderItemStatistics,
  OrderStatistics,
  PricedProduct,
  ProductSales,
  ProductSalesEntry,
  ProductStatistics,
  RevenueReport,
  SupplierPerformance,
  SupplierStatistics,
  TopCustomer,
  TopNByMetric,
  WindowTotals,
} from "@/types";
import { NotFoundError } from "@/utils/errors";
import {
  centsToNumber,
  lineTotal,
  moneyToNumber,
  sumCents,
  toCents,
} from "@/utils/money";

const DAY_MS = 24 * 60 * 60 * 1000;
const REVENUE_DEFAULT_DAYS = 30;
const TREND_MONTHS = 12;

export interface RevenueQuery {
  fromDate?: Date;
  toDate?: Date;
  period?: string;
}

const itemRevenue = (items: OrderItem[]): number =>
  centsToNumber(
    sumCents(items.map((item) => lineTotal(item.unitPrice, item.quantity)))
  );

const orderRevenue = (orders: Order[]): number =>
  centsToNumber(sumCents(orders.map((order) => toCents(order.totalAmount))));

const totalQuantity = (items: OrderItem[]): number =>
  items.reduce((sum, item) => sum + item.quantity, 0);

const earliest = (times: number[]): Date | null =>
  times.length > 0 ? new Date(times.reduce((a, b) => Math.min(a, b))) : null;

const latest = (times: number[]): Date | null =>
  times.length > 0 ? new Date(times.reduce((a, b) => Math.max(a, b))) : null;

const byId = <T extends { id: number }>(rows: T[]): Map<number, T> =>
  new Map(rows.map((row): [number, T] => [row.id, row]));

const windowTotals = (orders: Order[]): WindowTotals => ({
  orders: orders.length,
  revenue: orderRevenue(orders),
});

/** Quantity and revenue per product, for top-selling rankings. */
const productSalesEntries = (
  items: OrderItem[],
  products: Map<number, Product>
): ProductSalesEntry[] =>
  Array.from(groupBy(items, (item) => item.productId), ([productId, lines]) => ({
    productId,
    productName: products.get(productId)?.productName ?? "Unknown",
    totalQuantitySold: totalQuantity(lines),
    totalRevenue: itemRevenue(lines),
  }));

const topSelling = (
  items: OrderItem[],
  products: Map<number, Product>
): TopNByMetric<ProductSalesEntry> =>
  topN(
    productSalesEntries(items, products),
    "totalQuantitySold",
    (entry) => entry.totalQuantitySold,
    (entry) => entry.productId
  );

const pricedProduct = (
  product: Product | undefined,
  suppliers: Map<number, Supplier>
): PricedProduct | null =>
  product
    ? {
        id: product.id,
        productName: product.productName,
        unitPrice: moneyToNumber(product.unitPrice),
        supplierName: suppliers.get(product.supplierId)?.companyName ?? null,
      }
    : null;

/**
 * Read-only reports. Every figure is recomputed from the store on each call;
 * averages over nothing are 0 and rankings break ties by id.
 */
export class StatisticsService {
  constructor(
    private readonly store: RecordStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getCustomerStatistics(): Promise<CustomerStatistics> {
    const [customers, orders] = await Promise.all([
      this.store.customers.findMany(),
      this.store.orders.findMany(),
    ]);

    const buyers = new Set(orders.map((order) => order.customerId));
    const customersWithOrders = customers.filter((customer) =>
      buyers.has(customer.id)
    ).length;

    return {
      totalCustomers: customers.length,
      customersWithOrders,
      customersWithoutOrders: customers.length - customersWithOrders,
      topCountries: topN(
        groupCount(customers, (customer) => customer.country),
        "count",
        (entry) => entry.count,
        (entry) => entry.category
      ),
    };
  }

  async getSupplierStatistics(): Promise<SupplierStatistics> {
    const [suppliers, products, items] = await Promise.all([
      this.store.suppliers.findMany(),
      this.store.products.findMany(),
      this.store.orderItems.findMany(),
    ]);

    const productsBySupplier = groupBy(products, (product) => product.supplierId);
    const supplierOfProduct = new Map(
      products.map((product): [number, number] => [
        product.id,
        product.supplierId,
      ])
    );
    const itemsBySupplier = groupBy(items, (item) =>
      supplierOfProduct.get(item.productId)
    );

    const productCounts = suppliers.map((supplier) => {
      const owned = productsBySupplier.get(supplier.id) ?? [];
      return {
        supplierId: supplier.id,
        companyName: supplier.companyName,
        country: supplier.country,
        totalProducts: owned.length,
        activeProducts: owned.filter((product) => !product.isDiscontinued)
          .length,
      };
    });

    const revenues = suppliers.map((supplier) => ({
      supplierId: supplier.id,
      companyName: supplier.companyName,
      totalRevenue: itemRevenue(itemsBySupplier.get(supplier.id) ?? []),
    }));

    const withProducts = productCounts.filter(
      (entry) => entry.totalProducts > 0
    );

    return {
      overview: {
        totalSuppliers: suppliers.length,
        suppliersWithProducts: withProducts.length,
        suppliersWithoutProducts: suppliers.length - withProducts.length,
        suppliersWithActiveProducts: productCounts.filter(
          (entry) => entry.activeProducts > 0
        ).length,
      },
      topCountries: topN(
        groupCount(suppliers, (supplier) => supplier.country),
        "count",
        (entry) => entry.count,
        (entry) => entry.category
      ),
      topSuppliersByProductCount: topN(
        withProducts,
        "totalProducts",
        (entry) => entry.totalProducts,
        (entry) => entry.supplierId
      ),
      topSuppliersByRevenue: topN(
        revenues.filter((entry) => entry.totalRevenue > 0),
        "totalRevenue",
        (entry) => entry.totalRevenue,
        (entry) => entry.supplierId
      ),
    };
  }

  async getSupplierPerformance(supplierId: number): Promise<SupplierPerformance> {
    const supplier = await this.store.suppliers.findById(supplierId);
    if (!supplier) {
      throw new NotFoundError(`Supplier with ID ${supplierId} not found`);
    }

    const products = await this.store.products.findMany({
      where: [{ op: "eq", field: "supplierId", value: supplierId }],
    });
    const items = await this.store.orderItems.findMany({
      where: [
        {
          op: "in",
          field: "productId",
          values: products.map((product) => product.id),
        },
      ],
    });
    const orders = byId(
      await this.store.orders.findMany({
        where: [
          {
            op: "in",
            field: "id",
            values: Array.from(new Set(items.map((item) => item.orderId))),
          },
        ],
      })
    );

    const totalRevenue = itemRevenue(items);
    const totalOrders = distinctCount(items.map((item) => item.orderId));
    const itemsByProduct = groupBy(items, (item) => item.productId);

    const since = monthsAgo(this.now(), TREND_MONTHS);
    const recentItems = items.filter((item) => {
      const order = orders.get(item.orderId);
      return order !== undefined && order.orderDate >= since;
    });
    const salesTrends: MonthlySalesTrend[] = Array.from(
      groupBy(recentItems, (item) => {
        const order = orders.get(item.orderId);
        return order ? periodLabel(order.orderDate, "month") : undefined;
      }),
      ([label, lines]) => {
        const [year, month] = label.split("-").map(Number);
        return {
          year,
          month,
          quantity: totalQuantity(lines),
          revenue: itemRevenue(lines),
        };
      }
    ).sort((left, right) => left.year - right.year || left.month - right.month);

    return {
      supplierInfo: {
        id: supplier.id,
        companyName: supplier.companyName,
        contactName: supplier.contactName,
        country: supplier.country,
        city: supplier.city,
      },
      productOverview: {
        totalProducts: products.length,
        activeProducts: products.filter((product) => !product.isDiscontinued)
          .length,
        discontinuedProducts: products.filter(
          (product) => product.isDiscontinued
        ).length,
        averageProductPrice: roundTo(
          average(products.map((product) => moneyToNumber(product.unitPrice)))
        ),
      },
      salesMetrics: {
        totalQuantitySold: totalQuantity(items),
        totalRevenue,
        totalOrders,
        averageOrderValue:
          totalOrders > 0 ? roundTo(totalRevenue / totalOrders) : 0,
      },
      salesTrends,
      topProducts: topN(
        products.map((product) => {
          const lines = itemsByProduct.get(product.id) ?? [];
          return {
            productId: product.id,
            productName: product.productName,
            unitPrice: moneyToNumber(product.unitPrice),
            isDiscontinued: product.isDiscontinued,
            quantitySold: totalQuantity(lines),
            revenue: itemRevenue(lines),
          };
        }),
        "quantitySold",
        (entry) => entry.quantitySold,
        (entry) => entry.productId
      ),
    };
  }

  async getProductStatistics(): Promise<ProductStatistics> {
    const [products, suppliers, items] = await Promise.all([
      this.store.products.findMany(),
      this.store.suppliers.findMany(),
      this.store.orderItems.findMany(),
    ]);

    const suppliersById = byId(suppliers);
    const byPrice = [...products].sort(
      (left, right) =>
        toCents(left.unitPrice) - toCents(right.unitPrice) ||
        left.id - right.id
    );
    const byPriceDescending = [...products].sort(
      (left, right) =>
        toCents(right.unitPrice) - toCents(left.unitPrice) ||
        left.id - right.id
    );
    const prices = products.map((product) => moneyToNumber(product.unitPrice));

    const bySupplier = Array.from(
      groupBy(products, (product) => product.supplierId),
      ([supplierId, owned]) => ({
        supplierId,
        supplierName: suppliersById.get(supplierId)?.companyName ?? null,
        productCount: owned.length,
        activeCount: owned.filter((product) => !product.isDiscontinued).length,
        averagePrice: roundTo(
          average(owned.map((product) => moneyToNumber(product.unitPrice)))
        ),
      })
    ).sort(
      (left, right) =>
        right.productCount - left.productCount ||
        left.supplierId - right.supplierId
    );

    return {
      overview: {
        totalProducts: products.length,
        activeProducts: products.filter((product) => !product.isDiscontinued)
          .length,
        discontinuedProducts: products.filter(
          (product) => product.isDiscontinued
        ).length,
        averagePrice: roundTo(average(prices)),
      },
      priceRange: {
        mostExpensive: pricedProduct(byPriceDescending[0], suppliersById),
        cheapest: pricedProduct(byPrice[0], suppliersById),
      },
      bySupplier,
      topSelling: topSelling(items, byId(products)),
    };
  }

  async getOrderStatistics(): Promise<OrderStatistics> {
    const now = this.now();
    const [orders, customers] = await Promise.all([
      this.store.orders.findMany(),
      this.store.customers.findMany(),
    ]);

    const todayStart = startOfUtcDay(now);
    const tomorrowStart = new Date(todayStart.getTime() + DAY_MS);
    const since = (start: Date): Order[] =>
      orders.filter((order) => order.orderDate >= start);

    const totalRevenue = orderRevenue(orders);
    const customersById = byId(customers);

    const spenders: TopCustomer[] = Array.from(
      groupBy(orders, (order) => order.customerId),
      ([customerId, placed]) => {
        const customer = customersById.get(customerId);
        return {
          customerId,
          customerName: customer
            ? `${customer.firstName} ${customer.lastName}`
            : "Unknown",
          totalOrders: placed.length,
          totalSpent: orderRevenue(placed),
        };
      }
    );
    const [topCustomer] = topN(
      spenders,
      "totalSpent",
      (entry) => entry.totalSpent,
      (entry) => entry.customerId,
      1
    ).entries;

    return {
      overview: {
        totalOrders: orders.length,
        totalRevenue,
        averageOrderValue:
          orders.length > 0 ? roundTo(totalRevenue / orders.length) : 0,
      },
      today: windowTotals(
        orders.filter(
          (order) =>
            order.orderDate >= todayStart && order.orderDate < tomorrowStart
        )
      ),
      last7Days: windowTotals(since(startOfUtcDay(now, 7))),
      last30Days: windowTotals(since(startOfUtcDay(now, 30))),
      topCustomer: topCustomer ?? null,
      monthlyTrends: monthlyOrderTrend(since(monthsAgo(now, TREND_MONTHS))),
    };
  }

  async getOrderItemStatistics(): Promise<OrderItemStatistics> {
    const [items, products] = await Promise.all([
      this.store.orderItems.findMany(),
      this.store.products.findMany(),
    ]);

    return {
      totalOrderItems: items.length,
      totalQuantitySold: totalQuantity(items),
      totalRevenue: itemRevenue(items),
      averagePrice: roundTo(
        average(items.map((item) => moneyToNumber(item.unitPrice)))
      ),
      averageQuantityPerItem: roundTo(
        average(items.map((item) => item.quantity))
      ),
      topSellingProducts: topSelling(items, byId(products)),
    };
  }

  async getProductSales(
    productId: number,
    fromDate?: Date,
    toDate?: Date
  ): Promise<ProductSales> {
    validateDateRange(fromDate, toDate);

    const product = await this.store.products.findById(productId);
    if (!product) {
      throw new NotFoundError(`Product with ID ${productId} not found`);
    }

    const items = await this.store.orderItems.findMany({
      where: [{ op: "eq", field: "productId", value: productId }],
    });

    const orderWhere: Predicate<Order>[] = [
      {
        op: "in",
        field: "id",
        values: Array.from(new Set(items.map((item) => item.orderId))),
      },
    ];
    if (fromDate) {
      orderWhere.push({ op: "gte", field: "orderDate", value: fromDate });
    }
    if (toDate) {
      orderWhere.push({ op: "lte", field: "orderDate", value: toDate });
    }
    const orders = byId(await this.store.orders.findMany({ where: orderWhere }));
    const sold = items.filter((item) => orders.has(item.orderId));
    const dates = Array.from(orders.values(), (order) =>
      order.orderDate.getTime()
    );

    return {
      productId,
      productName: product.productName,
      totalQuantitySold: totalQuantity(sold),
      totalRevenue: itemRevenue(sold),
      orderCount: distinctCount(sold.map((item) => item.orderId)),
      averageQuantityPerOrder: roundTo(
        average(sold.map((item) => item.quantity))
      ),
      averagePrice: roundTo(
        average(sold.map((item) => moneyToNumber(item.unitPrice)))
      ),
      dateRange: {
        from: fromDate ?? earliest(dates),
        to: toDate ?? latest(dates),
      },
    };
  }

  /** Revenue per day, week or month; defaults to the last 30 days. */
  async getRevenueByPeriod(query: RevenueQuery = {}): Promise<RevenueReport> {
    const period = parsePeriodUnit(query.period);
    const now = this.now();
    const toDate = query.toDate ?? now;
    const fromDate = query.fromDate ?? daysAgo(now, REVENUE_DEFAULT_DAYS);
    validateDateRange(fromDate, toDate);

    const orders = await this.store.orders.findMany({
      where: [
        { op: "gte", field: "orderDate", value: fromDate },
        { op: "lte", field: "orderDate", value: toDate },
      ],
    });

    return {
      fromDate,
      toDate,
      period,
      buckets: revenueByPeriod(orders, period),
    };
  }
}

export const statisticsService = new StatisticsService(recordStore);
