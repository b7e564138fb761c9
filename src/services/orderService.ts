import { recordStore } from "@/database";
import {
  CONSTRAINTS,
  Customer,
  NewOrderItem,
  Order,
  OrderItem,
  Product,
} from "@/database/schema";
import { config } from "@/config/env";
import { logger } from "@/monitoring/logger";
import {
  FilterBuilder,
  validateDateRange,
  validatePositiveId,
  validateRange,
} from "@/query/filters";
import { paginate } from "@/query/pagination";
import type { Predicate, RecordStore } from "@/types/store";
import {
  CreateOrderRequest,
  OrderDetail,
  OrderListQuery,
  MAX_ITEM_QUANTITY,
  Page,
  RECENT_ORDERS_DEFAULT_DAYS,
  RECENT_ORDERS_LIMIT,
  RECENT_ORDERS_MAX_DAYS,
} from "@/types";
import {
  ConflictError,
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
  UniqueConstraintError,
} from "@/utils/errors";
import { generateOrderNumber } from "@/utils/idGenerator";
import {
  Cents,
  fromCents,
  lineTotal,
  MAX_ORDER_TOTAL_CENTS,
} from "@/utils/money";

const HOUR_MS = 60 * 60 * 1000;

export interface OrderServiceOptions {
  now?: () => Date;
  nextOrderNumber?: (at: Date) => string;
  orderNumberMaxAttempts?: number;
}

type PricedLine = Omit<NewOrderItem, "orderId">;

/** Items and deletion are editable for 24 hours after the order date. */
export const assertWithinEditWindow = (order: Order, now: Date): void => {
  const ageMs = now.getTime() - order.orderDate.getTime();
  if (ageMs > config.orders.editWindowHours * HOUR_MS) {
    throw new InvalidOperationError(
      `Order ${order.orderNumber} can no longer be modified: the ${config.orders.editWindowHours}-hour edit window has closed`
    );
  }
};

/** Rejects totals the order total column cannot hold. */
export const assertOrderTotal = (cents: Cents): void => {
  if (cents > MAX_ORDER_TOTAL_CENTS) {
    throw new InvalidInputError(
      `Order total must be at most ${fromCents(MAX_ORDER_TOTAL_CENTS)}`
    );
  }
};

// Each line is checked before it is added, so the running sum stays exact.
const orderTotal = (lines: PricedLine[]): Cents =>
  lines.reduce((total, line) => {
    const cents = lineTotal(line.unitPrice, line.quantity);
    assertOrderTotal(cents);
    assertOrderTotal(total + cents);
    return total + cents;
  }, 0);

const isOrderNumberCollision = (error: unknown): boolean =>
  error instanceof UniqueConstraintError &&
  error.constraint === CONSTRAINTS.ORDER_NUMBER_UNIQUE;

const unique = (values: number[]): number[] => Array.from(new Set(values));

export class OrderService {
  private readonly now: () => Date;
  private readonly nextOrderNumber: (at: Date) => string;
  private readonly orderNumberMaxAttempts: number;

  constructor(
    private readonly store: RecordStore,
    options: OrderServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.nextOrderNumber = options.nextOrderNumber ?? generateOrderNumber;
    this.orderNumberMaxAttempts =
      options.orderNumberMaxAttempts ?? config.orders.orderNumberMaxAttempts;
  }

  async createOrder(
    request: CreateOrderRequest,
    correlationId?: string
  ): Promise<OrderDetail> {
    const contextLogger = logger.child({
      correlationId,
      customerId: request.customerId,
    });

    contextLogger.info("Creating order", { itemCount: request.items.length });

    // 1. Customer must exist
    const customer = await this.store.customers.findById(request.customerId);
    if (!customer) {
      throw new NotFoundError(
        `Customer with ID ${request.customerId} not found`
      );
    }

    // 2. At least one item
    if (request.items.length === 0) {
      throw new InvalidInputError("Order must contain at least one item");
    }

    // 3. Validate items in input order and snapshot prices
    const lines = await this.priceLines(request);
    const totalAmount = fromCents(orderTotal(lines));

    // 4. Persist atomically, regenerating the number on collision
    for (let attempt = 1; ; attempt++) {
      const orderDate = this.now();
      const orderNumber = this.nextOrderNumber(orderDate);

      try {
        const orderId = await this.store.transaction(async (tx) => {
          const order = await tx.orders.insert({
            orderDate,
            orderNumber,
            customerId: customer.id,
            totalAmount,
          });
          await tx.orderItems.insertMany(
            lines.map((line) => ({ ...line, orderId: order.id }))
          );
          return order.id;
        });

        contextLogger.info("Order created successfully", {
          orderId,
          orderNumber,
          totalAmount,
        });

        return this.getOrder(orderId);
      } catch (error) {
        if (!isOrderNumberCollision(error)) {
          contextLogger.error("Order creation failed", {
            error: error instanceof Error ? error.message : error,
          });
          throw error;
        }
        if (attempt >= this.orderNumberMaxAttempts) {
          contextLogger.error("Order number generation exhausted", {
            attempts: attempt,
          });
          throw new ConflictError(
            "Could not generate a unique order number. Please try again"
          );
        }
        contextLogger.warn("Order number collision, retrying", {
          orderNumber,
          attempt,
        });
      }
    }
  }

  async getOrder(id: number): Promise<OrderDetail> {
    const order = await this.store.orders.findById(id);
    if (!order) {
      throw new NotFoundError(`Order with ID ${id} not found`);
    }
    const [detail] = await this.withDetails([order]);
    return detail;
  }

  async getOrderByNumber(orderNumber: string): Promise<OrderDetail> {
    const [order] = await this.store.orders.findMany({
      where: [{ op: "eq", field: "orderNumber", value: orderNumber.trim() }],
      limit: 1,
    });
    if (!order) {
      throw new NotFoundError(`Order with number ${orderNumber} not found`);
    }
    const [detail] = await this.withDetails([order]);
    return detail;
  }

  async listOrders(query: OrderListQuery = {}): Promise<Page<OrderDetail>> {
    validatePositiveId("Customer ID", query.customerId);
    validateRange("amount", query.minAmount, query.maxAmount);
    validateDateRange(query.fromDate, query.toDate);

    const where = new FilterBuilder<Order>()
      .equals("customerId", query.customerId)
      .atLeast("orderDate", query.fromDate)
      .atMost("orderDate", query.toDate)
      .atLeast("totalAmount", query.minAmount)
      .atMost("totalAmount", query.maxAmount)
      .build();

    const page = await paginate(this.store.orders, {
      where,
      orderBy: [{ field: "orderDate", direction: "desc" }],
      page: query,
    });

    return { items: await this.withDetails(page.items), meta: page.meta };
  }

  async listOrdersByCustomer(customerId: number): Promise<OrderDetail[]> {
    validatePositiveId("Customer ID", customerId);

    const exists = await this.store.customers.exists([
      { op: "eq", field: "id", value: customerId },
    ]);
    if (!exists) {
      throw new NotFoundError(`Customer with ID ${customerId} not found`);
    }

    return this.findWithDetails(
      [{ op: "eq", field: "customerId", value: customerId }],
      undefined
    );
  }

  async listRecentOrders(
    days: number = RECENT_ORDERS_DEFAULT_DAYS
  ): Promise<OrderDetail[]> {
    if (!Number.isInteger(days) || days < 1 || days > RECENT_ORDERS_MAX_DAYS) {
      throw new InvalidInputError(
        `Days must be between 1 and ${RECENT_ORDERS_MAX_DAYS}`
      );
    }

    const since = new Date(this.now().getTime() - days * 24 * HOUR_MS);
    return this.findWithDetails(
      [{ op: "gte", field: "orderDate", value: since }],
      RECENT_ORDERS_LIMIT
    );
  }

  async deleteOrder(id: number, correlationId?: string): Promise<void> {
    const contextLogger = logger.child({ correlationId, orderId: id });

    const order = await this.store.orders.findById(id);
    if (!order) {
      throw new NotFoundError(`Order with ID ${id} not found`);
    }
    assertWithinEditWindow(order, this.now());

    // Items go with the order (cascade)
    const removed = await this.store.orders.remove(id);
    if (!removed) {
      throw new NotFoundError(`Order with ID ${id} no longer exists`);
    }

    contextLogger.info("Order deleted", { orderNumber: order.orderNumber });
  }

  /** Loads customers, items and products for the given orders. */
  async withDetails(orders: Order[]): Promise<OrderDetail[]> {
    if (orders.length === 0) {
      return [];
    }

    const [customers, items] = await Promise.all([
      this.store.customers.findMany({
        where: [
          {
            op: "in",
            field: "id",
            values: unique(orders.map((order) => order.customerId)),
          },
        ],
      }),
      this.store.orderItems.findMany({
        where: [
          { op: "in", field: "orderId", values: orders.map((order) => order.id) },
        ],
        orderBy: [{ field: "id", direction: "asc" }],
      }),
    ]);

    const products = await this.productsById(items);
    const customersById = new Map(
      customers.map((customer): [number, Customer] => [customer.id, customer])
    );

    return orders.map((order) => ({
      ...order,
      customer: customersById.get(order.customerId) ?? null,
      items: items
        .filter((item) => item.orderId === order.id)
        .map((item) => ({
          ...item,
          product: products.get(item.productId) ?? null,
        })),
    }));
  }

  private async productsById(items: OrderItem[]): Promise<Map<number, Product>> {
    if (items.length === 0) {
      return new Map();
    }
    const products = await this.store.products.findMany({
      where: [
        {
          op: "in",
          field: "id",
          values: unique(items.map((item) => item.productId)),
        },
      ],
    });
    return new Map(
      products.map((product): [number, Product] => [product.id, product])
    );
  }

  private async findWithDetails(
    where: Predicate<Order>[],
    limit: number | undefined
  ): Promise<OrderDetail[]> {
    const orders = await this.store.orders.findMany({
      where,
      orderBy: [
        { field: "orderDate", direction: "desc" },
        { field: "id", direction: "asc" },
      ],
      limit,
    });
    return this.withDetails(orders);
  }

  private async priceLines(request: CreateOrderRequest): Promise<PricedLine[]> {
    const lines: PricedLine[] = [];

    for (const item of request.items) {
      const product = await this.store.products.findById(item.productId);
      if (!product) {
        throw new NotFoundError(`Product with ID ${item.productId} not found`);
      }
      if (product.isDiscontinued) {
        throw new InvalidOperationError(
          `Product ${product.productName} is discontinued`
        );
      }
      if (!Number.isInteger(item.quantity) || item.quantity < 1) {
        throw new InvalidInputError(
          `Quantity for product ${item.productId} must be at least 1`
        );
      }
      if (item.quantity > MAX_ITEM_QUANTITY) {
        throw new InvalidInputError(
          `Quantity for product ${item.productId} must be at most ${MAX_ITEM_QUANTITY}`
        );
      }

      lines.push({
        productId: product.id,
        unitPrice: product.unitPrice,
        quantity: item.quantity,
      });
    }

    return lines;
  }
}

export const orderService = new OrderService(recordStore);
