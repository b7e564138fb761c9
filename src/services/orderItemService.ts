import { recordStore } from "@/database";
import type { Order, OrderItem } from "@/database/schema";
import { logger } from "@/monitoring/logger";
import type { RecordStore } from "@/types/store";
import { MAX_ITEM_QUANTITY, OrderItemDetail } from "@/types";
import {
  ConflictError,
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "@/utils/errors";
import { fromCents, toCents } from "@/utils/money";
import { withConflictRecheck } from "./concurrency";
import { assertOrderTotal, assertWithinEditWindow } from "./orderService";

interface EditableItem {
  item: OrderItem;
  order: Order;
}

export class OrderItemService {
  constructor(
    private readonly store: RecordStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getOrderItem(id: number): Promise<OrderItemDetail> {
    const item = await this.store.orderItems.findById(id);
    if (!item) {
      throw new NotFoundError(`Order item with ID ${id} not found`);
    }
    const product = await this.store.products.findById(item.productId);
    return { ...item, product: product ?? null };
  }

  async listOrderItems(orderId: number): Promise<OrderItemDetail[]> {
    const exists = await this.store.orders.exists([
      { op: "eq", field: "id", value: orderId },
    ]);
    if (!exists) {
      throw new NotFoundError(`Order with ID ${orderId} not found`);
    }

    const items = await this.store.orderItems.findMany({
      where: [{ op: "eq", field: "orderId", value: orderId }],
      orderBy: [{ field: "id", direction: "asc" }],
    });
    const products = await this.store.products.findMany({
      where: [
        { op: "in", field: "id", values: items.map((item) => item.productId) },
      ],
    });

    return items.map((item) => ({
      ...item,
      product: products.find((product) => product.id === item.productId) ?? null,
    }));
  }

  /**
   * Changes an item's quantity and moves the order total by
   * unitPrice x (new - old). Both writes commit together.
   */
  async updateQuantity(
    id: number,
    quantity: number,
    correlationId?: string
  ): Promise<OrderItemDetail> {
    const contextLogger = logger.child({ correlationId, orderItemId: id });

    const { item, order } = await this.loadEditable(id);
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidInputError("Quantity must be at least 1");
    }
    if (quantity > MAX_ITEM_QUANTITY) {
      throw new InvalidInputError(
        `Quantity must be at most ${MAX_ITEM_QUANTITY}`
      );
    }

    const delta = toCents(item.unitPrice) * (quantity - item.quantity);
    const totalCents = toCents(order.totalAmount) + delta;
    assertOrderTotal(totalCents);
    const totalAmount = fromCents(totalCents);

    await withConflictRecheck(
      "Order item",
      () => this.bothExist(item),
      () =>
        this.store.transaction(async (tx) => {
          await tx.orderItems.update(item.id, item.version, { quantity });
          await tx.orders.update(order.id, order.version, { totalAmount });
        })
    );

    contextLogger.info("Order item quantity updated", {
      orderId: order.id,
      previousQuantity: item.quantity,
      quantity,
      totalAmount,
    });

    return this.getOrderItem(id);
  }

  /** Removes an item and subtracts its line total; the last item stays. */
  async deleteItem(id: number, correlationId?: string): Promise<void> {
    const contextLogger = logger.child({ correlationId, orderItemId: id });

    const { item, order } = await this.loadEditable(id);

    const itemCount = await this.store.orderItems.count([
      { op: "eq", field: "orderId", value: order.id },
    ]);
    if (itemCount <= 1) {
      throw new InvalidOperationError(
        "Cannot delete the last item of an order. Delete the order instead"
      );
    }

    const totalAmount = fromCents(
      toCents(order.totalAmount) - toCents(item.unitPrice) * item.quantity
    );

    await withConflictRecheck(
      "Order item",
      () => this.bothExist(item),
      () =>
        this.store.transaction(async (tx) => {
          // The order version guards against a concurrent removal of a sibling.
          await tx.orders.update(order.id, order.version, { totalAmount });
          const removed = await tx.orderItems.remove(item.id);
          if (!removed) {
            throw new ConflictError(`Order item ${item.id} was removed`);
          }
        })
    );

    contextLogger.info("Order item deleted", {
      orderId: order.id,
      totalAmount,
    });
  }

  private async loadEditable(id: number): Promise<EditableItem> {
    const item = await this.store.orderItems.findById(id);
    if (!item) {
      throw new NotFoundError(`Order item with ID ${id} not found`);
    }
    const order = await this.store.orders.findById(item.orderId);
    if (!order) {
      throw new NotFoundError(`Order with ID ${item.orderId} not found`);
    }
    assertWithinEditWindow(order, this.now());
    return { item, order };
  }

  private async bothExist(item: OrderItem): Promise<boolean> {
    const [itemExists, orderExists] = await Promise.all([
      this.store.orderItems.exists([{ op: "eq", field: "id", value: item.id }]),
      this.store.orders.exists([{ op: "eq", field: "id", value: item.orderId }]),
    ]);
    return itemExists && orderExists;
  }
}

export const orderItemService = new OrderItemService(recordStore);
