import { OrderItemService } from "../src/services/orderItemService";
import { OrderService } from "../src/services/orderService";
import type { OrderDetail } from "../src/types";
import {
  ConflictError,
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "../src/utils/errors";
import { lineTotal, sumCents, toCents } from "../src/utils/money";
import { Catalog, createCatalog, createClock } from "./fixtures";

jest.mock("../src/monitoring/logger", () => {
  const mockChildLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  return {
    logger: {
      info: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
      child: jest.fn(() => mockChildLogger),
    },
  };
});

describe("OrderItemService", () => {
  let catalog: Catalog;
  let clock: ReturnType<typeof createClock>;
  let orders: OrderService;
  let service: OrderItemService;
  let order: OrderDetail;

  beforeEach(async () => {
    jest.clearAllMocks();
    catalog = await createCatalog();
    clock = createClock("2026-05-20T08:00:00.000Z");
    orders = new OrderService(catalog.store, { now: clock.now });
    service = new OrderItemService(catalog.store, clock.now);

    // 2 x 9.99 + 1 x 5.00 = 24.98
    order = await orders.createOrder({
      customerId: catalog.customer.id,
      items: [
        { productId: catalog.tea.id, quantity: 2 },
        { productId: catalog.salt.id, quantity: 1 },
      ],
    });
  });

  const teaItem = () => order.items[0];
  const saltItem = () => order.items[1];

  /** Stored total and the sum of the stored items, in cents. */
  const totals = async (orderId: number) => {
    const stored = await catalog.store.orders.findById(orderId);
    const items = await catalog.store.orderItems.findMany({
      where: [{ op: "eq", field: "orderId", value: orderId }],
    });
    return {
      total: stored ? toCents(stored.totalAmount) : null,
      itemSum: sumCents(
        items.map((item) => lineTotal(item.unitPrice, item.quantity))
      ),
    };
  };

  describe("updateQuantity", () => {
    it("should move the order total by the price of the added units", async () => {
      clock.advanceHours(3);

      const updated = await service.updateQuantity(teaItem().id, 5);

      expect(updated.quantity).toBe(5);
      expect(updated.unitPrice).toBe("9.99");
      const stored = await catalog.store.orders.findById(order.id);
      expect(stored?.totalAmount).toBe("54.95");
      expect(await totals(order.id)).toEqual({ total: 5495, itemSum: 5495 });
    });

    it("should lower the total when the quantity drops", async () => {
      await service.updateQuantity(teaItem().id, 1);

      expect(await totals(order.id)).toEqual({ total: 1499, itemSum: 1499 });
    });

    it("should refuse once the edit window has closed", async () => {
      clock.advanceHours(25);

      await expect(service.updateQuantity(teaItem().id, 5)).rejects.toThrow(
        InvalidOperationError
      );
      expect(await totals(order.id)).toEqual({ total: 2498, itemSum: 2498 });
    });

    it("should refuse a quantity below 1", async () => {
      await expect(service.updateQuantity(teaItem().id, 0)).rejects.toThrow(
        InvalidInputError
      );
    });

    it("should refuse a quantity the item column cannot hold", async () => {
      await expect(
        service.updateQuantity(teaItem().id, 2_147_483_648)
      ).rejects.toThrow("Quantity must be at most 2147483647");
    });

    it("should refuse a quantity that pushes the total past what can be stored", async () => {
      await expect(
        service.updateQuantity(teaItem().id, 2_000_000_000)
      ).rejects.toThrow("Order total must be at most 9999999999.99");
      expect(await totals(order.id)).toEqual({ total: 2498, itemSum: 2498 });
    });

    it("should report a missing item", async () => {
      await expect(service.updateQuantity(999, 2)).rejects.toThrow(
        NotFoundError
      );
    });

    it("should surface a conflict when the item changed since it was read", async () => {
      const current = await catalog.store.orderItems.findById(teaItem().id);
      if (!current) {
        throw new Error("fixture item missing");
      }
      jest
        .spyOn(catalog.store.orderItems, "findById")
        .mockResolvedValueOnce({ ...current, version: current.version + 7 });

      await expect(service.updateQuantity(teaItem().id, 4)).rejects.toThrow(
        ConflictError
      );
      expect(await totals(order.id)).toEqual({ total: 2498, itemSum: 2498 });
    });

    it("should report NotFound when the item vanished during a conflict", async () => {
      jest
        .spyOn(catalog.store, "transaction")
        .mockImplementationOnce(async () => {
          await catalog.store.orders.remove(order.id);
          throw new ConflictError("stale write");
        });

      await expect(service.updateQuantity(teaItem().id, 4)).rejects.toThrow(
        NotFoundError
      );
    });
  });

  describe("deleteItem", () => {
    it("should subtract the line total from the order", async () => {
      await service.deleteItem(teaItem().id);

      expect(await totals(order.id)).toEqual({ total: 500, itemSum: 500 });
      expect(await catalog.store.orderItems.findById(teaItem().id)).toBeUndefined();
    });

    it("should never remove the last item of an order", async () => {
      await service.deleteItem(teaItem().id);

      await expect(service.deleteItem(saltItem().id)).rejects.toThrow(
        InvalidOperationError
      );

      // Deleting the whole order is the way out
      await orders.deleteOrder(order.id);
      expect(await catalog.store.orders.count()).toBe(0);
      expect(await catalog.store.orderItems.count()).toBe(0);
    });

    it("should refuse once the edit window has closed", async () => {
      clock.advanceHours(24.5);

      await expect(service.deleteItem(teaItem().id)).rejects.toThrow(
        InvalidOperationError
      );
      expect(await catalog.store.orderItems.count()).toBe(2);
    });
  });

  describe("queries", () => {
    it("should list an order's items with their products", async () => {
      const items = await service.listOrderItems(order.id);

      expect(
        items.map((item) => [item.product?.productName, item.quantity])
      ).toEqual([
        ["Green Tea", 2],
        ["Sea Salt", 1],
      ]);
      await expect(service.listOrderItems(999)).rejects.toThrow(NotFoundError);
    });

    it("should load a single item", async () => {
      const item = await service.getOrderItem(saltItem().id);

      expect(item.product?.productName).toBe("Sea Salt");
      await expect(service.getOrderItem(999)).rejects.toThrow(NotFoundError);
    });
  });
});
