import { OrderService } from "../src/services/orderService";
import { ProductService } from "../src/services/productService";
import {
  ConflictError,
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "../src/utils/errors";
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

describe("OrderService", () => {
  let catalog: Catalog;
  let clock: ReturnType<typeof createClock>;
  let service: OrderService;

  beforeEach(async () => {
    jest.clearAllMocks();
    catalog = await createCatalog();
    clock = createClock("2026-03-10T12:00:00.000Z");
    service = new OrderService(catalog.store, { now: clock.now });
  });

  const countRecords = async () => ({
    orders: await catalog.store.orders.count(),
    items: await catalog.store.orderItems.count(),
  });

  describe("createOrder", () => {
    describe("Success Cases", () => {
      it("should total the snapshot prices of every item", async () => {
        const order = await service.createOrder({
          customerId: catalog.customer.id,
          items: [
            { productId: catalog.tea.id, quantity: 2 },
            { productId: catalog.salt.id, quantity: 1 },
          ],
        });

        expect(order.totalAmount).toBe("24.98");
        expect(order.orderDate.toISOString()).toBe("2026-03-10T12:00:00.000Z");
        expect(order.orderNumber).toMatch(/^ORD20260310120000[0-9A-F]{6}$/);
        expect(order.customer?.lastName).toBe("Lopes");
        expect(
          order.items.map((item) => [item.productId, item.unitPrice, item.quantity])
        ).toEqual([
          [catalog.tea.id, "9.99", 2],
          [catalog.salt.id, "5.00", 1],
        ]);
        expect(order.items[0].product?.productName).toBe("Green Tea");
      });

      it("should give every order a distinct order number", async () => {
        const request = {
          customerId: catalog.customer.id,
          items: [{ productId: catalog.tea.id, quantity: 1 }],
        };

        const first = await service.createOrder(request);
        const second = await service.createOrder(request);

        expect(first.orderNumber).not.toBe(second.orderNumber);
      });

      it("should keep the item price when the product price changes later", async () => {
        const products = new ProductService(catalog.store);
        const order = await service.createOrder({
          customerId: catalog.customer.id,
          items: [{ productId: catalog.tea.id, quantity: 3 }],
        });

        await products.updateProductPrice(catalog.tea.id, 12.5);

        const reloaded = await service.getOrder(order.id);
        expect(reloaded.items[0].unitPrice).toBe("9.99");
        expect(reloaded.totalAmount).toBe("29.97");
        expect((await products.getProduct(catalog.tea.id)).unitPrice).toBe("12.50");
      });

      it("should retry with a new number when the generated one is taken", async () => {
        const nextOrderNumber = jest
          .fn()
          .mockReturnValueOnce("ORD-TAKEN")
          .mockReturnValueOnce("ORD-TAKEN")
          .mockReturnValueOnce("ORD-FRESH");
        service = new OrderService(catalog.store, {
          now: clock.now,
          nextOrderNumber,
        });
        const request = {
          customerId: catalog.customer.id,
          items: [{ productId: catalog.salt.id, quantity: 1 }],
        };

        await service.createOrder(request);
        const retried = await service.createOrder(request);

        expect(retried.orderNumber).toBe("ORD-FRESH");
        expect(nextOrderNumber).toHaveBeenCalledTimes(3);
        expect(await countRecords()).toEqual({ orders: 2, items: 2 });
      });
    });

    describe("Failure Cases", () => {
      it("should reject an unknown customer before looking at items", async () => {
        await expect(
          service.createOrder({ customerId: 999, items: [] })
        ).rejects.toThrow(NotFoundError);
      });

      it("should reject an empty item list", async () => {
        await expect(
          service.createOrder({ customerId: catalog.customer.id, items: [] })
        ).rejects.toThrow(InvalidInputError);
      });

      it("should leave nothing behind when a product does not exist", async () => {
        const request = {
          customerId: catalog.customer.id,
          items: [
            { productId: catalog.tea.id, quantity: 1 },
            { productId: 999, quantity: 1 },
          ],
        };

        await expect(service.createOrder(request)).rejects.toThrow(NotFoundError);
        await expect(service.createOrder(request)).rejects.toThrow(NotFoundError);

        expect(await countRecords()).toEqual({ orders: 0, items: 0 });
      });

      it("should refuse discontinued products", async () => {
        await expect(
          service.createOrder({
            customerId: catalog.customer.id,
            items: [
              { productId: catalog.tea.id, quantity: 1 },
              { productId: catalog.retired.id, quantity: 1 },
            ],
          })
        ).rejects.toThrow(InvalidOperationError);

        expect(await countRecords()).toEqual({ orders: 0, items: 0 });
      });

      it("should refuse a quantity below 1", async () => {
        await expect(
          service.createOrder({
            customerId: catalog.customer.id,
            items: [{ productId: catalog.tea.id, quantity: 0 }],
          })
        ).rejects.toThrow(InvalidInputError);
      });

      it("should refuse a quantity the item column cannot hold", async () => {
        await expect(
          service.createOrder({
            customerId: catalog.customer.id,
            items: [{ productId: catalog.tea.id, quantity: 2_147_483_648 }],
          })
        ).rejects.toThrow(
          `Quantity for product ${catalog.tea.id} must be at most 2147483647`
        );
      });

      it.each([
        ["one line", [1_000_000_000]],
        ["the sum of its lines", [500_000_000, 500_000_000]],
      ])("should refuse a total too large to store from %s", async (_label, quantities) => {
        await expect(
          service.createOrder({
            customerId: catalog.customer.id,
            items: quantities.map((quantity) => ({
              productId: catalog.oil.id,
              quantity,
            })),
          })
        ).rejects.toThrow("Order total must be at most 9999999999.99");

        expect(await countRecords()).toEqual({ orders: 0, items: 0 });
      });

      it("should roll back the order when saving its items fails", async () => {
        jest
          .spyOn(catalog.store.orderItems, "insertMany")
          .mockRejectedValueOnce(new Error("disk full"));

        await expect(
          service.createOrder({
            customerId: catalog.customer.id,
            items: [{ productId: catalog.tea.id, quantity: 1 }],
          })
        ).rejects.toThrow("disk full");

        expect(await countRecords()).toEqual({ orders: 0, items: 0 });
      });

      it("should give up after the configured number of collisions", async () => {
        const nextOrderNumber = jest.fn(() => "ORD-TAKEN");
        service = new OrderService(catalog.store, {
          now: clock.now,
          nextOrderNumber,
          orderNumberMaxAttempts: 3,
        });
        const request = {
          customerId: catalog.customer.id,
          items: [{ productId: catalog.salt.id, quantity: 1 }],
        };
        await service.createOrder(request);

        await expect(service.createOrder(request)).rejects.toThrow(ConflictError);

        expect(nextOrderNumber).toHaveBeenCalledTimes(4);
        expect(await countRecords()).toEqual({ orders: 1, items: 1 });
      });
    });
  });

  describe("deleteOrder", () => {
    const placeOrder = () =>
      service.createOrder({
        customerId: catalog.customer.id,
        items: [
          { productId: catalog.tea.id, quantity: 1 },
          { productId: catalog.salt.id, quantity: 2 },
        ],
      });

    it("should remove the order and its items inside the edit window", async () => {
      const order = await placeOrder();
      clock.advanceHours(23);

      await service.deleteOrder(order.id);

      expect(await countRecords()).toEqual({ orders: 0, items: 0 });
    });

    it("should refuse once the edit window has closed", async () => {
      const order = await placeOrder();
      clock.advanceHours(25);

      await expect(service.deleteOrder(order.id)).rejects.toThrow(
        InvalidOperationError
      );
      expect(await countRecords()).toEqual({ orders: 1, items: 2 });
    });

    it("should report a missing order", async () => {
      await expect(service.deleteOrder(42)).rejects.toThrow(NotFoundError);
    });
  });

  describe("queries", () => {
    beforeEach(async () => {
      // Three orders on consecutive days: 9.99, 15.00, 37.50
      clock.set("2026-03-01T09:00:00.000Z");
      await service.createOrder({
        customerId: catalog.customer.id,
        items: [{ productId: catalog.tea.id, quantity: 1 }],
      });
      clock.set("2026-03-02T09:00:00.000Z");
      await service.createOrder({
        customerId: catalog.otherCustomer.id,
        items: [{ productId: catalog.salt.id, quantity: 3 }],
      });
      clock.set("2026-03-03T09:00:00.000Z");
      await service.createOrder({
        customerId: catalog.customer.id,
        items: [{ productId: catalog.oil.id, quantity: 2 }],
      });
    });

    it("should list newest first with page metadata", async () => {
      const page = await service.listOrders({ page: 1, pageSize: 2 });

      expect(page.items.map((order) => order.totalAmount)).toEqual([
        "37.50",
        "15.00",
      ]);
      expect(page.meta).toEqual({
        totalCount: 3,
        page: 1,
        pageSize: 2,
        totalPages: 2,
      });
    });

    it("should return an empty page past the end", async () => {
      const page = await service.listOrders({ page: 5, pageSize: 2 });

      expect(page.items).toEqual([]);
      expect(page.meta.totalCount).toBe(3);
    });

    it("should filter by customer, date and amount", async () => {
      const page = await service.listOrders({
        customerId: catalog.customer.id,
        fromDate: new Date("2026-03-01T00:00:00.000Z"),
        toDate: new Date("2026-03-31T00:00:00.000Z"),
        minAmount: 10,
        maxAmount: 40,
      });

      expect(page.items.map((order) => order.totalAmount)).toEqual(["37.50"]);
    });

    it("should reject inverted ranges", async () => {
      await expect(
        service.listOrders({ minAmount: 50, maxAmount: 10 })
      ).rejects.toThrow(InvalidInputError);
      await expect(
        service.listOrders({
          fromDate: new Date("2026-03-05T00:00:00.000Z"),
          toDate: new Date("2026-03-01T00:00:00.000Z"),
        })
      ).rejects.toThrow(InvalidInputError);
    });

    it("should find an order by its number", async () => {
      const [latest] = (await service.listOrders({})).items;

      const found = await service.getOrderByNumber(latest.orderNumber);

      expect(found.id).toBe(latest.id);
      await expect(service.getOrderByNumber("ORD-MISSING")).rejects.toThrow(
        NotFoundError
      );
    });

    it("should list a customer's orders", async () => {
      const orders = await service.listOrdersByCustomer(catalog.customer.id);

      expect(orders.map((order) => order.totalAmount)).toEqual([
        "37.50",
        "9.99",
      ]);
      await expect(service.listOrdersByCustomer(999)).rejects.toThrow(
        NotFoundError
      );
    });

    it("should list orders placed within the recent window", async () => {
      clock.set("2026-03-04T00:00:00.000Z");

      const recent = await service.listRecentOrders(2);

      expect(recent.map((order) => order.totalAmount)).toEqual([
        "37.50",
        "15.00",
      ]);
    });

    it("should reject a recent window outside 1-365 days", async () => {
      await expect(service.listRecentOrders(0)).rejects.toThrow(
        InvalidInputError
      );
      await expect(service.listRecentOrders(366)).rejects.toThrow(
        InvalidInputError
      );
    });
  });
});
