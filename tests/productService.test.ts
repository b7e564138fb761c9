import { ProductService } from "../src/services/productService";
import {
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "../src/utils/errors";
import { Catalog, createCatalog } from "./fixtures";

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

describe("ProductService", () => {
  let catalog: Catalog;
  let service: ProductService;

  beforeEach(async () => {
    jest.clearAllMocks();
    catalog = await createCatalog();
    service = new ProductService(catalog.store);
  });

  const names = (products: { productName: string }[]) =>
    products.map((product) => product.productName);

  const placeOrderFor = async (productId: number) => {
    const order = await catalog.store.orders.insert({
      orderDate: new Date("2026-01-05T10:00:00.000Z"),
      orderNumber: "ORD-FIXTURE",
      customerId: catalog.customer.id,
      totalAmount: "9.99",
    });
    await catalog.store.orderItems.insert({
      orderId: order.id,
      productId,
      unitPrice: "9.99",
      quantity: 1,
    });
  };

  describe("listProducts", () => {
    it("should list every product by name with its supplier", async () => {
      const page = await service.listProducts();

      expect(names(page.items)).toEqual([
        "Green Tea",
        "Pumpkin Seed Oil",
        "Rye Crackers",
        "Sea Salt",
      ]);
      expect(page.items[1].supplier?.companyName).toBe("Alpine Pantry");
      expect(page.meta).toEqual({
        totalCount: 4,
        page: 1,
        pageSize: 10,
        totalPages: 1,
      });
    });

    it("should filter by supplier and availability", async () => {
      const page = await service.listProducts({
        supplierId: catalog.otherSupplier.id,
        isDiscontinued: false,
      });

      expect(names(page.items)).toEqual(["Pumpkin Seed Oil"]);
    });

    it("should filter by an inclusive price range", async () => {
      const page = await service.listProducts({ minPrice: 5, maxPrice: 9.99 });

      expect(names(page.items)).toEqual(["Green Tea", "Sea Salt"]);
    });

    it("should match the search term against the supplier name", async () => {
      const page = await service.listProducts({ search: "alpine" });

      expect(names(page.items)).toEqual(["Pumpkin Seed Oil", "Rye Crackers"]);
    });

    it("should match the search term against the package", async () => {
      const page = await service.listProducts({ search: "BAG" });

      expect(names(page.items)).toEqual(["Green Tea", "Sea Salt"]);
    });

    it("should reject an inverted price range", async () => {
      await expect(
        service.listProducts({ minPrice: 20, maxPrice: 10 })
      ).rejects.toThrow("Minimum price cannot be greater than maximum price");
    });

    it("should reject a negative price bound", async () => {
      await expect(service.listProducts({ minPrice: -1 })).rejects.toThrow(
        InvalidInputError
      );
    });

    it("should reject a supplier id below 1", async () => {
      await expect(service.listProducts({ supplierId: 0 })).rejects.toThrow(
        "Supplier ID must be a positive integer"
      );
    });
  });

  describe("queries", () => {
    it("should split active and discontinued products", async () => {
      expect(names(await service.listActiveProducts())).toEqual([
        "Green Tea",
        "Pumpkin Seed Oil",
        "Sea Salt",
      ]);
      expect(names(await service.listDiscontinuedProducts())).toEqual([
        "Rye Crackers",
      ]);
    });

    it("should list a supplier's products", async () => {
      const products = await service.listProductsBySupplier(catalog.supplier.id);

      expect(names(products)).toEqual(["Green Tea", "Sea Salt"]);
      await expect(service.listProductsBySupplier(999)).rejects.toThrow(
        NotFoundError
      );
    });

    it("should load a product with its supplier", async () => {
      const product = await service.getProduct(catalog.oil.id);

      expect(product.unitPrice).toBe("18.75");
      expect(product.supplier?.companyName).toBe("Alpine Pantry");
      await expect(service.getProduct(999)).rejects.toThrow(NotFoundError);
    });

    it("should search by name", async () => {
      expect(names(await service.searchProducts(" tea "))).toEqual([
        "Green Tea",
      ]);
    });

    it("should reject a blank or one-character search term", async () => {
      await expect(service.searchProducts("   ")).rejects.toThrow(
        "Search term is required"
      );
      await expect(service.searchProducts("t")).rejects.toThrow(
        "Search term must be at least 2 characters"
      );
    });
  });

  describe("createProduct", () => {
    it("should store the price with two decimals", async () => {
      const product = await service.createProduct({
        productName: "  Smoked Paprika ",
        supplierId: catalog.supplier.id,
        unitPrice: 3.5,
        package: " 100 g tin ",
      });

      expect(product).toMatchObject({
        productName: "Smoked Paprika",
        unitPrice: "3.50",
        package: "100 g tin",
        isDiscontinued: false,
        version: 1,
      });
      expect(product.supplier?.id).toBe(catalog.supplier.id);
    });

    it("should require an existing supplier", async () => {
      await expect(
        service.createProduct({
          productName: "Smoked Paprika",
          supplierId: 999,
          unitPrice: 3.5,
        })
      ).rejects.toThrow(NotFoundError);
    });

    it.each([0, -2.5, 0.004])("should reject a unit price of %p", async (unitPrice) => {
      await expect(
        service.createProduct({
          productName: "Smoked Paprika",
          supplierId: catalog.supplier.id,
          unitPrice,
        })
      ).rejects.toThrow("Unit price must be at least 0.01");
    });

    it("should reject a unit price beyond the stored precision", async () => {
      await expect(
        service.createProduct({
          productName: "Smoked Paprika",
          supplierId: catalog.supplier.id,
          unitPrice: 100_000_000,
        })
      ).rejects.toThrow("Unit price must be at most 99999999.99");
    });

    it("should accept the smallest and largest storable prices", async () => {
      const cheapest = await service.createProduct({
        productName: "Paper Bag",
        supplierId: catalog.supplier.id,
        unitPrice: 0.01,
      });
      const dearest = await service.createProduct({
        productName: "Aged Balsamic",
        supplierId: catalog.supplier.id,
        unitPrice: 99_999_999.99,
      });

      expect(cheapest.unitPrice).toBe("0.01");
      expect(dearest.unitPrice).toBe("99999999.99");
    });
  });

  describe("updates", () => {
    it("should keep the discontinued flag when the update leaves it out", async () => {
      const updated = await service.updateProduct(catalog.retired.id, {
        productName: "Rye Crisps",
        supplierId: catalog.otherSupplier.id,
        unitPrice: 3.4,
      });

      expect(updated).toMatchObject({
        productName: "Rye Crisps",
        unitPrice: "3.40",
        isDiscontinued: true,
        version: 2,
      });
    });

    it("should change only the price", async () => {
      const updated = await service.updateProductPrice(catalog.salt.id, 5.25);

      expect(updated.unitPrice).toBe("5.25");
      expect(updated.productName).toBe("Sea Salt");
      await expect(
        service.updateProductPrice(catalog.salt.id, 0)
      ).rejects.toThrow(InvalidInputError);
      await expect(
        service.updateProductPrice(catalog.salt.id, 0.004)
      ).rejects.toThrow("Unit price must be at least 0.01");
      expect((await service.getProduct(catalog.salt.id)).unitPrice).toBe("5.25");
    });

    it("should toggle availability once in each direction", async () => {
      await service.discontinueProduct(catalog.tea.id);
      await expect(service.discontinueProduct(catalog.tea.id)).rejects.toThrow(
        "Product is already discontinued"
      );

      await service.reactivateProduct(catalog.retired.id);
      await expect(service.reactivateProduct(catalog.salt.id)).rejects.toThrow(
        "Product is already active"
      );

      expect(names(await service.listDiscontinuedProducts())).toEqual([
        "Green Tea",
      ]);
    });
  });

  describe("deleteProduct", () => {
    it("should delete a product nobody ordered", async () => {
      await service.deleteProduct(catalog.salt.id);

      await expect(service.getProduct(catalog.salt.id)).rejects.toThrow(
        NotFoundError
      );
    });

    it("should refuse to delete an ordered product", async () => {
      await placeOrderFor(catalog.tea.id);

      await expect(service.deleteProduct(catalog.tea.id)).rejects.toThrow(
        InvalidOperationError
      );
      expect(await catalog.store.products.count()).toBe(4);
    });
  });
});
