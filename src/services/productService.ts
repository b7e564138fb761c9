import { recordStore } from "@/database";
import type { NewProduct, Product, Supplier } from "@/database/schema";
import { logger } from "@/monitoring/logger";
import {
  FilterBuilder,
  normalizeSearchTerm,
  SEARCH_LIMIT,
  validatePositiveId,
  validateRange,
} from "@/query/filters";
import { paginate } from "@/query/pagination";
import type { Changes, Predicate, RecordStore } from "@/types/store";
import type {
  Page,
  ProductInput,
  ProductListQuery,
  ProductWithSupplier,
} from "@/types";
import {
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "@/utils/errors";
import {
  fromCents,
  MAX_UNIT_PRICE_CENTS,
  MIN_UNIT_PRICE_CENTS,
  toCents,
} from "@/utils/money";
import { withConflictRecheck } from "./concurrency";

const BY_NAME = [
  { field: "productName", direction: "asc" },
  { field: "id", direction: "asc" },
] as const;

// Checked after rounding to cents, the precision the price is stored at.
const toPrice = (unitPrice: number): string => {
  const cents = Number.isFinite(unitPrice) ? toCents(unitPrice) : Number.NaN;
  if (!(cents >= MIN_UNIT_PRICE_CENTS)) {
    throw new InvalidInputError(
      `Unit price must be at least ${fromCents(MIN_UNIT_PRICE_CENTS)}`
    );
  }
  if (cents > MAX_UNIT_PRICE_CENTS) {
    throw new InvalidInputError(
      `Unit price must be at most ${fromCents(MAX_UNIT_PRICE_CENTS)}`
    );
  }
  return fromCents(cents);
};

export class ProductService {
  constructor(private readonly store: RecordStore) {}

  async listProducts(
    query: ProductListQuery = {}
  ): Promise<Page<ProductWithSupplier>> {
    validatePositiveId("Supplier ID", query.supplierId);
    validateRange("price", query.minPrice, query.maxPrice);

    const where = new FilterBuilder<Product>()
      .equals("supplierId", query.supplierId)
      .atLeast("unitPrice", query.minPrice)
      .atMost("unitPrice", query.maxPrice)
      .equals("isDiscontinued", query.isDiscontinued)
      .add(await this.searchPredicate(query.search))
      .build();

    const page = await paginate(this.store.products, {
      where,
      orderBy: [{ field: "productName", direction: "asc" }],
      page: query,
    });

    return { items: await this.withSuppliers(page.items), meta: page.meta };
  }

  async getProduct(id: number): Promise<ProductWithSupplier> {
    const product = await this.requireProduct(id);
    const [detailed] = await this.withSuppliers([product]);
    return detailed;
  }

  async listActiveProducts(): Promise<ProductWithSupplier[]> {
    return this.findWithSuppliers([
      { op: "eq", field: "isDiscontinued", value: false },
    ]);
  }

  async listDiscontinuedProducts(): Promise<ProductWithSupplier[]> {
    return this.findWithSuppliers([
      { op: "eq", field: "isDiscontinued", value: true },
    ]);
  }

  async listProductsBySupplier(
    supplierId: number
  ): Promise<ProductWithSupplier[]> {
    validatePositiveId("Supplier ID", supplierId);
    await this.requireSupplier(supplierId);

    return this.findWithSuppliers([
      { op: "eq", field: "supplierId", value: supplierId },
    ]);
  }

  async searchProducts(term: string): Promise<ProductWithSupplier[]> {
    const search = normalizeSearchTerm(term);
    const products = await this.store.products.findMany({
      where: new FilterBuilder<Product>()
        .add(await this.searchPredicate(search))
        .build(),
      orderBy: [...BY_NAME],
      limit: SEARCH_LIMIT,
    });
    return this.withSuppliers(products);
  }

  async createProduct(
    input: ProductInput,
    correlationId?: string
  ): Promise<ProductWithSupplier> {
    const values = await this.toRecord(input);
    const product = await this.store.products.insert(values);

    logger
      .child({ correlationId, productId: product.id })
      .info("Product created", { supplierId: product.supplierId });

    return this.getProduct(product.id);
  }

  async updateProduct(
    id: number,
    input: ProductInput,
    correlationId?: string
  ): Promise<ProductWithSupplier> {
    const current = await this.requireProduct(id);
    const changes = await this.toRecord(input);

    await this.writeVersioned(current, changes);

    logger.child({ correlationId, productId: id }).info("Product updated");

    return this.getProduct(id);
  }

  /** Existing order items keep the price they were created with. */
  async updateProductPrice(
    id: number,
    unitPrice: number,
    correlationId?: string
  ): Promise<ProductWithSupplier> {
    const price = toPrice(unitPrice);
    const current = await this.requireProduct(id);

    await this.writeVersioned(current, { unitPrice: price });

    logger
      .child({ correlationId, productId: id })
      .info("Product price updated", {
        previousPrice: current.unitPrice,
        unitPrice: price,
      });

    return this.getProduct(id);
  }

  discontinueProduct(id: number, correlationId?: string): Promise<void> {
    return this.setDiscontinued(id, true, correlationId);
  }

  reactivateProduct(id: number, correlationId?: string): Promise<void> {
    return this.setDiscontinued(id, false, correlationId);
  }

  async deleteProduct(id: number, correlationId?: string): Promise<void> {
    const contextLogger = logger.child({ correlationId, productId: id });

    await this.requireProduct(id);

    const isOrdered = await this.store.orderItems.exists([
      { op: "eq", field: "productId", value: id },
    ]);
    if (isOrdered) {
      contextLogger.warn("Product deletion blocked by existing order items");
      throw new InvalidOperationError(
        "Cannot delete product that has been ordered. Discontinue it instead"
      );
    }

    const removed = await this.store.products.remove(id);
    if (!removed) {
      throw new NotFoundError(`Product with ID ${id} no longer exists`);
    }

    contextLogger.info("Product deleted");
  }

  private async setDiscontinued(
    id: number,
    isDiscontinued: boolean,
    correlationId?: string
  ): Promise<void> {
    const current = await this.requireProduct(id);
    if (current.isDiscontinued === isDiscontinued) {
      throw new InvalidOperationError(
        isDiscontinued
          ? "Product is already discontinued"
          : "Product is already active"
      );
    }

    await this.writeVersioned(current, { isDiscontinued });

    logger
      .child({ correlationId, productId: id })
      .info(isDiscontinued ? "Product discontinued" : "Product reactivated");
  }

  private writeVersioned(
    current: Product,
    changes: Changes<NewProduct>
  ): Promise<Product> {
    return withConflictRecheck(
      "Product",
      () =>
        this.store.products.exists([
          { op: "eq", field: "id", value: current.id },
        ]),
      () => this.store.products.update(current.id, current.version, changes)
    );
  }

  private async toRecord(input: ProductInput): Promise<NewProduct> {
    const productName = input.productName.trim();
    if (!productName) {
      throw new InvalidInputError("Product name is required");
    }
    const unitPrice = toPrice(input.unitPrice);
    validatePositiveId("Supplier ID", input.supplierId);
    await this.requireSupplier(input.supplierId);

    return {
      productName,
      supplierId: input.supplierId,
      unitPrice,
      package: input.package?.trim() || null,
      isDiscontinued: input.isDiscontinued,
    };
  }

  /** Name or package contains the term, or the supplier's company name does. */
  private async searchPredicate(
    term: string | undefined
  ): Promise<Predicate<Product> | undefined> {
    const search = term?.trim();
    if (!search) {
      return undefined;
    }

    const suppliers = await this.store.suppliers.findMany({
      where: [{ op: "contains", field: "companyName", value: search }],
    });

    return {
      op: "any",
      predicates: [
        { op: "contains", field: "productName", value: search },
        { op: "contains", field: "package", value: search },
        {
          op: "in",
          field: "supplierId",
          values: suppliers.map((supplier) => supplier.id),
        },
      ],
    };
  }

  private async findWithSuppliers(
    where: Predicate<Product>[]
  ): Promise<ProductWithSupplier[]> {
    const products = await this.store.products.findMany({
      where,
      orderBy: [...BY_NAME],
    });
    return this.withSuppliers(products);
  }

  private async withSuppliers(
    products: Product[]
  ): Promise<ProductWithSupplier[]> {
    const supplierIds = Array.from(
      new Set(products.map((product) => product.supplierId))
    );
    const suppliers =
      supplierIds.length === 0
        ? []
        : await this.store.suppliers.findMany({
            where: [{ op: "in", field: "id", values: supplierIds }],
          });
    const byId = new Map(
      suppliers.map((supplier): [number, Supplier] => [supplier.id, supplier])
    );

    return products.map((product) => ({
      ...product,
      supplier: byId.get(product.supplierId) ?? null,
    }));
  }

  private async requireProduct(id: number): Promise<Product> {
    const product = await this.store.products.findById(id);
    if (!product) {
      throw new NotFoundError(`Product with ID ${id} not found`);
    }
    return product;
  }

  private async requireSupplier(id: number): Promise<Supplier> {
    const supplier = await this.store.suppliers.findById(id);
    if (!supplier) {
      throw new NotFoundError(`Supplier with ID ${id} not found`);
    }
    return supplier;
  }
}

export const productService = new ProductService(recordStore);
