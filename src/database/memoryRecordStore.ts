import {
  CONSTRAINTS,
  Customer,
  NewCustomer,
  Supplier,
  NewSupplier,
  Product,
  NewProduct,
  Order,
  NewOrder,
  OrderItem,
  NewOrderItem,
} from "./schema";
import type {
  Changes,
  Collection,
  FieldValue,
  FindManyOptions,
  Predicate,
  RecordStore,
  SortSpec,
  StoredRecord,
} from "@/types/store";
import {
  ConflictError,
  ForeignKeyConstraintError,
  UniqueConstraintError,
} from "@/utils/errors";

interface CollectionHooks<T> {
  beforeWrite?: (row: T) => void;
  beforeRemove?: (row: T) => void;
  afterRemove?: (row: T) => void;
}

interface CollectionState<T> {
  rows: Map<number, T>;
  nextId: number;
}

const equalsValue = (actual: unknown, expected: FieldValue): boolean => {
  if (expected === null) {
    return actual === null || actual === undefined;
  }
  if (expected instanceof Date) {
    return actual instanceof Date && actual.getTime() === expected.getTime();
  }
  if (typeof expected === "number") {
    return actual !== null && actual !== undefined && Number(actual) === expected;
  }
  return actual === expected;
};

const compareBound = (actual: unknown, bound: number | Date): number | null => {
  if (actual === null || actual === undefined) {
    return null;
  }
  if (bound instanceof Date) {
    return actual instanceof Date ? actual.getTime() - bound.getTime() : null;
  }
  const numeric = Number(actual);
  return Number.isNaN(numeric) ? null : numeric - bound;
};

export const matches = <T>(row: T, predicate: Predicate<T>): boolean => {
  switch (predicate.op) {
    case "eq":
      return equalsValue(row[predicate.field], predicate.value);
    case "gte": {
      const diff = compareBound(row[predicate.field], predicate.value);
      return diff !== null && diff >= 0;
    }
    case "lte": {
      const diff = compareBound(row[predicate.field], predicate.value);
      return diff !== null && diff <= 0;
    }
    case "contains": {
      const actual = row[predicate.field];
      return (
        typeof actual === "string" &&
        actual.toLowerCase().includes(predicate.value.toLowerCase())
      );
    }
    case "in":
      return predicate.values.some((value) =>
        equalsValue(row[predicate.field], value)
      );
    case "notEmpty": {
      const actual = row[predicate.field];
      return typeof actual === "string"
        ? actual.length > 0
        : actual !== null && actual !== undefined;
    }
    case "any":
      return predicate.predicates.some((branch) => matches(row, branch));
  }
};

// NULLs sort last ascending and first descending, as in Postgres.
const compareValues = (a: unknown, b: unknown): number => {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return String(a).localeCompare(String(b));
};

const sortRows = <T>(rows: T[], orderBy: SortSpec<T>[]): T[] =>
  [...rows].sort((left, right) => {
    for (const { field, direction } of orderBy) {
      const result = compareValues(left[field], right[field]);
      if (result !== 0) {
        return direction === "asc" ? result : -result;
      }
    }
    return 0;
  });

const definedOnly = (changes: object): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(changes).filter(([, value]) => value !== undefined)
  );

export class MemoryCollection<T extends StoredRecord, TNew>
  implements Collection<T, TNew>
{
  private rows = new Map<number, T>();
  private nextId = 1;
  hooks: CollectionHooks<T> = {};

  constructor(private readonly build: (values: TNew, id: number) => T) {}

  async insert(values: TNew): Promise<T> {
    const [row] = await this.insertMany([values]);
    return row;
  }

  async insertMany(values: TNew[]): Promise<T[]> {
    const saved = this.snapshot();
    try {
      return values.map((value) => {
        const row = this.build(value, this.nextId);
        this.hooks.beforeWrite?.(row);
        this.rows.set(row.id, row);
        this.nextId++;
        return { ...row };
      });
    } catch (error) {
      this.restore(saved);
      throw error;
    }
  }

  async findById(id: number): Promise<T | undefined> {
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  async findMany(options: FindManyOptions<T> = {}): Promise<T[]> {
    const filtered = this.scan(options.where ?? []);
    const sorted = options.orderBy ? sortRows(filtered, options.orderBy) : filtered;
    const start = options.offset ?? 0;
    const end = options.limit === undefined ? undefined : start + options.limit;
    return sorted.slice(start, end).map((row) => ({ ...row }));
  }

  async count(where: Predicate<T>[] = []): Promise<number> {
    return this.scan(where).length;
  }

  async exists(where: Predicate<T>[]): Promise<boolean> {
    return this.scan(where).length > 0;
  }

  async update(
    id: number,
    expectedVersion: number,
    changes: Changes<TNew>
  ): Promise<T> {
    const current = this.rows.get(id);
    if (!current || current.version !== expectedVersion) {
      throw new ConflictError(`Record ${id} was modified or removed`);
    }

    const updated: T = Object.assign({}, current, definedOnly(changes), {
      version: current.version + 1,
    });
    this.hooks.beforeWrite?.(updated);
    this.rows.set(id, updated);
    return { ...updated };
  }

  async remove(id: number): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row) {
      return false;
    }
    this.hooks.beforeRemove?.(row);
    this.rows.delete(id);
    this.hooks.afterRemove?.(row);
    return true;
  }

  has(id: number): boolean {
    return this.rows.has(id);
  }

  scan(where: Predicate<T>[]): T[] {
    return Array.from(this.rows.values()).filter((row) =>
      where.every((predicate) => matches(row, predicate))
    );
  }

  removeWhere(test: (row: T) => boolean): void {
    for (const [id, row] of this.rows) {
      if (test(row)) {
        this.rows.delete(id);
      }
    }
  }

  snapshot(): CollectionState<T> {
    return {
      rows: new Map(
        Array.from(this.rows, ([id, row]): [number, T] => [id, { ...row }])
      ),
      nextId: this.nextId,
    };
  }

  restore(state: CollectionState<T>): void {
    this.rows = state.rows;
    this.nextId = state.nextId;
  }
}

/**
 * In-process record store with the same integrity rules as the postgres
 * schema: restrictive foreign keys, the order-number unique index and the
 * order -> order item cascade. Single-writer; meant for tests and local runs.
 */
export class MemoryRecordStore implements RecordStore {
  readonly customers = new MemoryCollection<Customer, NewCustomer>(
    (values, id) => ({
      id,
      firstName: values.firstName,
      lastName: values.lastName,
      city: values.city ?? null,
      country: values.country ?? null,
      phone: values.phone ?? null,
      version: 1,
    })
  );

  readonly suppliers = new MemoryCollection<Supplier, NewSupplier>(
    (values, id) => ({
      id,
      companyName: values.companyName,
      contactName: values.contactName ?? null,
      city: values.city ?? null,
      country: values.country ?? null,
      phone: values.phone ?? null,
      fax: values.fax ?? null,
      version: 1,
    })
  );

  readonly products = new MemoryCollection<Product, NewProduct>(
    (values, id) => ({
      id,
      productName: values.productName,
      supplierId: values.supplierId,
      unitPrice: values.unitPrice,
      package: values.package ?? null,
      isDiscontinued: values.isDiscontinued ?? false,
      version: 1,
    })
  );

  readonly orders = new MemoryCollection<Order, NewOrder>((values, id) => ({
    id,
    orderDate: values.orderDate,
    orderNumber: values.orderNumber,
    customerId: values.customerId,
    totalAmount: values.totalAmount,
    version: 1,
  }));

  readonly orderItems = new MemoryCollection<OrderItem, NewOrderItem>(
    (values, id) => ({
      id,
      orderId: values.orderId,
      productId: values.productId,
      unitPrice: values.unitPrice,
      quantity: values.quantity,
      version: 1,
    })
  );

  constructor() {
    this.products.hooks = {
      beforeWrite: (product) =>
        this.requireParent(
          this.suppliers,
          product.supplierId,
          CONSTRAINTS.PRODUCT_SUPPLIER_FK
        ),
      beforeRemove: (product) =>
        this.restrictChildren(
          this.orderItems.scan([
            { op: "eq", field: "productId", value: product.id },
          ]),
          CONSTRAINTS.ORDER_ITEM_PRODUCT_FK
        ),
    };

    this.customers.hooks = {
      beforeRemove: (customer) =>
        this.restrictChildren(
          this.orders.scan([
            { op: "eq", field: "customerId", value: customer.id },
          ]),
          CONSTRAINTS.ORDER_CUSTOMER_FK
        ),
    };

    this.suppliers.hooks = {
      beforeRemove: (supplier) =>
        this.restrictChildren(
          this.products.scan([
            { op: "eq", field: "supplierId", value: supplier.id },
          ]),
          CONSTRAINTS.PRODUCT_SUPPLIER_FK
        ),
    };

    this.orders.hooks = {
      beforeWrite: (order) => {
        this.requireParent(
          this.customers,
          order.customerId,
          CONSTRAINTS.ORDER_CUSTOMER_FK
        );
        const duplicate = this.orders
          .scan([{ op: "eq", field: "orderNumber", value: order.orderNumber }])
          .some((other) => other.id !== order.id);
        if (duplicate) {
          throw new UniqueConstraintError(CONSTRAINTS.ORDER_NUMBER_UNIQUE);
        }
      },
      afterRemove: (order) =>
        this.orderItems.removeWhere((item) => item.orderId === order.id),
    };

    this.orderItems.hooks = {
      beforeWrite: (item) => {
        this.requireParent(
          this.orders,
          item.orderId,
          CONSTRAINTS.ORDER_ITEM_ORDER_FK
        );
        this.requireParent(
          this.products,
          item.productId,
          CONSTRAINTS.ORDER_ITEM_PRODUCT_FK
        );
      },
    };
  }

  async transaction<R>(work: (store: RecordStore) => Promise<R>): Promise<R> {
    const customers = this.customers.snapshot();
    const suppliers = this.suppliers.snapshot();
    const products = this.products.snapshot();
    const orders = this.orders.snapshot();
    const orderItems = this.orderItems.snapshot();

    try {
      return await work(this);
    } catch (error) {
      this.customers.restore(customers);
      this.suppliers.restore(suppliers);
      this.products.restore(products);
      this.orders.restore(orders);
      this.orderItems.restore(orderItems);
      throw error;
    }
  }

  async ping(): Promise<void> {}

  private requireParent(
    parents: { has(id: number): boolean },
    id: number,
    constraint: string
  ): void {
    if (!parents.has(id)) {
      throw new ForeignKeyConstraintError(constraint);
    }
  }

  private restrictChildren(children: unknown[], constraint: string): void {
    if (children.length > 0) {
      throw new ForeignKeyConstraintError(constraint);
    }
  }
}
