import {
  and,
  asc,
  count,
  desc,
  eq,
  getTableColumns,
  gte,
  ilike,
  inArray,
  isNotNull,
  lte,
  ne,
  or,
  sql,
  AnyColumn,
  SQL,
} from "drizzle-orm";
import type { PgSelect, PgTable } from "drizzle-orm/pg-core";
import {
  customers,
  suppliers,
  products,
  orders,
  orderItems,
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
import type { DatabaseExecutor } from "@/types/database";
import type {
  Changes,
  Collection,
  FindManyOptions,
  Predicate,
  RecordStore,
  SortSpec,
  StoredRecord,
} from "@/types/store";
import {
  AppError,
  ConflictError,
  ForeignKeyConstraintError,
  StorageFailureError,
  UniqueConstraintError,
} from "@/utils/errors";

type ColumnMap<T> = Record<keyof T & string, AnyColumn>;

interface SelectWindow {
  where?: SQL;
  orderBy: SQL[];
  limit?: number;
  offset?: number;
}

/** The typed, table-specific half of a collection. */
interface TableOps<T, TNew> {
  table: PgTable;
  columns: ColumnMap<T>;
  select(window: SelectWindow): Promise<T[]>;
  insert(values: TNew[]): Promise<T[]>;
  update(where: SQL | undefined, changes: Changes<TNew>): Promise<T[]>;
}

interface PgErrorLike {
  code: string;
  constraint?: string;
}

const isPgError = (error: unknown): error is PgErrorLike =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string";

/**
 * Maps driver errors onto the domain taxonomy. Drizzle may wrap the pg error,
 * so the cause is inspected as well.
 */
export const translateStorageError = (error: unknown): Error => {
  if (error instanceof AppError) {
    return error;
  }

  const pgError = isPgError(error)
    ? error
    : error instanceof Error && isPgError(error.cause)
      ? error.cause
      : undefined;

  if (pgError?.code === "23505") {
    return new UniqueConstraintError(pgError.constraint ?? "unknown");
  }
  if (pgError?.code === "23503") {
    return new ForeignKeyConstraintError(pgError.constraint ?? "unknown");
  }
  // serialization_failure / deadlock_detected
  if (pgError?.code === "40001" || pgError?.code === "40P01") {
    return new ConflictError("Concurrent modification detected");
  }

  return new StorageFailureError(
    error instanceof Error ? error.message : "Unexpected storage failure",
    error
  );
};

const guard = async <R>(operation: () => Promise<R>): Promise<R> => {
  try {
    return await operation();
  } catch (error) {
    throw translateStorageError(error);
  }
};

const escapeLike = (term: string): string => term.replace(/[\\%_]/g, "\\$&");

export const compilePredicate = <T>(
  columns: ColumnMap<T>,
  predicate: Predicate<T>
): SQL => {
  switch (predicate.op) {
    case "eq":
      return predicate.value === null
        ? sql`${columns[predicate.field]} is null`
        : eq(columns[predicate.field], predicate.value);
    case "gte":
      return gte(columns[predicate.field], predicate.value);
    case "lte":
      return lte(columns[predicate.field], predicate.value);
    case "contains":
      return ilike(
        columns[predicate.field],
        `%${escapeLike(predicate.value)}%`
      );
    case "in":
      return predicate.values.length === 0
        ? sql`false`
        : inArray(columns[predicate.field], predicate.values);
    case "notEmpty": {
      const column = columns[predicate.field];
      return and(isNotNull(column), ne(column, "")) ?? sql`true`;
    }
    case "any": {
      const branches = predicate.predicates.map((branch) =>
        compilePredicate(columns, branch)
      );
      return or(...branches) ?? sql`false`;
    }
  }
};

export const compileWhere = <T>(
  columns: ColumnMap<T>,
  predicates: Predicate<T>[] = []
): SQL | undefined =>
  predicates.length === 0
    ? undefined
    : and(...predicates.map((predicate) => compilePredicate(columns, predicate)));

const compileOrderBy = <T>(
  columns: ColumnMap<T>,
  orderBy: SortSpec<T>[] = []
): SQL[] =>
  orderBy.map(({ field, direction }) =>
    direction === "asc" ? asc(columns[field]) : desc(columns[field])
  );

export const withWindow = <TQuery extends PgSelect>(
  query: TQuery,
  window: SelectWindow
): TQuery => {
  if (window.limit !== undefined) {
    query.limit(window.limit);
  }
  if (window.offset !== undefined) {
    query.offset(window.offset);
  }
  return query;
};

class PgCollection<T extends StoredRecord, TNew>
  implements Collection<T, TNew>
{
  constructor(
    private readonly executor: DatabaseExecutor,
    private readonly ops: TableOps<T, TNew>
  ) {}

  async insert(values: TNew): Promise<T> {
    const [row] = await this.insertMany([values]);
    return row;
  }

  insertMany(values: TNew[]): Promise<T[]> {
    return guard(() => this.ops.insert(values));
  }

  async findById(id: number): Promise<T | undefined> {
    const [row] = await this.findMany({
      where: [{ op: "eq", field: "id", value: id }],
      limit: 1,
    });
    return row;
  }

  findMany(options: FindManyOptions<T> = {}): Promise<T[]> {
    return guard(() =>
      this.ops.select({
        where: compileWhere(this.ops.columns, options.where),
        orderBy: compileOrderBy(this.ops.columns, options.orderBy),
        limit: options.limit,
        offset: options.offset,
      })
    );
  }

  count(where: Predicate<T>[] = []): Promise<number> {
    return guard(async () => {
      const [result] = await this.executor
        .select({ value: count() })
        .from(this.ops.table)
        .where(compileWhere(this.ops.columns, where));
      return result?.value ?? 0;
    });
  }

  async exists(where: Predicate<T>[]): Promise<boolean> {
    const rows = await this.findMany({ where, limit: 1 });
    return rows.length > 0;
  }

  async update(
    id: number,
    expectedVersion: number,
    changes: Changes<TNew>
  ): Promise<T> {
    const [row] = await guard(() =>
      this.ops.update(
        compileWhere(this.ops.columns, [
          { op: "eq", field: "id", value: id },
          { op: "eq", field: "version", value: expectedVersion },
        ]),
        changes
      )
    );
    if (!row) {
      throw new ConflictError(`Record ${id} was modified or removed`);
    }
    return row;
  }

  remove(id: number): Promise<boolean> {
    return guard(async () => {
      const result = await this.executor
        .delete(this.ops.table)
        .where(
          compileWhere(this.ops.columns, [{ op: "eq", field: "id", value: id }])
        );
      return (result.rowCount ?? 0) > 0;
    });
  }
}

/**
 * Record store backed by postgres through drizzle. Built on either the pool
 * or a transaction; nested transactions become savepoints.
 */
export class PgRecordStore implements RecordStore {
  readonly customers: Collection<Customer, NewCustomer>;
  readonly suppliers: Collection<Supplier, NewSupplier>;
  readonly products: Collection<Product, NewProduct>;
  readonly orders: Collection<Order, NewOrder>;
  readonly orderItems: Collection<OrderItem, NewOrderItem>;

  constructor(private readonly executor: DatabaseExecutor) {
    this.customers = new PgCollection<Customer, NewCustomer>(executor, {
      table: customers,
      columns: getTableColumns(customers),
      select: (window) =>
        withWindow(
          executor
            .select()
            .from(customers)
            .where(window.where)
            .orderBy(...window.orderBy)
            .$dynamic(),
          window
        ),
      insert: (values) => executor.insert(customers).values(values).returning(),
      update: (where, changes) =>
        executor
          .update(customers)
          .set({ ...changes, version: sql`${customers.version} + 1` })
          .where(where)
          .returning(),
    });

    this.suppliers = new PgCollection<Supplier, NewSupplier>(executor, {
      table: suppliers,
      columns: getTableColumns(suppliers),
      select: (window) =>
        withWindow(
          executor
            .select()
            .from(suppliers)
            .where(window.where)
            .orderBy(...window.orderBy)
            .$dynamic(),
          window
        ),
      insert: (values) => executor.insert(suppliers).values(values).returning(),
      update: (where, changes) =>
        executor
          .update(suppliers)
          .set({ ...changes, version: sql`${suppliers.version} + 1` })
          .where(where)
          .returning(),
    });

    this.products = new PgCollection<Product, NewProduct>(executor, {
      table: products,
      columns: getTableColumns(products),
      select: (window) =>
        withWindow(
          executor
            .select()
            .from(products)
            .where(window.where)
            .orderBy(...window.orderBy)
            .$dynamic(),
          window
        ),
      insert: (values) => executor.insert(products).values(values).returning(),
      update: (where, changes) =>
        executor
          .update(products)
          .set({ ...changes, version: sql`${products.version} + 1` })
          .where(where)
          .returning(),
    });

    this.orders = new PgCollection<Order, NewOrder>(executor, {
      table: orders,
      columns: getTableColumns(orders),
      select: (window) =>
        withWindow(
          executor
            .select()
            .from(orders)
            .where(window.where)
            .orderBy(...window.orderBy)
            .$dynamic(),
          window
        ),
      insert: (values) => executor.insert(orders).values(values).returning(),
      update: (where, changes) =>
        executor
          .update(orders)
          .set({ ...changes, version: sql`${orders.version} + 1` })
          .where(where)
          .returning(),
    });

    this.orderItems = new PgCollection<OrderItem, NewOrderItem>(executor, {
      table: orderItems,
      columns: getTableColumns(orderItems),
      select: (window) =>
        withWindow(
          executor
            .select()
            .from(orderItems)
            .where(window.where)
            .orderBy(...window.orderBy)
            .$dynamic(),
          window
        ),
      insert: (values) => executor.insert(orderItems).values(values).returning(),
      update: (where, changes) =>
        executor
          .update(orderItems)
          .set({ ...changes, version: sql`${orderItems.version} + 1` })
          .where(where)
          .returning(),
    });
  }

  transaction<R>(work: (store: RecordStore) => Promise<R>): Promise<R> {
    return this.executor.transaction((tx) => work(new PgRecordStore(tx)));
  }

  async ping(): Promise<void> {
    await guard(() => this.executor.execute(sql`select 1`));
  }
}
