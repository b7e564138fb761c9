import type {
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
} from "@/database/schema";

export type FieldValue = string | number | boolean | Date | null;

export type FieldOf<T> = keyof T & string;

/**
 * Storage-neutral filter tree. The postgres driver compiles it to SQL and the
 * in-process driver evaluates it row by row; both must agree on semantics:
 *
 * - `contains` is a case-insensitive substring match; null fields never match.
 * - `gte` / `lte` compare numerically when the value is a number, so decimal
 *   columns (stored as strings) can be ranged with plain numbers.
 * - `in` with no values and `any` with no branches match nothing.
 */
export type Predicate<T> =
  | { op: "eq"; field: FieldOf<T>; value: FieldValue }
  | { op: "gte"; field: FieldOf<T>; value: number | Date }
  | { op: "lte"; field: FieldOf<T>; value: number | Date }
  | { op: "contains"; field: FieldOf<T>; value: string }
  | { op: "in"; field: FieldOf<T>; values: FieldValue[] }
  | { op: "notEmpty"; field: FieldOf<T> }
  | { op: "any"; predicates: Predicate<T>[] };

export type SortDirection = "asc" | "desc";

export interface SortSpec<T> {
  field: FieldOf<T>;
  direction: SortDirection;
}

export interface FindManyOptions<T> {
  where?: Predicate<T>[];
  orderBy?: SortSpec<T>[];
  limit?: number;
  offset?: number;
}

export interface StoredRecord {
  id: number;
  version: number;
}

export type Changes<TNew> = Partial<Omit<TNew, "id" | "version">>;

export interface Collection<T extends StoredRecord, TNew> {
  insert(values: TNew): Promise<T>;
  insertMany(values: TNew[]): Promise<T[]>;
  findById(id: number): Promise<T | undefined>;
  findMany(options?: FindManyOptions<T>): Promise<T[]>;
  count(where?: Predicate<T>[]): Promise<number>;
  exists(where: Predicate<T>[]): Promise<boolean>;
  /**
   * Applies `changes` only if the stored row still has `expectedVersion`, and
   * bumps the version. Throws `ConflictError` when no row matched.
   */
  update(id: number, expectedVersion: number, changes: Changes<TNew>): Promise<T>;
  /** Returns false when there was nothing to delete. */
  remove(id: number): Promise<boolean>;
}

export interface RecordStore {
  readonly customers: Collection<Customer, NewCustomer>;
  readonly suppliers: Collection<Supplier, NewSupplier>;
  readonly products: Collection<Product, NewProduct>;
  readonly orders: Collection<Order, NewOrder>;
  readonly orderItems: Collection<OrderItem, NewOrderItem>;
  /** Runs `work` atomically; any rejection rolls every write back. */
  transaction<R>(work: (store: RecordStore) => Promise<R>): Promise<R>;
  ping(): Promise<void>;
}
