import { getTableColumns } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import {
  compilePredicate,
  translateStorageError,
} from "../src/database/pgRecordStore";
import { customers, Customer } from "../src/database/schema";
import {
  ConflictError,
  ForeignKeyConstraintError,
  NotFoundError,
  StorageFailureError,
  UniqueConstraintError,
} from "../src/utils/errors";

describe("translateStorageError", () => {
  it("should map unique violations with their constraint", () => {
    const translated = translateStorageError({
      code: "23505",
      constraint: "orders_order_number_unique",
    });

    expect(translated).toBeInstanceOf(UniqueConstraintError);
    expect(translated).toMatchObject({
      constraint: "orders_order_number_unique",
    });
  });

  it("should look through a wrapping error to the driver cause", () => {
    const wrapped = new Error("insert failed", {
      cause: { code: "23503", constraint: "orders_customer_id_customers_id_fk" },
    });

    const translated = translateStorageError(wrapped);

    expect(translated).toBeInstanceOf(ForeignKeyConstraintError);
    expect(translated).toMatchObject({
      constraint: "orders_customer_id_customers_id_fk",
    });
  });

  it.each(["40001", "40P01"])("should map %s to a conflict", (code) => {
    const translated = translateStorageError({ code });

    expect(translated).toBeInstanceOf(ConflictError);
    expect(translated).not.toBeInstanceOf(UniqueConstraintError);
  });

  it("should pass domain errors through untouched", () => {
    const error = new NotFoundError("Order with ID 3 not found");

    expect(translateStorageError(error)).toBe(error);
  });

  it("should wrap anything else as a storage failure", () => {
    const cause = new Error("connection terminated");

    const translated = translateStorageError(cause);

    expect(translated).toBeInstanceOf(StorageFailureError);
    expect(translated).toMatchObject({
      message: "connection terminated",
      originalError: cause,
      statusCode: 500,
    });
    expect(translateStorageError("socket hang up").message).toBe(
      "Unexpected storage failure"
    );
  });
});

describe("compilePredicate", () => {
  const dialect = new PgDialect();
  const columns = getTableColumns(customers);

  it("should escape wildcards in contains terms", () => {
    const query = dialect.sqlToQuery(
      compilePredicate<Customer>(columns, {
        op: "contains",
        field: "phone",
        value: "50%_off",
      })
    );

    expect(query.params).toEqual(["%50\\%\\_off%"]);
  });

  it("should compile an empty in-list to false", () => {
    const query = dialect.sqlToQuery(
      compilePredicate<Customer>(columns, { op: "in", field: "id", values: [] })
    );

    expect(query).toEqual({ sql: "false", params: [] });
  });
});
