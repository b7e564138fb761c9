import {
  pgTable,
  serial,
  varchar,
  timestamp,
  boolean,
  integer,
  decimal,
  index,
} from "drizzle-orm/pg-core";

export const customers = pgTable("customers", {
  id: serial("id").primaryKey(),
  firstName: varchar("first_name", { length: 50 }).notNull(),
  lastName: varchar("last_name", { length: 50 }).notNull(),
  city: varchar("city", { length: 100 }),
  country: varchar("country", { length: 50 }),
  phone: varchar("phone", { length: 20 }),
  version: integer("version").default(1).notNull(),
});

export const suppliers = pgTable("suppliers", {
  id: serial("id").primaryKey(),
  companyName: varchar("company_name", { length: 100 }).notNull(),
  contactName: varchar("contact_name", { length: 100 }),
  city: varchar("city", { length: 100 }),
  country: varchar("country", { length: 50 }),
  phone: varchar("phone", { length: 20 }),
  fax: varchar("fax", { length: 20 }),
  version: integer("version").default(1).notNull(),
});

export const products = pgTable("products", {
  id: serial("id").primaryKey(),
  productName: varchar("product_name", { length: 100 }).notNull(),
  supplierId: integer("supplier_id")
    .notNull()
    .references(() => suppliers.id, { onDelete: "restrict" }),
  unitPrice: decimal("unit_price", { precision: 10, scale: 2 }).notNull(),
  package: varchar("package", { length: 100 }),
  isDiscontinued: boolean("is_discontinued").default(false).notNull(),
  version: integer("version").default(1).notNull(),
});

export const orders = pgTable("orders", {
  id: serial("id").primaryKey(),
  orderDate: timestamp("order_date", { withTimezone: true }).notNull(),
  orderNumber: varchar("order_number", { length: 32 }).notNull().unique(),
  customerId: integer("customer_id")
    .notNull()
    .references(() => customers.id, { onDelete: "restrict" }),
  totalAmount: decimal("total_amount", { precision: 12, scale: 2 }).notNull(),
  version: integer("version").default(1).notNull(),
});

export const orderItems = pgTable(
  "order_items",
  {
    id: serial("id").primaryKey(),
    orderId: integer("order_id")
      .notNull()
      .references(() => orders.id, { onDelete: "cascade" }),
    productId: integer("product_id")
      .notNull()
      .references(() => products.id, { onDelete: "restrict" }),
    unitPrice: decimal("unit_price", { precision: 10, scale: 2 }).notNull(),
    quantity: integer("quantity").notNull(),
    version: integer("version").default(1).notNull(),
  },
  (t) => ({
    orderProductIdx: index("order_items_order_product_idx").on(
      t.orderId,
      t.productId
    ),
  })
);

// Constraint names as Postgres reports them; the in-process store uses the same.
export const CONSTRAINTS = {
  ORDER_NUMBER_UNIQUE: "orders_order_number_unique",
  PRODUCT_SUPPLIER_FK: "products_supplier_id_suppliers_id_fk",
  ORDER_CUSTOMER_FK: "orders_customer_id_customers_id_fk",
  ORDER_ITEM_ORDER_FK: "order_items_order_id_orders_id_fk",
  ORDER_ITEM_PRODUCT_FK: "order_items_product_id_products_id_fk",
} as const;

export type Customer = typeof customers.$inferSelect;
export type NewCustomer = typeof customers.$inferInsert;
export type Supplier = typeof suppliers.$inferSelect;
export type NewSupplier = typeof suppliers.$inferInsert;
export type Product = typeof products.$inferSelect;
export type NewProduct = typeof products.$inferInsert;
export type Order = typeof orders.$inferSelect;
export type NewOrder = typeof orders.$inferInsert;
export type OrderItem = typeof orderItems.$inferSelect;
export type NewOrderItem = typeof orderItems.$inferInsert;
