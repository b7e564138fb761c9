import seedData from "./seed-data.json";
import { logger } from "@/monitoring/logger";
import { customerService } from "@/services/customerService";
import { orderService } from "@/services/orderService";
import { productService } from "@/services/productService";
import { supplierService } from "@/services/supplierService";
import { closeRecordStore } from "./index";

const lookup = <T>(items: Map<string, T>, key: string): T => {
  const item = items.get(key);
  if (item === undefined) {
    throw new Error(`Seed data references unknown entry "${key}"`);
  }
  return item;
};

/**
 * Loads sample records through the services, so every business rule applies.
 * Expects an empty schema (`npm run db:push`).
 */
const seedDatabase = async (): Promise<void> => {
  logger.info("Seeding database...");

  const suppliers = new Map<string, number>();
  for (const input of seedData.suppliers) {
    const supplier = await supplierService.createSupplier(input);
    suppliers.set(supplier.companyName, supplier.id);
  }

  const products = new Map<string, number>();
  for (const { supplier, ...input } of seedData.products) {
    const product = await productService.createProduct({
      ...input,
      supplierId: lookup(suppliers, supplier),
    });
    products.set(product.productName, product.id);
  }

  const customers = new Map<string, number>();
  for (const input of seedData.customers) {
    const customer = await customerService.createCustomer(input);
    customers.set(customer.lastName, customer.id);
  }

  for (const order of seedData.orders) {
    await orderService.createOrder({
      customerId: lookup(customers, order.customer),
      items: order.items.map((item) => ({
        productId: lookup(products, item.product),
        quantity: item.quantity,
      })),
    });
  }

  logger.info("Database seeded successfully", {
    suppliers: suppliers.size,
    products: products.size,
    customers: customers.size,
    orders: seedData.orders.length,
  });
};

if (require.main === module) {
  seedDatabase()
    .then(() => closeRecordStore())
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error("Database seeding failed", { error });
      process.exit(1);
    });
}

export { seedDatabase };
