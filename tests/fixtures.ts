import { MemoryRecordStore } from "../src/database/memoryRecordStore";
import type { Customer, Product, Supplier } from "../src/database/schema";

export interface Catalog {
  store: MemoryRecordStore;
  customer: Customer;
  otherCustomer: Customer;
  supplier: Supplier;
  otherSupplier: Supplier;
  tea: Product;
  salt: Product;
  oil: Product;
  retired: Product;
}

/** A small catalog: two customers, two suppliers, four products. */
export const createCatalog = async (): Promise<Catalog> => {
  const store = new MemoryRecordStore();

  const supplier = await store.suppliers.insert({
    companyName: "Harbor Goods",
    contactName: "Ben Ortiz",
    city: "Valencia",
    country: "Spain",
    phone: "555-0102",
  });
  const otherSupplier = await store.suppliers.insert({
    companyName: "Alpine Pantry",
    city: "Graz",
    country: "Austria",
  });

  const customer = await store.customers.insert({
    firstName: "Maria",
    lastName: "Lopes",
    city: "Porto",
    country: "Portugal",
    phone: "555-0201",
  });
  const otherCustomer = await store.customers.insert({
    firstName: "Jonas",
    lastName: "Keller",
    city: "Vienna",
    country: "Austria",
  });

  const tea = await store.products.insert({
    productName: "Green Tea",
    supplierId: supplier.id,
    unitPrice: "9.99",
    package: "20 bags",
  });
  const salt = await store.products.insert({
    productName: "Sea Salt",
    supplierId: supplier.id,
    unitPrice: "5.00",
    package: "1 kg bag",
  });
  const oil = await store.products.insert({
    productName: "Pumpkin Seed Oil",
    supplierId: otherSupplier.id,
    unitPrice: "18.75",
  });
  const retired = await store.products.insert({
    productName: "Rye Crackers",
    supplierId: otherSupplier.id,
    unitPrice: "3.20",
    isDiscontinued: true,
  });

  return {
    store,
    customer,
    otherCustomer,
    supplier,
    otherSupplier,
    tea,
    salt,
    oil,
    retired,
  };
};

/** A clock the test can move. */
export const createClock = (start: string) => {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    set: (iso: string) => {
      current = new Date(iso);
    },
    advanceHours: (hours: number) => {
      current = new Date(current.getTime() + hours * 60 * 60 * 1000);
    },
  };
};
