import { recordStore } from "@/database";
import type { Customer, NewCustomer } from "@/database/schema";
import { logger } from "@/monitoring/logger";
import { FilterBuilder } from "@/query/filters";
import { paginate } from "@/query/pagination";
import { distinctValues } from "@/analytics/aggregations";
import type { RecordStore } from "@/types/store";
import type { CustomerInput, CustomerListQuery, Page } from "@/types";
import {
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "@/utils/errors";
import { withConflictRecheck } from "./concurrency";

const optional = (value: string | null | undefined): string | null =>
  value?.trim() || null;

const toRecord = (input: CustomerInput): NewCustomer => {
  const firstName = input.firstName.trim();
  const lastName = input.lastName.trim();
  if (!firstName || !lastName) {
    throw new InvalidInputError("First name and last name are required");
  }
  return {
    firstName,
    lastName,
    city: optional(input.city),
    country: optional(input.country),
    phone: optional(input.phone),
  };
};

export class CustomerService {
  constructor(private readonly store: RecordStore) {}

  listCustomers(query: CustomerListQuery = {}): Promise<Page<Customer>> {
    const where = new FilterBuilder<Customer>()
      .contains("country", query.country)
      .contains("city", query.city)
      .containsAny(["firstName", "lastName", "phone"], query.search)
      .build();

    return paginate(this.store.customers, {
      where,
      orderBy: [
        { field: "lastName", direction: "asc" },
        { field: "firstName", direction: "asc" },
      ],
      page: query,
    });
  }

  async getCustomer(id: number): Promise<Customer> {
    const customer = await this.store.customers.findById(id);
    if (!customer) {
      throw new NotFoundError(`Customer with ID ${id} not found`);
    }
    return customer;
  }

  async listCountries(): Promise<string[]> {
    const customers = await this.store.customers.findMany({
      where: [{ op: "notEmpty", field: "country" }],
    });
    return distinctValues(customers.map((customer) => customer.country));
  }

  async listCities(country?: string): Promise<string[]> {
    const where = new FilterBuilder<Customer>()
      .add({ op: "notEmpty", field: "city" })
      .contains("country", country)
      .build();
    const customers = await this.store.customers.findMany({ where });
    return distinctValues(customers.map((customer) => customer.city));
  }

  async createCustomer(
    input: CustomerInput,
    correlationId?: string
  ): Promise<Customer> {
    const customer = await this.store.customers.insert(toRecord(input));

    logger
      .child({ correlationId, customerId: customer.id })
      .info("Customer created");

    return customer;
  }

  async updateCustomer(
    id: number,
    input: CustomerInput,
    correlationId?: string
  ): Promise<Customer> {
    const current = await this.getCustomer(id);
    const changes = toRecord(input);

    const updated = await withConflictRecheck(
      "Customer",
      () => this.store.customers.exists([{ op: "eq", field: "id", value: id }]),
      () => this.store.customers.update(id, current.version, changes)
    );

    logger
      .child({ correlationId, customerId: id })
      .info("Customer updated", { version: updated.version });

    return updated;
  }

  async deleteCustomer(id: number, correlationId?: string): Promise<void> {
    const contextLogger = logger.child({ correlationId, customerId: id });

    await this.getCustomer(id);

    const hasOrders = await this.store.orders.exists([
      { op: "eq", field: "customerId", value: id },
    ]);
    if (hasOrders) {
      contextLogger.warn("Customer deletion blocked by existing orders");
      throw new InvalidOperationError(
        "Cannot delete customer with existing orders"
      );
    }

    const removed = await this.store.customers.remove(id);
    if (!removed) {
      throw new NotFoundError(`Customer with ID ${id} no longer exists`);
    }

    contextLogger.info("Customer deleted");
  }
}

export const customerService = new CustomerService(recordStore);
