import { recordStore } from "@/database";
import type { NewSupplier, Product, Supplier } from "@/database/schema";
import { logger } from "@/monitoring/logger";
import {
  FilterBuilder,
  normalizeSearchTerm,
  SEARCH_LIMIT,
} from "@/query/filters";
import { paginate } from "@/query/pagination";
import { distinctValues } from "@/analytics/aggregations";
import type { RecordStore } from "@/types/store";
import type { Page, SupplierInput, SupplierListQuery } from "@/types";
import {
  InvalidInputError,
  InvalidOperationError,
  NotFoundError,
} from "@/utils/errors";
import { withConflictRecheck } from "./concurrency";

const optional = (value: string | null | undefined): string | null =>
  value?.trim() || null;

const toRecord = (input: SupplierInput): NewSupplier => {
  const companyName = input.companyName.trim();
  if (!companyName) {
    throw new InvalidInputError("Company name is required");
  }
  return {
    companyName,
    contactName: optional(input.contactName),
    city: optional(input.city),
    country: optional(input.country),
    phone: optional(input.phone),
    fax: optional(input.fax),
  };
};

export class SupplierService {
  constructor(private readonly store: RecordStore) {}

  listSuppliers(query: SupplierListQuery = {}): Promise<Page<Supplier>> {
    const where = new FilterBuilder<Supplier>()
      .contains("country", query.country)
      .contains("city", query.city)
      .containsAny(["companyName", "contactName", "phone"], query.search)
      .build();

    return paginate(this.store.suppliers, {
      where,
      orderBy: [{ field: "companyName", direction: "asc" }],
      page: query,
    });
  }

  async getSupplier(id: number): Promise<Supplier> {
    const supplier = await this.store.suppliers.findById(id);
    if (!supplier) {
      throw new NotFoundError(`Supplier with ID ${id} not found`);
    }
    return supplier;
  }

  async getSupplierProducts(id: number, activeOnly = false): Promise<Product[]> {
    await this.getSupplier(id);

    const where = new FilterBuilder<Product>()
      .equals("supplierId", id)
      .equals("isDiscontinued", activeOnly ? false : undefined)
      .build();

    return this.store.products.findMany({
      where,
      orderBy: [
        { field: "productName", direction: "asc" },
        { field: "id", direction: "asc" },
      ],
    });
  }

  async searchSuppliers(term: string): Promise<Supplier[]> {
    const search = normalizeSearchTerm(term);

    return this.store.suppliers.findMany({
      where: new FilterBuilder<Supplier>()
        .containsAny(
          ["companyName", "contactName", "phone", "city", "country"],
          search
        )
        .build(),
      orderBy: [
        { field: "companyName", direction: "asc" },
        { field: "id", direction: "asc" },
      ],
      limit: SEARCH_LIMIT,
    });
  }

  async listCountries(): Promise<string[]> {
    const suppliers = await this.store.suppliers.findMany({
      where: [{ op: "notEmpty", field: "country" }],
    });
    return distinctValues(suppliers.map((supplier) => supplier.country));
  }

  async listCities(country?: string): Promise<string[]> {
    const where = new FilterBuilder<Supplier>()
      .add({ op: "notEmpty", field: "city" })
      .contains("country", country)
      .build();
    const suppliers = await this.store.suppliers.findMany({ where });
    return distinctValues(suppliers.map((supplier) => supplier.city));
  }

  async createSupplier(
    input: SupplierInput,
    correlationId?: string
  ): Promise<Supplier> {
    const supplier = await this.store.suppliers.insert(toRecord(input));

    logger
      .child({ correlationId, supplierId: supplier.id })
      .info("Supplier created");

    return supplier;
  }

  async updateSupplier(
    id: number,
    input: SupplierInput,
    correlationId?: string
  ): Promise<Supplier> {
    const current = await this.getSupplier(id);
    const changes = toRecord(input);

    const updated = await withConflictRecheck(
      "Supplier",
      () => this.store.suppliers.exists([{ op: "eq", field: "id", value: id }]),
      () => this.store.suppliers.update(id, current.version, changes)
    );

    logger
      .child({ correlationId, supplierId: id })
      .info("Supplier updated", { version: updated.version });

    return updated;
  }

  async deleteSupplier(id: number, correlationId?: string): Promise<void> {
    const contextLogger = logger.child({ correlationId, supplierId: id });

    await this.getSupplier(id);

    const hasProducts = await this.store.products.exists([
      { op: "eq", field: "supplierId", value: id },
    ]);
    if (hasProducts) {
      contextLogger.warn("Supplier deletion blocked by existing products");
      throw new InvalidOperationError(
        "Cannot delete supplier with existing products"
      );
    }

    const removed = await this.store.suppliers.remove(id);
    if (!removed) {
      throw new NotFoundError(`Supplier with ID ${id} no longer exists`);
    }

    contextLogger.info("Supplier deleted");
  }
}

export const supplierService = new SupplierService(recordStore);
