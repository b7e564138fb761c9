import type { Product, Supplier } from "@/database/schema";
import type { PageRequest } from "./pagination";

export interface ProductInput {
  productName: string;
  supplierId: number;
  unitPrice: number;
  package?: string | null;
  isDiscontinued?: boolean;
}

export interface ProductListQuery extends PageRequest {
  supplierId?: number;
  minPrice?: number;
  maxPrice?: number;
  isDiscontinued?: boolean;
  search?: string;
}

export interface ProductWithSupplier extends Product {
  supplier: Supplier | null;
}
