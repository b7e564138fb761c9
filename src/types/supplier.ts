import type { PageRequest } from "./pagination";

export interface SupplierInput {
  companyName: string;
  contactName?: string | null;
  city?: string | null;
  country?: string | null;
  phone?: string | null;
  fax?: string | null;
}

export interface SupplierListQuery extends PageRequest {
  country?: string;
  city?: string;
  search?: string;
}
