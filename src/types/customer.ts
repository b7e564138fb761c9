import type { PageRequest } from "./pagination";

export interface CustomerInput {
  firstName: string;
  lastName: string;
  city?: string | null;
  country?: string | null;
  phone?: string | null;
}

export interface CustomerListQuery extends PageRequest {
  country?: string;
  city?: string;
  search?: string;
}
