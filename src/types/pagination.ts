export interface PageRequest {
  page?: number;
  pageSize?: number;
}

export interface PageMeta {
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface Page<T> {
  items: T[];
  meta: PageMeta;
}
