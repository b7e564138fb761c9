import type {
  Collection,
  Predicate,
  SortSpec,
  StoredRecord,
} from "@/types/store";
import type { Page, PageMeta, PageRequest } from "@/types/pagination";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

/** page below 1 becomes 1; a page size outside [1, 100] falls back to 10. */
export const normalizePagination = (request: PageRequest = {}): Required<PageRequest> => {
  const page = request.page === undefined || request.page < 1 ? 1 : request.page;
  const pageSize =
    request.pageSize === undefined ||
    request.pageSize < 1 ||
    request.pageSize > MAX_PAGE_SIZE
      ? DEFAULT_PAGE_SIZE
      : request.pageSize;

  return { page, pageSize };
};

export const buildPageMeta = (
  totalCount: number,
  { page, pageSize }: Required<PageRequest>
): PageMeta => ({
  totalCount,
  page,
  pageSize,
  totalPages: Math.ceil(totalCount / pageSize),
});

// The id goes last so rows that tie on every requested key keep a fixed order.
export const withStableOrder = <T extends StoredRecord>(
  orderBy: SortSpec<T>[]
): SortSpec<T>[] =>
  orderBy.some((spec) => spec.field === "id")
    ? orderBy
    : [...orderBy, { field: "id", direction: "asc" }];

export interface PaginateOptions<T> {
  where: Predicate<T>[];
  orderBy: SortSpec<T>[];
  page?: PageRequest;
}

export const paginate = async <T extends StoredRecord, TNew>(
  collection: Collection<T, TNew>,
  options: PaginateOptions<T>
): Promise<Page<T>> => {
  const paging = normalizePagination(options.page);

  const totalCount = await collection.count(options.where);
  const meta = buildPageMeta(totalCount, paging);
  // Pages past the end are answered without a query.
  if (paging.page > meta.totalPages) {
    return { items: [], meta };
  }

  const items = await collection.findMany({
    where: options.where,
    orderBy: withStableOrder(options.orderBy),
    limit: paging.pageSize,
    offset: (paging.page - 1) * paging.pageSize,
  });

  return { items, meta };
};
