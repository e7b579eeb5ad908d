/**
 * Page-number pagination metadata returned with admin listings
 */
export interface PageMeta {
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

export interface Paginated<T> {
  entries: T[];
  meta: PageMeta;
}

export function buildPageMeta(page: number, pageSize: number, totalCount: number): PageMeta {
  const totalPages = totalCount === 0 ? 0 : Math.ceil(totalCount / pageSize);
  return {
    page,
    pageSize,
    totalCount,
    totalPages,
    hasNextPage: page < totalPages,
    hasPreviousPage: page > 1,
  };
}
