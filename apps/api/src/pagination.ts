export interface Page<T> {
  items: T[];
  page: number;
  perPage: number;
  total: number;
  pages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export function offsetFor(page: number, perPage: number): number {
  return (page - 1) * perPage;
}

/**
 * Pages past the end come back empty rather than as an error.
 */
export function pageOf<T>(items: T[], total: number, page: number, perPage: number): Page<T> {
  const pages = total === 0 ? 0 : Math.ceil(total / perPage);
  return {
    items,
    page,
    perPage,
    total,
    pages,
    hasNext: page < pages,
    hasPrev: page > 1,
  };
}

export function mapPage<T, U>(page: Page<T>, fn: (item: T) => U): Page<U> {
  return { ...page, items: page.items.map(fn) };
}
