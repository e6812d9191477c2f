export interface PageRequest {
  skip: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export interface Paginated<T> extends PageRequest {
  items: T[];
  total: number;
  hasNext: boolean;
}

export function toPaginated<T>(page: Page<T>, request: PageRequest): Paginated<T> {
  return {
    items: page.items,
    skip: request.skip,
    limit: request.limit,
    total: page.total,
    hasNext: request.skip + request.limit < page.total
  };
}
