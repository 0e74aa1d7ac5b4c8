// src/core/pagination/types.ts

/**
 * Options shared by most collection endpoints. Keys are the API's wire names.
 */
export interface ListOptions {
  context?: 'view' | 'edit';
  page?: number;
  per_page?: number;
  search?: string;
  after?: string;
  before?: string;
  exclude?: number[];
  include?: number[];
  offset?: number;
  order?: 'asc' | 'desc';
  orderby?: string;
}

/**
 * List options recovered from one Link header URL. `page` is 0 when the URL
 * carried none.
 */
export interface PageDescriptor extends ListOptions {
  page: number;
}

export interface Pagination {
  next?: PageDescriptor;
  previous?: PageDescriptor;
  first?: PageDescriptor;
  last?: PageDescriptor;
}
