// src/resources/reports/types.ts

export interface Report {
  slug?: string;
  description?: string;
  _links?: Record<string, Array<{ href: string }>>;
}

/**
 * Row of the orders/customers/products totals reports
 */
export interface TotalsReport {
  slug: string;
  name: string;
  total: number;
}

export interface ReportOptions {
  context?: 'view';
  period?: 'week' | 'month' | 'last_month' | 'year';
  date_min?: string;
  date_max?: string;
}
