// src/resources/reports/ReportResource.ts

import { BaseResource } from '../BaseResource';
import type { Report, ReportOptions, TotalsReport } from './types';

const BASE_PATH = 'reports';

export class ReportResource extends BaseResource {
  async list(options?: ReportOptions): Promise<Report[]> {
    return this.deps.client.get<Report[]>(BASE_PATH, options);
  }

  /**
   * Fetch one report by slug, e.g. `sales` or `top_sellers`
   */
  async get<T = unknown>(reportId: string, options?: ReportOptions): Promise<T> {
    return this.deps.client.get<T>(`${BASE_PATH}/${encodeURIComponent(reportId)}`, options);
  }

  async getTotalOrders(options?: ReportOptions): Promise<TotalsReport[]> {
    return this.deps.client.get<TotalsReport[]>(`${BASE_PATH}/orders/totals`, options);
  }

  async getTotalCustomers(options?: ReportOptions): Promise<TotalsReport[]> {
    return this.deps.client.get<TotalsReport[]>(`${BASE_PATH}/customers/totals`, options);
  }

  async getTotalProducts(options?: ReportOptions): Promise<TotalsReport[]> {
    return this.deps.client.get<TotalsReport[]>(`${BASE_PATH}/products/totals`, options);
  }
}
