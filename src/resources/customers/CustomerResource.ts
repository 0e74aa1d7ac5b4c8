// src/resources/customers/CustomerResource.ts

import { BaseResource } from '../BaseResource';
import type { BatchRequest, BatchResponse, ListResult } from '../types';
import type { Customer, CustomerDeleteOptions, CustomerListOptions } from './types';

const BASE_PATH = 'customers';

export class CustomerResource extends BaseResource {
  async list(options?: CustomerListOptions): Promise<Customer[]> {
    return this.listItems<Customer>(BASE_PATH, options);
  }

  async listWithPagination(options?: CustomerListOptions): Promise<ListResult<Customer>> {
    return this.listPage<Customer>(BASE_PATH, options);
  }

  async get(customerId: number): Promise<Customer> {
    return this.deps.client.get<Customer>(`${BASE_PATH}/${customerId}`);
  }

  async create(customer: Customer): Promise<Customer> {
    return this.deps.client.post<Customer>(BASE_PATH, customer);
  }

  async update(customer: Customer & { id: number }): Promise<Customer> {
    return this.deps.client.put<Customer>(`${BASE_PATH}/${customer.id}`, customer);
  }

  /**
   * Customers cannot be trashed; the API requires `force: true`.
   */
  async delete(customerId: number, options: CustomerDeleteOptions = { force: true }): Promise<Customer> {
    return this.deps.client.delete<Customer>(`${BASE_PATH}/${customerId}`, options);
  }

  async batch(request: BatchRequest<Customer>): Promise<BatchResponse<Customer>> {
    return this.deps.client.post<BatchResponse<Customer>>(`${BASE_PATH}/batch`, request);
  }
}
