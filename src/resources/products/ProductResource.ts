// src/resources/products/ProductResource.ts

import { BaseResource } from '../BaseResource';
import type { BatchRequest, BatchResponse, DeleteOptions, ListResult } from '../types';
import type { GetOptions, Product, ProductListOptions } from './types';

const BASE_PATH = 'products';

export class ProductResource extends BaseResource {
  async list(options?: ProductListOptions): Promise<Product[]> {
    return this.listItems<Product>(BASE_PATH, options);
  }

  async listWithPagination(options?: ProductListOptions): Promise<ListResult<Product>> {
    return this.listPage<Product>(BASE_PATH, options);
  }

  async get(productId: number, options?: GetOptions): Promise<Product> {
    return this.deps.client.get<Product>(`${BASE_PATH}/${productId}`, options);
  }

  async create(product: Product): Promise<Product> {
    return this.deps.client.post<Product>(BASE_PATH, product);
  }

  /**
   * Update a product. `product.id` selects the record.
   */
  async update(product: Product & { id: number }): Promise<Product> {
    return this.deps.client.put<Product>(`${BASE_PATH}/${product.id}`, product);
  }

  async delete(productId: number, options?: DeleteOptions): Promise<Product> {
    return this.deps.client.delete<Product>(`${BASE_PATH}/${productId}`, options);
  }

  async batch(request: BatchRequest<Product>): Promise<BatchResponse<Product>> {
    return this.deps.client.post<BatchResponse<Product>>(`${BASE_PATH}/batch`, request);
  }
}
