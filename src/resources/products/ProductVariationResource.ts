// src/resources/products/ProductVariationResource.ts

import { BaseResource } from '../BaseResource';
import type { BatchRequest, BatchResponse, DeleteOptions, ListResult } from '../types';
import type { GetOptions, Product, ProductVariationListOptions } from './types';

function variationsPath(productId: number): string {
  return `products/${productId}/variations`;
}

/**
 * Variations of a variable product. Variations share the product shape.
 */
export class ProductVariationResource extends BaseResource {
  async list(productId: number, options?: ProductVariationListOptions): Promise<Product[]> {
    return this.listItems<Product>(variationsPath(productId), options);
  }

  async listWithPagination(
    productId: number,
    options?: ProductVariationListOptions
  ): Promise<ListResult<Product>> {
    return this.listPage<Product>(variationsPath(productId), options);
  }

  async get(productId: number, variationId: number, options?: GetOptions): Promise<Product> {
    return this.deps.client.get<Product>(`${variationsPath(productId)}/${variationId}`, options);
  }

  async create(productId: number, variation: Product): Promise<Product> {
    return this.deps.client.post<Product>(variationsPath(productId), variation);
  }

  async update(productId: number, variationId: number, variation: Product): Promise<Product> {
    return this.deps.client.put<Product>(`${variationsPath(productId)}/${variationId}`, variation);
  }

  async delete(productId: number, variationId: number, options?: DeleteOptions): Promise<Product> {
    return this.deps.client.delete<Product>(`${variationsPath(productId)}/${variationId}`, options);
  }

  async batch(productId: number, request: BatchRequest<Product>): Promise<BatchResponse<Product>> {
    return this.deps.client.post<BatchResponse<Product>>(`${variationsPath(productId)}/batch`, request);
  }
}
