// src/resources/products/types.ts

import type { ListOptions } from '../../core/pagination/types';
import type { Links, MetaData } from '../types';

export interface Dimensions {
  length?: string;
  width?: string;
  height?: string;
}

export interface Download {
  id?: string;
  name?: string;
  file?: string;
}

export interface ProductCategoryRef {
  id?: number;
  name?: string;
  slug?: string;
}

export interface ProductTagRef {
  id?: number;
  name?: string;
  slug?: string;
}

export interface ProductImage {
  id?: number;
  date_created?: string;
  date_created_gmt?: string;
  date_modified?: string;
  date_modified_gmt?: string;
  src?: string;
  name?: string;
  alt?: string;
  position?: number;
}

export interface ProductAttribute {
  id?: number;
  name?: string;
  position?: number;
  visible?: boolean;
  variation?: boolean;
  options?: string[];
}

export interface ProductDefaultAttribute {
  id?: number;
  name?: string;
  option?: string;
}

export type ProductType = 'simple' | 'grouped' | 'external' | 'variable';
export type ProductStatus = 'draft' | 'pending' | 'private' | 'publish';
export type StockStatus = 'instock' | 'outofstock' | 'onbackorder';

export interface Product {
  id?: number;
  name?: string;
  slug?: string;
  permalink?: string;
  date_created?: string;
  date_created_gmt?: string;
  date_modified?: string;
  date_modified_gmt?: string;
  type?: ProductType;
  status?: ProductStatus;
  featured?: boolean;
  catalog_visibility?: 'visible' | 'catalog' | 'search' | 'hidden';
  description?: string;
  short_description?: string;
  sku?: string;
  price?: string;
  regular_price?: string;
  sale_price?: string;
  date_on_sale_from?: string | null;
  date_on_sale_from_gmt?: string | null;
  date_on_sale_to?: string | null;
  date_on_sale_to_gmt?: string | null;
  price_html?: string;
  on_sale?: boolean;
  purchasable?: boolean;
  total_sales?: number | string;
  virtual?: boolean;
  downloadable?: boolean;
  downloads?: Download[];
  download_limit?: number;
  download_expiry?: number;
  external_url?: string;
  button_text?: string;
  tax_status?: 'taxable' | 'shipping' | 'none';
  tax_class?: string;
  manage_stock?: boolean;
  stock_quantity?: number | null;
  stock_status?: StockStatus;
  backorders?: 'no' | 'notify' | 'yes';
  backorders_allowed?: boolean;
  backordered?: boolean;
  sold_individually?: boolean;
  weight?: string;
  dimensions?: Dimensions;
  shipping_required?: boolean;
  shipping_taxable?: boolean;
  shipping_class?: string;
  shipping_class_id?: number;
  reviews_allowed?: boolean;
  average_rating?: string;
  rating_count?: number;
  related_ids?: number[];
  upsell_ids?: number[];
  cross_sell_ids?: number[];
  parent_id?: number;
  purchase_note?: string;
  categories?: ProductCategoryRef[];
  tags?: ProductTagRef[];
  images?: ProductImage[];
  attributes?: ProductAttribute[];
  default_attributes?: ProductDefaultAttribute[];
  variations?: number[];
  grouped_products?: number[];
  menu_order?: number;
  meta_data?: MetaData[];
  _links?: Links;
}

export interface ProductListOptions extends ListOptions {
  parent?: number[];
  parent_exclude?: number[];
  slug?: string;
  status?: ProductStatus | 'any';
  type?: ProductType;
  sku?: string;
  featured?: boolean;
  category?: string;
  tag?: string;
  on_sale?: boolean;
  min_price?: string;
  max_price?: string;
  stock_status?: StockStatus;
}

export interface ProductVariationListOptions extends ListOptions {
  modified_after?: Date;
  modified_before?: Date;
  dates_are_gmt?: boolean;
  slug?: string;
  status?: ProductStatus | 'any';
  stock_status?: StockStatus;
  min_price?: string;
  max_price?: string;
}

export interface GetOptions {
  context?: 'view' | 'edit';
}
