// src/resources/customers/types.ts

import type { ListOptions } from '../../core/pagination/types';
import type { Links, MetaData } from '../types';

export interface Billing {
  first_name?: string;
  last_name?: string;
  company?: string;
  address_1?: string;
  address_2?: string;
  city?: string;
  state?: string;
  postcode?: string;
  country?: string;
  email?: string;
  phone?: string;
}

export type Shipping = Omit<Billing, 'email' | 'phone'>;

export interface Customer {
  id?: number;
  email?: string;
  first_name?: string;
  last_name?: string;
  role?: string;
  username?: string;
  password?: string;
  billing?: Billing;
  shipping?: Shipping;
  is_paying_customer?: boolean;
  avatar_url?: string;
  date_created?: string;
  date_created_gmt?: string;
  date_modified?: string;
  date_modified_gmt?: string;
  orders_count?: number;
  total_spent?: string;
  meta_data?: MetaData[];
  _links?: Links;
}

export interface CustomerListOptions extends ListOptions {
  email?: string;
  role?: string;
}

export interface CustomerDeleteOptions {
  force?: boolean;
  /** User ID to reassign the deleted customer's posts to */
  reassign?: number;
}
