import type { Customer, Order, OrderItem, Product } from "@/database/schema";
import type { PageRequest } from "./pagination";

export interface OrderLineRequest {
  productId: number;
  quantity: number;
}

export interface CreateOrderRequest {
  customerId: number;
  items: OrderLineRequest[];
}

export interface OrderListQuery extends PageRequest {
  customerId?: number;
  fromDate?: Date;
  toDate?: Date;
  minAmount?: number;
  maxAmount?: number;
}

export interface OrderItemDetail extends OrderItem {
  product: Product | null;
}

/** An order with its customer and items loaded. */
export interface OrderDetail extends Order {
  customer: Customer | null;
  items: OrderItemDetail[];
}

export const RECENT_ORDERS_DEFAULT_DAYS = 7;
export const RECENT_ORDERS_MAX_DAYS = 365;
export const RECENT_ORDERS_LIMIT = 50;
/** Largest value of the integer quantity column. */
export const MAX_ITEM_QUANTITY = 2_147_483_647;
