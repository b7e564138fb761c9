import type { Customer, Supplier } from "@/database/schema";
import type { OrderDetail, OrderItemDetail, ProductWithSupplier } from "@/types";
import { centsToNumber, lineTotal, moneyToNumber } from "@/utils/money";

// Public shapes. Money leaves the service as JSON numbers.

export interface CustomerView {
  id: number;
  firstName: string;
  lastName: string;
  fullName: string;
  city: string | null;
  country: string | null;
  phone: string | null;
}

export interface SupplierView {
  id: number;
  companyName: string;
  contactName: string | null;
  city: string | null;
  country: string | null;
  phone: string | null;
  fax: string | null;
}

export interface ProductView {
  id: number;
  productName: string;
  supplierId: number;
  supplierName: string | null;
  unitPrice: number;
  package: string | null;
  isDiscontinued: boolean;
}

export interface OrderItemView {
  id: number;
  orderId: number;
  productId: number;
  productName: string | null;
  unitPrice: number;
  quantity: number;
  itemTotal: number;
}

export interface OrderView {
  id: number;
  orderNumber: string;
  orderDate: string;
  customerId: number;
  customerName: string | null;
  totalAmount: number;
  orderItems: OrderItemView[];
}

export const presentCustomer = (customer: Customer): CustomerView => ({
  id: customer.id,
  firstName: customer.firstName,
  lastName: customer.lastName,
  fullName: `${customer.firstName} ${customer.lastName}`,
  city: customer.city,
  country: customer.country,
  phone: customer.phone,
});

export const presentSupplier = (supplier: Supplier): SupplierView => ({
  id: supplier.id,
  companyName: supplier.companyName,
  contactName: supplier.contactName,
  city: supplier.city,
  country: supplier.country,
  phone: supplier.phone,
  fax: supplier.fax,
});

export const presentProduct = (product: ProductWithSupplier): ProductView => ({
  id: product.id,
  productName: product.productName,
  supplierId: product.supplierId,
  supplierName: product.supplier?.companyName ?? null,
  unitPrice: moneyToNumber(product.unitPrice),
  package: product.package,
  isDiscontinued: product.isDiscontinued,
});

export const presentOrderItem = (item: OrderItemDetail): OrderItemView => ({
  id: item.id,
  orderId: item.orderId,
  productId: item.productId,
  productName: item.product?.productName ?? null,
  unitPrice: moneyToNumber(item.unitPrice),
  quantity: item.quantity,
  itemTotal: centsToNumber(lineTotal(item.unitPrice, item.quantity)),
});

export const presentOrder = (order: OrderDetail): OrderView => ({
  id: order.id,
  orderNumber: order.orderNumber,
  orderDate: order.orderDate.toISOString(),
  customerId: order.customerId,
  customerName: order.customer
    ? `${order.customer.firstName} ${order.customer.lastName}`
    : null,
  totalAmount: moneyToNumber(order.totalAmount),
  orderItems: order.items.map(presentOrderItem),
});
