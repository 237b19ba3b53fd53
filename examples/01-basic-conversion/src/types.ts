// examples/01-basic-conversion/src/types.ts
import { param, t } from "../../../packages/treecast-type-spec/src/mod.ts";

export enum OrderStatus {
  PENDING = "pending",
  PAID = "paid",
  SHIPPED = "shipped",
}

export class Customer {
  constructor(readonly name: string, readonly email: string | null = null) {}
}

export class OrderLine {
  constructor(
    readonly sku: string,
    readonly quantity: number,
    readonly unitPrice: number,
    readonly options: Record<string, unknown> = {},
  ) {}

  get total(): number {
    return this.quantity * this.unitPrice;
  }
}

export class CardPayment {
  constructor(readonly last4: string) {}
}

export class CashPayment {}

export class Order {
  constructor(
    readonly id: number,
    readonly customer: Customer,
    readonly placedAt: Date,
    readonly status: OrderStatus,
    readonly lines: OrderLine[],
    readonly payment: CardPayment | CashPayment,
  ) {}
}

export const Customer$ = t.object(Customer, [
  param("name", t.string(), { aliases: ["full_name"] }),
  param("email", t.optional(t.string()), { default: null }),
]);

export const OrderLine$ = t.object(OrderLine, [
  param("sku", t.string()),
  param("quantity", t.integer()),
  param("unit_price", t.number(), { getter: "unitPrice" }),
  param("options", t.record(t.any()), { extras: true }),
]);

export const CardPayment$ = t.object(CardPayment, [param("last4", t.string())]);
export const CashPayment$ = t.object(CashPayment, []);
export const Payment$ = t.union(CardPayment$, CashPayment$);

export const Order$ = t.object(Order, [
  param("id", t.integer()),
  param("customer", Customer$),
  param("placed_at", t.timestamp(), { getter: "placedAt" }),
  param("status", t.enum(OrderStatus, "OrderStatus")),
  param("lines", t.array(OrderLine$)),
  param("payment", Payment$),
]);
