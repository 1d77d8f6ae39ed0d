/**
 * Order lifecycle statuses
 */
export enum OrderStatus {
  PENDING = "pending",
  PREPARING = "preparing",
  READY = "ready",
  DELIVERED = "delivered",
  CANCELLED = "cancelled"
}

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(OrderStatus);

// Statuses that keep a table occupied
export const ACTIVE_ORDER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.PENDING,
  OrderStatus.PREPARING,
  OrderStatus.READY
];

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.DELIVERED,
  OrderStatus.CANCELLED
];

/**
 * Allowed targets per current status. Active orders may move anywhere,
 * including backwards; terminal orders may only be re-terminated.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  [OrderStatus.PENDING]: ORDER_STATUSES,
  [OrderStatus.PREPARING]: ORDER_STATUSES,
  [OrderStatus.READY]: ORDER_STATUSES,
  [OrderStatus.DELIVERED]: TERMINAL_ORDER_STATUSES,
  [OrderStatus.CANCELLED]: TERMINAL_ORDER_STATUSES
};

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === "string" && ORDER_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// Per order line, after merging and adding
export const MAX_LINE_QUANTITY = 999;

export interface OrderLineInput {
  menuItemId: number;
  quantity: number;
}

export interface CreateOrderInput {
  tableId: number;
  customerName: string;
  items: OrderLineInput[];
}
