export const ORDER_STATUSES = [
  'received',
  'preparing',
  'ready',
  'completed',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Statuses that put load on the kitchen. `completed` is the only inactive one. */
export const ACTIVE_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
  'received',
  'preparing',
  'ready',
]);

export const ORDER_SOURCES = ['online', 'pos'] as const;

export type OrderSource = (typeof ORDER_SOURCES)[number];

export function isActiveStatus(status: OrderStatus | null | undefined): boolean {
  return !!status && ACTIVE_ORDER_STATUSES.has(status);
}

export function activeStatusValues(): OrderStatus[] {
  return ORDER_STATUSES.filter((status) => ACTIVE_ORDER_STATUSES.has(status));
}
