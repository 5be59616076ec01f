export const KITCHEN_LOAD_CONFIG = 'KITCHEN_LOAD_CONFIG';
export const COUNTER_STORE = 'KITCHEN_LOAD_COUNTER_STORE';
export const ACTIVE_ORDER_SOURCE = 'KITCHEN_LOAD_ACTIVE_ORDER_SOURCE';
