export const COMMERCE_QUERY_PORT = Symbol('COMMERCE_QUERY_PORT');
export const STOCK_AVAILABILITY_PORT = Symbol('STOCK_AVAILABILITY_PORT');
export const MESSAGING_PORT = Symbol('MESSAGING_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
