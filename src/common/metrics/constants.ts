export const CONCIERGE_METRIC_SEARCHES_TOTAL = 'concierge_searches_total';
export const CONCIERGE_METRIC_PLUGIN_FAILURES_TOTAL = 'concierge_plugin_failures_total';
export const CONCIERGE_METRIC_STOCK_UNAVAILABLE_TOTAL = 'concierge_stock_unavailable_total';
export const CONCIERGE_METRIC_STAGE_LATENCY_SECONDS = 'concierge_stage_latency_seconds';

export const CONCIERGE_STAGE_LATENCY_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10] as const;
