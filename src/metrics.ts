/**
 * Prometheus Metrics Configuration
 * Centralized metrics registry and definitions
 */

import { Registry, collectDefaultMetrics, Counter, Histogram } from 'prom-client';

// =============================================================================
// REGISTRY SETUP
// =============================================================================

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

// =============================================================================
// ANALYTICS METRICS
// =============================================================================

export type QueryStatus = 'success' | 'invalid_parameter' | 'not_found' | 'error';

// Analytics operations by outcome
export const analyticsQueriesTotal = new Counter({
  name: 'analytics_queries_total',
  help: 'Total analytics operations',
  labelNames: ['operation', 'status'],
  registers: [metricsRegistry],
});

// Analytics operation latency
export const analyticsQueryDuration = new Histogram({
  name: 'analytics_query_duration_seconds',
  help: 'Analytics operation duration in seconds',
  labelNames: ['operation'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

// =============================================================================
// STORE METRICS
// =============================================================================

// Read queries issued against the entity store
export const storeQueriesTotal = new Counter({
  name: 'analytics_store_queries_total',
  help: 'Total entity store read queries',
  labelNames: ['query'],
  registers: [metricsRegistry],
});
