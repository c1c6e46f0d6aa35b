export { MetricsAggregator } from "./aggregator.js";
export type { MonitoringMetrics, SuccessRecord } from "./aggregator.js";
export { evaluateHealth } from "./health.js";
export type {
  Baseline,
  BaselineComparison,
  HealthCheck,
  HealthCheckName,
  HealthReport,
  HealthStatus,
} from "./health.js";
