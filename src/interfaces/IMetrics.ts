/**
 * Metrics Interface
 *
 * Business metrics (refunds issued, exports finished, images processed)
 * recorded through an adapter chosen by METRICS_TYPE. HTTP request metrics
 * are separate and exposed in Prometheus format by metricsMiddleware.
 */

/**
 * Metric dimensions - key/value pairs for filtering and grouping
 * Example: { entityType: 'membership', outcome: 'approved' }
 */
export type MetricDimensions = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Counter - value that only increases
   * Example: ledger.refunds, exports.completed
   */
  incrementCounter(name: string, value?: number, dimensions?: MetricDimensions): void;

  /**
   * Gauge - value that can go up or down
   * Example: jobs.pending
   */
  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Histogram - duration in milliseconds
   * Example: image.processing_time
   */
  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void;

  /**
   * Start a timer; calling the returned function records the elapsed time
   */
  startTimer(name: string, dimensions?: MetricDimensions): () => void;

  /**
   * Flush buffered metrics (called on shutdown)
   */
  flush(): Promise<void>;
}

export interface IMetricsFactory {
  createMetrics(namespace?: string): IMetrics;
}
