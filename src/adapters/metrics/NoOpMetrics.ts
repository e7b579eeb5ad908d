import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';

/**
 * Metrics adapter that records nothing
 * Default for development and tests.
 */
export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _dimensions?: MetricDimensions): void {
    // No-op
  }

  startTimer(_name: string, _dimensions?: MetricDimensions): () => void {
    return () => undefined;
  }

  async flush(): Promise<void> {
    // No-op
  }
}
