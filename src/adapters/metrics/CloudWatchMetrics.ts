/**
 * AWS CloudWatch Metrics Adapter
 *
 * Buffers business metrics and sends them with PutMetricData every minute
 * (max 20 datums per request). Requires cloudwatch:PutMetricData on the
 * instance or task role.
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { IMetrics, MetricDimensions } from '@/interfaces/IMetrics';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

const MAX_DATUMS_PER_REQUEST = 20;
const FLUSH_INTERVAL_MS = 60_000;

export class CloudWatchMetrics implements IMetrics {
  private buffer: MetricDatum[] = [];
  private flushInterval: NodeJS.Timeout;
  private client: CloudWatchClient;

  constructor(private readonly namespace: string = env.CLOUDWATCH_METRICS_NAMESPACE) {
    this.client = new CloudWatchClient({ region: env.AWS_REGION });

    this.flushInterval = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, 'Failed to flush CloudWatch metrics');
      });
    }, FLUSH_INTERVAL_MS);
    this.flushInterval.unref();
  }

  incrementCounter(name: string, value: number = 1, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Count, dimensions);
  }

  recordGauge(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.None, dimensions);
  }

  recordHistogram(name: string, value: number, dimensions?: MetricDimensions): void {
    this.push(name, value, StandardUnit.Milliseconds, dimensions);
  }

  startTimer(name: string, dimensions?: MetricDimensions): () => void {
    const start = Date.now();
    return () => {
      this.recordHistogram(name, Date.now() - start, dimensions);
    };
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const metricsToSend = this.buffer.splice(0);

    try {
      for (let i = 0; i < metricsToSend.length; i += MAX_DATUMS_PER_REQUEST) {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: metricsToSend.slice(i, i + MAX_DATUMS_PER_REQUEST),
          })
        );
      }

      logger.debug(
        { count: metricsToSend.length, namespace: this.namespace },
        'Flushed metrics to CloudWatch'
      );
    } catch (error) {
      // Metrics are best effort; a CloudWatch outage must not fail requests
      logger.error({ error, count: metricsToSend.length }, 'Failed to send metrics to CloudWatch');
    }
  }

  /**
   * Stop the flush timer and send what is buffered
   */
  async destroy(): Promise<void> {
    clearInterval(this.flushInterval);
    await this.flush();
  }

  private push(
    name: string,
    value: number,
    unit: StandardUnit,
    dimensions?: MetricDimensions
  ): void {
    this.buffer.push({
      MetricName: name,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
      Dimensions: Object.entries(dimensions ?? {}).map(([key, dimensionValue]) => ({
        Name: key,
        Value: String(dimensionValue),
      })),
    });
  }
}
