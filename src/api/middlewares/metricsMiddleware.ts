/**
 * HTTP Metrics Middleware
 *
 * Counts requests per method, route and status, and keeps a window of
 * latencies per route for the summary quantiles served on /api/metrics.
 */

import { Request, Response, NextFunction } from 'express';
import { PrometheusWriter, Sample } from '@/api/helpers/prometheus';

const LATENCY_WINDOW = 1000;
const QUANTILES = [0.5, 0.95, 0.99] as const;
const UNTRACKED_PATHS = new Set(['/api/metrics', '/api/health']);

const ULID_SEGMENT = /\/[0-9A-HJKMNP-TV-Z]{26}(?=\/|$)/g;
const NUMERIC_SEGMENT = /\/\d+(?=\/|$)/g;

/**
 * Label for a request: the matched route template when Express found one
 * ("/api/v1/admin/users/:id"), otherwise the path with ids collapsed so
 * unmatched URLs cannot blow up the label set
 */
export function routeLabel(req: Pick<Request, 'baseUrl' | 'route' | 'originalUrl'>): string {
  const template: unknown = req.route?.path;
  if (typeof template === 'string') {
    return `${req.baseUrl}${template === '/' ? '' : template}` || '/';
  }

  const path = req.originalUrl.split('?')[0] ?? '/';
  return path.replace(ULID_SEGMENT, '/:id').replace(NUMERIC_SEGMENT, '/:id');
}

interface RouteStats {
  method: string;
  route: string;
  statuses: Map<number, number>;
  latencies: number[];
  latencySum: number;
  latencyCount: number;
}

export class HttpMetrics {
  private routes = new Map<string, RouteStats>();

  record(method: string, route: string, status: number, seconds: number): void {
    const key = `${method} ${route}`;
    let stats = this.routes.get(key);
    if (!stats) {
      stats = { method, route, statuses: new Map(), latencies: [], latencySum: 0, latencyCount: 0 };
      this.routes.set(key, stats);
    }

    stats.statuses.set(status, (stats.statuses.get(status) ?? 0) + 1);
    stats.latencySum += seconds;
    stats.latencyCount += 1;
    stats.latencies.push(seconds);
    if (stats.latencies.length > LATENCY_WINDOW) {
      stats.latencies.shift();
    }
  }

  write(writer: PrometheusWriter): void {
    const all = [...this.routes.values()];

    writer.family(
      'http_requests_total',
      'counter',
      'HTTP requests by method, route and status',
      all.flatMap(({ method, route, statuses }) =>
        [...statuses].map(([status, count]): Sample => ({
          labels: { method, route, status },
          value: count,
        }))
      )
    );

    writer.family(
      'http_request_duration_seconds',
      'summary',
      'HTTP request latency in seconds',
      all.flatMap((stats) => latencySamples(stats))
    );
  }

  reset(): void {
    this.routes.clear();
  }
}

function latencySamples(stats: RouteStats): Sample[] {
  const labels = { method: stats.method, route: stats.route };
  const sorted = [...stats.latencies].sort((a, b) => a - b);

  return [
    ...QUANTILES.map((quantile) => ({
      labels: { ...labels, quantile },
      value: Number((sorted[Math.floor(sorted.length * quantile)] ?? 0).toFixed(4)),
    })),
    { labels, value: Number(stats.latencySum.toFixed(4)), suffix: '_sum' },
    { labels, value: stats.latencyCount, suffix: '_count' },
  ];
}

export const httpMetrics = new HttpMetrics();

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (UNTRACKED_PATHS.has(req.path)) {
    next();
    return;
  }

  const startedAt = process.hrtime.bigint();

  // the route is only known once the router has run
  res.on('finish', () => {
    const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
    httpMetrics.record(req.method, routeLabel(req), res.statusCode, seconds);
  });

  next();
}
