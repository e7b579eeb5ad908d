import { Request, Response } from 'express';
import { httpMetrics } from '@/api/middlewares/metricsMiddleware';
import { PrometheusWriter } from '@/api/helpers/prometheus';
import { jobQueue } from '@/config/dependencies';
import { poolStats } from '@/config/database';
import { env } from '@/config/env';

/**
 * GET /api/metrics
 * Prometheus text format: HTTP traffic, process, database pool and
 * background jobs
 */
export async function getMetrics(_req: Request, res: Response): Promise<void> {
  const writer = new PrometheusWriter();
  httpMetrics.write(writer);

  const memory = process.memoryUsage();
  const cpu = process.cpuUsage();

  writer
    .family('process_uptime_seconds', 'gauge', 'Process uptime in seconds', [
      { value: process.uptime() },
    ])
    .family('process_memory_bytes', 'gauge', 'Process memory by kind', [
      { labels: { kind: 'heap_used' }, value: memory.heapUsed },
      { labels: { kind: 'heap_total' }, value: memory.heapTotal },
      { labels: { kind: 'rss' }, value: memory.rss },
    ])
    .family('process_cpu_seconds_total', 'counter', 'CPU time in seconds by mode', [
      { labels: { mode: 'user' }, value: cpu.user / 1e6 },
      { labels: { mode: 'system' }, value: cpu.system / 1e6 },
    ]);

  const connections = poolStats();
  writer.family('db_pool_connections', 'gauge', 'PostgreSQL pool connections by state', [
    { labels: { state: 'total' }, value: connections.total },
    { labels: { state: 'idle' }, value: connections.idle },
    { labels: { state: 'waiting' }, value: connections.waiting },
  ]);

  writer.family(
    'job_queue_jobs',
    'gauge',
    'Background jobs (member exports, image processing) by status',
    Object.entries(jobQueue.stats()).map(([status, count]) => ({ labels: { status }, value: count }))
  );

  writer.family('app_info', 'gauge', 'Application information', [
    { labels: { version: '1.0.0', node_version: process.version, env: env.NODE_ENV }, value: 1 },
  ]);

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(writer.toString());
}
