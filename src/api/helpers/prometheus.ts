/**
 * Prometheus text exposition
 * https://prometheus.io/docs/instrumenting/exposition_formats/
 */

export type MetricType = 'counter' | 'gauge' | 'summary';
export type Labels = Record<string, string | number>;

export interface Sample {
  labels?: Labels;
  value: number;
  /** Appended to the family name, e.g. "_sum" */
  suffix?: string;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export function formatLabels(labels: Labels | undefined): string {
  if (!labels) return '';
  const pairs = Object.entries(labels).map(
    ([name, value]) => `${name}="${escapeLabelValue(String(value))}"`
  );
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

export class PrometheusWriter {
  private lines: string[] = [];

  family(name: string, type: MetricType, help: string, samples: Iterable<Sample>): this {
    this.lines.push(`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`);
    for (const sample of samples) {
      this.lines.push(`${name}${sample.suffix ?? ''}${formatLabels(sample.labels)} ${sample.value}`);
    }
    this.lines.push('');
    return this;
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
