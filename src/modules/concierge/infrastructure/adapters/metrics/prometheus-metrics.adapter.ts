import { Injectable } from '@nestjs/common';
import type { MetricsPort } from '../../../application/ports/metrics.port';
import type { HookStage, PipelineStage, SearchStatus } from '../../../domain/search-result';
import {
  CONCIERGE_METRIC_PLUGIN_FAILURES_TOTAL,
  CONCIERGE_METRIC_SEARCHES_TOTAL,
  CONCIERGE_METRIC_STAGE_LATENCY_SECONDS,
  CONCIERGE_METRIC_STOCK_UNAVAILABLE_TOTAL,
  CONCIERGE_STAGE_LATENCY_BUCKETS,
} from '../../../../../common/metrics/constants';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly searches = new Map<string, number>();
  private readonly pluginFailures = new Map<string, number>();
  private readonly stockUnavailable = new Map<string, number>();

  private readonly latencyBuckets = new Map<string, number>();
  private readonly latencySum = new Map<string, number>();
  private readonly latencyCount = new Map<string, number>();

  incrementSearch(input: { status: SearchStatus }): void {
    increment(this.searches, input.status);
  }

  incrementPluginFailure(input: { plugin: string; stage: HookStage }): void {
    increment(this.pluginFailures, `${sanitizeLabelValue(input.plugin)}|${input.stage}`);
  }

  incrementStockUnavailable(input: { reason: 'out_of_stock' | 'lookup_failed' }): void {
    increment(this.stockUnavailable, input.reason);
  }

  observeStageLatency(input: { stage: PipelineStage; seconds: number }): void {
    const stage = input.stage;
    const latency = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;

    this.latencySum.set(stage, (this.latencySum.get(stage) ?? 0) + latency);
    increment(this.latencyCount, stage);

    for (const bucket of CONCIERGE_STAGE_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        increment(this.latencyBuckets, `${stage}|${bucket}`);
      }
    }

    increment(this.latencyBuckets, `${stage}|+Inf`);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CONCIERGE_METRIC_SEARCHES_TOTAL} Total product searches by outcome.`);
    lines.push(`# TYPE ${CONCIERGE_METRIC_SEARCHES_TOTAL} counter`);
    for (const [status, value] of this.searches.entries()) {
      lines.push(`${CONCIERGE_METRIC_SEARCHES_TOTAL}{status="${status}"} ${value}`);
    }

    lines.push(`# HELP ${CONCIERGE_METRIC_PLUGIN_FAILURES_TOTAL} Total plugin hook failures.`);
    lines.push(`# TYPE ${CONCIERGE_METRIC_PLUGIN_FAILURES_TOTAL} counter`);
    for (const [key, value] of this.pluginFailures.entries()) {
      const [plugin, stage] = key.split('|');
      lines.push(`${CONCIERGE_METRIC_PLUGIN_FAILURES_TOTAL}{plugin="${plugin}",stage="${stage}"} ${value}`);
    }

    lines.push(`# HELP ${CONCIERGE_METRIC_STOCK_UNAVAILABLE_TOTAL} Offers reported unavailable by reason.`);
    lines.push(`# TYPE ${CONCIERGE_METRIC_STOCK_UNAVAILABLE_TOTAL} counter`);
    for (const [reason, value] of this.stockUnavailable.entries()) {
      lines.push(`${CONCIERGE_METRIC_STOCK_UNAVAILABLE_TOTAL}{reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${CONCIERGE_METRIC_STAGE_LATENCY_SECONDS} Pipeline stage latency in seconds.`);
    lines.push(`# TYPE ${CONCIERGE_METRIC_STAGE_LATENCY_SECONDS} histogram`);
    for (const [key, value] of this.latencyBuckets.entries()) {
      const [stage, bucket] = key.split('|');
      lines.push(`${CONCIERGE_METRIC_STAGE_LATENCY_SECONDS}_bucket{stage="${stage}",le="${bucket}"} ${value}`);
    }
    for (const [stage, value] of this.latencySum.entries()) {
      lines.push(`${CONCIERGE_METRIC_STAGE_LATENCY_SECONDS}_sum{stage="${stage}"} ${value}`);
    }
    for (const [stage, value] of this.latencyCount.entries()) {
      lines.push(`${CONCIERGE_METRIC_STAGE_LATENCY_SECONDS}_count{stage="${stage}"} ${value}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\|/g, '_');
}
