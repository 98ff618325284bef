/**
 * Service Monitoring & Metrics
 *
 * Tracks success rates, failures, and latency for each external dependency.
 * Logs an alert when thresholds are exceeded.
 */

import { AppError } from './error-handling';

export const API_NAMES = ['classifier', 'identifier', 'image_generation', 'object_storage', 'database'] as const;
export type ApiName = typeof API_NAMES[number];

interface ApiMetrics {
  success: number;
  failed: number;
  consecutiveFailures: number;
  totalLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  lastError?: {
    message: string;
    timestamp: number;
    code?: string;
  };
  lastSuccessTimestamp: number;
  lastFailureTimestamp: number;
}

export type HealthState = 'healthy' | 'degraded' | 'down';

function emptyMetrics(): ApiMetrics {
  return {
    success: 0,
    failed: 0,
    consecutiveFailures: 0,
    totalLatencyMs: 0,
    minLatencyMs: Infinity,
    maxLatencyMs: 0,
    lastSuccessTimestamp: Date.now(),
    lastFailureTimestamp: 0,
  };
}

export class MonitoringService {
  private metrics: Map<ApiName, ApiMetrics> = new Map();
  private thresholds = {
    failureRatePercent: 10, // Alert if >10% of requests fail
    maxConsecutiveFailures: 5, // Alert if 5+ consecutive failures
    slowLatencyMs: 20000, // Image generation is slow by nature
  };

  constructor() {
    this.reset();
  }

  private metric(api: ApiName): ApiMetrics {
    let metric = this.metrics.get(api);
    if (!metric) {
      metric = emptyMetrics();
      this.metrics.set(api, metric);
    }
    return metric;
  }

  /**
   * Record successful call
   */
  recordSuccess(api: ApiName, latencyMs: number): void {
    const metric = this.metric(api);
    metric.success++;
    metric.consecutiveFailures = 0;
    metric.totalLatencyMs += latencyMs;
    metric.minLatencyMs = Math.min(metric.minLatencyMs, latencyMs);
    metric.maxLatencyMs = Math.max(metric.maxLatencyMs, latencyMs);
    metric.lastSuccessTimestamp = Date.now();
    metric.lastError = undefined;

    this.checkAlerts(api);
  }

  /**
   * Record failed call
   */
  recordFailure(api: ApiName, error: unknown, code?: string): void {
    const metric = this.metric(api);
    metric.failed++;
    metric.consecutiveFailures++;
    metric.lastFailureTimestamp = Date.now();
    metric.lastError = {
      message: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
      code,
    };

    this.checkAlerts(api);
  }

  /**
   * Get current metrics for an API
   */
  getMetrics(api: ApiName) {
    const metric = this.metric(api);
    const total = metric.success + metric.failed;
    const failureRate = total > 0 ? (metric.failed / total) * 100 : 0;
    const avgLatencyMs = metric.success > 0 ? metric.totalLatencyMs / metric.success : 0;

    return {
      ...metric,
      totalRequests: total,
      failureRate,
      avgLatencyMs: Math.round(avgLatencyMs),
      isHealthy: failureRate <= this.thresholds.failureRatePercent,
      isDown: metric.consecutiveFailures >= this.thresholds.maxConsecutiveFailures,
    };
  }

  /**
   * Get health status for all dependencies
   */
  getHealthStatus(): Record<ApiName, { status: HealthState; failureRate: string; avgLatencyMs: number; totalRequests: number }> {
    const statusOf = (api: ApiName) => {
      const metrics = this.getMetrics(api);
      let status: HealthState = 'healthy';
      if (metrics.isDown) {
        status = 'down';
      } else if (!metrics.isHealthy) {
        status = 'degraded';
      }
      return {
        status,
        failureRate: metrics.failureRate.toFixed(1) + '%',
        avgLatencyMs: metrics.avgLatencyMs,
        totalRequests: metrics.totalRequests,
      };
    };

    return {
      classifier: statusOf('classifier'),
      identifier: statusOf('identifier'),
      image_generation: statusOf('image_generation'),
      object_storage: statusOf('object_storage'),
      database: statusOf('database'),
    };
  }

  /**
   * Check if alerts should be triggered
   */
  private checkAlerts(api: ApiName): void {
    const metrics = this.getMetrics(api);

    if (metrics.totalRequests >= 10 && !metrics.isHealthy) {
      this.sendAlert(
        `${api.toUpperCase()} HIGH FAILURE RATE`,
        `${metrics.failureRate.toFixed(1)}% of requests are failing (threshold: ${this.thresholds.failureRatePercent}%)`,
        'warning'
      );
    }

    if (metrics.consecutiveFailures === this.thresholds.maxConsecutiveFailures) {
      this.sendAlert(
        `${api.toUpperCase()} UNAVAILABLE`,
        `${metrics.consecutiveFailures} consecutive failures`,
        'critical'
      );
    }

    if (metrics.avgLatencyMs > this.thresholds.slowLatencyMs) {
      this.sendAlert(
        `${api.toUpperCase()} SLOW`,
        `Average latency is ${metrics.avgLatencyMs}ms`,
        'warning'
      );
    }
  }

  private sendAlert(title: string, message: string, severity: 'info' | 'warning' | 'critical'): void {
    const output = `[${new Date().toISOString()}] [${severity.toUpperCase()}] ${title}: ${message}`;

    if (severity === 'critical') {
      console.error(output);
    } else if (severity === 'warning') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  /**
   * Reset metrics (useful for testing)
   */
  reset(api?: ApiName): void {
    if (api) {
      this.metrics.set(api, emptyMetrics());
      return;
    }
    for (const name of API_NAMES) {
      this.metrics.set(name, emptyMetrics());
    }
  }
}

// Export singleton
export const monitoring = new MonitoringService();

/**
 * Wrapper to track call latency
 */
export async function trackApiCall<T>(
  api: ApiName,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    monitoring.recordSuccess(api, Date.now() - startTime);
    return result;
  } catch (error) {
    const code = error instanceof AppError ? error.code : 'unknown';
    monitoring.recordFailure(api, error, code);
    throw error;
  }
}
