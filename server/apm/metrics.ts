/**
 * Request metrics.
 *
 * In-memory counters plus a bounded window of latencies for percentile
 * figures. One recorder lives on each app instance; the onResponse hook
 * feeds it and GET /metrics reads the snapshot.
 */

// ============================================================================
// Types
// ============================================================================

export interface RequestRecord {
  method: string;
  route: string;
  statusCode: number;
  latencyMs: number;
}

export interface RouteMetrics {
  count: number;
  errors: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
}

export interface MetricsSnapshot {
  totalRequests: number;
  totalErrors: number;
  total4xx: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  uptimeMs: number;
  byRoute: Record<string, RouteMetrics>;
  statusDistribution: Record<string, number>;
}

interface RouteData {
  count: number;
  errors: number;
  totalLatencyMs: number;
  latencies: number[];
}

const MAX_LATENCIES = 2000;
const MAX_ROUTE_LATENCIES = 500;

export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.floor(sorted.length * p);
  return sorted[Math.min(idx, sorted.length - 1)] ?? 0;
}

function pushBounded(list: number[], value: number, max: number) {
  list.push(value);
  if (list.length > max) list.shift();
}

// ============================================================================
// Recorder
// ============================================================================

export class MetricsRecorder {
  private totalRequests = 0;
  private totalErrors = 0;
  private total4xx = 0;
  private totalLatencyMs = 0;
  private latencies: number[] = [];
  private statusCounts = new Map<string, number>();
  private routes = new Map<string, RouteData>();
  private startTime: number;

  constructor(private now: () => number = Date.now) {
    this.startTime = now();
  }

  record(record: RequestRecord): void {
    this.totalRequests++;
    this.totalLatencyMs += record.latencyMs;
    if (record.statusCode >= 500) this.totalErrors++;
    else if (record.statusCode >= 400) this.total4xx++;
    pushBounded(this.latencies, record.latencyMs, MAX_LATENCIES);

    const statusKey = String(record.statusCode);
    this.statusCounts.set(statusKey, (this.statusCounts.get(statusKey) ?? 0) + 1);

    const routeKey = `${record.method} ${record.route}`;
    let rd = this.routes.get(routeKey);
    if (!rd) {
      rd = { count: 0, errors: 0, totalLatencyMs: 0, latencies: [] };
      this.routes.set(routeKey, rd);
    }
    rd.count++;
    rd.totalLatencyMs += record.latencyMs;
    if (record.statusCode >= 500) rd.errors++;
    pushBounded(rd.latencies, record.latencyMs, MAX_ROUTE_LATENCIES);
  }

  snapshot(): MetricsSnapshot {
    const sorted = [...this.latencies].sort((a, b) => a - b);
    const byRoute: Record<string, RouteMetrics> = {};
    for (const [key, rd] of this.routes) {
      byRoute[key] = {
        count: rd.count,
        errors: rd.errors,
        avgLatencyMs: Math.round(rd.totalLatencyMs / rd.count),
        p95LatencyMs: percentile([...rd.latencies].sort((a, b) => a - b), 0.95),
      };
    }
    return {
      totalRequests: this.totalRequests,
      totalErrors: this.totalErrors,
      total4xx: this.total4xx,
      avgLatencyMs: this.totalRequests > 0 ? Math.round(this.totalLatencyMs / this.totalRequests) : 0,
      p95LatencyMs: percentile(sorted, 0.95),
      p99LatencyMs: percentile(sorted, 0.99),
      uptimeMs: this.now() - this.startTime,
      byRoute,
      statusDistribution: Object.fromEntries(this.statusCounts),
    };
  }
}
