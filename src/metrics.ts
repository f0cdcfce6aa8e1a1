import { monitorEventLoopDelay } from 'node:perf_hooks';
import type { TokenRejection } from './auth.js';
import type { FileIndexSnapshot } from './file-index.js';

export type AuthFailureReason = TokenRejection | 'credentials';

interface IndexBuildStats {
  builds: number;
  failures: number;
  lastDurationMs: number;
  files: number;
  directories: number;
  bytes: number;
  lastIndexed: string | null;
}

function formatMetricLine(name: string, labels: Record<string, string> | null, value: number): string {
  if (!labels || Object.keys(labels).length === 0) {
    return `${name} ${value}`;
  }
  const formattedLabels = Object.entries(labels)
    .map(([key, labelValue]) => `${key}="${labelValue.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
    .join(',');
  return `${name}{${formattedLabels}} ${value}`;
}

function toMs(nanoseconds: number): number {
  const value = nanoseconds / 1_000_000;
  return Number.isFinite(value) ? Number(value.toFixed(3)) : 0;
}

export class MetricsRegistry {
  private readonly eventLoopDelay = monitorEventLoopDelay({ resolution: 20 });
  private readonly startedAt = Date.now();
  private readonly index: IndexBuildStats = {
    builds: 0,
    failures: 0,
    lastDurationMs: 0,
    files: 0,
    directories: 0,
    bytes: 0,
    lastIndexed: null
  };
  private readonly authFailures = new Map<AuthFailureReason, number>();
  private loginSuccessTotal = 0;

  constructor() {
    this.eventLoopDelay.enable();
  }

  dispose(): void {
    this.eventLoopDelay.disable();
  }

  recordIndexBuild(snapshot: FileIndexSnapshot, durationMs: number): void {
    this.index.builds += 1;
    this.index.lastDurationMs = Math.max(0, Math.round(durationMs));
    this.index.files = snapshot.totalFiles;
    this.index.directories = snapshot.directories.length;
    this.index.bytes = snapshot.totalSize;
    this.index.lastIndexed = snapshot.lastIndexed;
  }

  recordIndexFailure(): void {
    this.index.failures += 1;
  }

  recordAuthFailure(reason: AuthFailureReason): void {
    this.authFailures.set(reason, (this.authFailures.get(reason) ?? 0) + 1);
  }

  recordLoginSuccess(): void {
    this.loginSuccessTotal += 1;
  }

  getUptimeSec(): number {
    return Math.floor((Date.now() - this.startedAt) / 1000);
  }

  renderPrometheus(): string {
    const memoryUsage = process.memoryUsage();
    const lines: string[] = [];

    lines.push('# HELP treeserve_index_builds_total Completed index builds');
    lines.push('# TYPE treeserve_index_builds_total counter');
    lines.push(`treeserve_index_builds_total ${this.index.builds}`);

    lines.push('# HELP treeserve_index_build_failures_total Background index builds that failed');
    lines.push('# TYPE treeserve_index_build_failures_total counter');
    lines.push(`treeserve_index_build_failures_total ${this.index.failures}`);

    lines.push('# HELP treeserve_index_build_duration_ms Duration of the last index build');
    lines.push('# TYPE treeserve_index_build_duration_ms gauge');
    lines.push(`treeserve_index_build_duration_ms ${this.index.lastDurationMs}`);

    lines.push('# HELP treeserve_index_entries Entries in the last built index');
    lines.push('# TYPE treeserve_index_entries gauge');
    lines.push(formatMetricLine('treeserve_index_entries', { type: 'file' }, this.index.files));
    lines.push(formatMetricLine('treeserve_index_entries', { type: 'directory' }, this.index.directories));

    lines.push('# HELP treeserve_index_bytes Total file bytes in the last built index');
    lines.push('# TYPE treeserve_index_bytes gauge');
    lines.push(`treeserve_index_bytes ${this.index.bytes}`);

    lines.push('# HELP treeserve_login_success_total Successful logins');
    lines.push('# TYPE treeserve_login_success_total counter');
    lines.push(`treeserve_login_success_total ${this.loginSuccessTotal}`);

    lines.push('# HELP treeserve_auth_fail_total Rejected logins and bearer tokens by reason');
    lines.push('# TYPE treeserve_auth_fail_total counter');
    for (const [reason, count] of [...this.authFailures.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(formatMetricLine('treeserve_auth_fail_total', { reason }, count));
    }

    lines.push('# HELP treeserve_event_loop_lag_ms Event loop lag quantiles in milliseconds');
    lines.push('# TYPE treeserve_event_loop_lag_ms gauge');
    lines.push(formatMetricLine('treeserve_event_loop_lag_ms', { quantile: 'p50' }, toMs(this.eventLoopDelay.percentile(50))));
    lines.push(formatMetricLine('treeserve_event_loop_lag_ms', { quantile: 'p99' }, toMs(this.eventLoopDelay.percentile(99))));

    lines.push('# HELP process_resident_memory_bytes Resident memory size in bytes');
    lines.push('# TYPE process_resident_memory_bytes gauge');
    lines.push(`process_resident_memory_bytes ${memoryUsage.rss}`);

    return `${lines.join('\n')}\n`;
  }
}
