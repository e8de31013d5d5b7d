import type { Conclusion } from './schemas.js';

export type DoraMetrics = {
  deployments_total: number;
  deployments_successful: number;
  deployments_failed: number;
  change_failure_rate_percent: number;
  mttr_hours: number | null;
}

export type PullRequestMetrics = {
  pr_throughput: number;
  pr_lead_time_avg_hours: number | null;
  pr_lead_time_median_hours: number | null;
}

export type CiHealthMetrics = {
  ci_runs_total: number;
  ci_success_rate_percent: number;
  ci_avg_duration_minutes: number | null;
}

export type DeployHealthMetrics = {
  deploy_avg_duration_minutes: number | null;
}

export type SecurityMetrics = {
  security_runs_total: number;
  security_success_rate_percent: number;
  security_last_conclusion: Conclusion | null;
}

export type DependabotMetrics = {
  dependabot_prs_open: number;
  dependabot_prs_merged: number;
}

/** Shape of `metrics.json`, read as-is by the dashboard template. */
export type MetricsReport = Readonly<{
  generated_at: string;
  window_days: number;
  repository: string;
  dora: DoraMetrics;
  pull_requests: PullRequestMetrics;
  ci_health: CiHealthMetrics;
  deploy_health: DeployHealthMetrics;
  security: SecurityMetrics;
  dependabot: DependabotMetrics;
}>
