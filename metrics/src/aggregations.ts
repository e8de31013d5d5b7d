import type {
  CiHealthMetrics,
  DependabotMetrics,
  DeployHealthMetrics,
  DoraMetrics,
  PullRequestMetrics,
  SecurityMetrics,
} from './report.js';
import type { PullRequest, WorkflowRun } from './schemas.js';

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export const DEPENDABOT_LOGIN = 'dependabot[bot]';

// Exact binary halves round up (0.125 -> 0.13), not to even.
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

const round2OrNull = (value: number | null): number | null => (value === null ? null : round2(value));

/** `part / total` as a percentage rounded to two decimals; 0 for an empty total. */
export function percentage(part: number, total: number): number {
  return total > 0 ? round2((part / total) * 100) : 0;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Element at index `floor(n / 2)` of the sorted values. For an even count this
 * is the upper of the two middle elements, not their average.
 */
export function upperMedian(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

export function windowStart(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - windowDays * MS_PER_DAY);
}

function elapsed(from: string, to: string, unitMs: number): number {
  return (Date.parse(to) - Date.parse(from)) / unitMs;
}

const byCreatedAt = (a: WorkflowRun, b: WorkflowRun): number => Date.parse(a.createdAt) - Date.parse(b.createdAt);

function countConclusion(runs: WorkflowRun[], conclusion: WorkflowRun['conclusion']): number {
  return runs.filter((r) => r.conclusion === conclusion).length;
}

function runDurations(runs: WorkflowRun[]): number[] {
  const durations: number[] = [];
  for (const run of runs) {
    if (run.runStartedAt && run.updatedAt) {
      durations.push(elapsed(run.runStartedAt, run.updatedAt, MS_PER_MINUTE));
    }
  }
  return durations;
}

function mergedSince(prs: PullRequest[], since: Date): Array<PullRequest & { mergedAt: string }> {
  const merged: Array<PullRequest & { mergedAt: string }> = [];
  for (const pr of prs) {
    if (pr.mergedAt && Date.parse(pr.mergedAt) >= since.getTime()) {
      merged.push({ ...pr, mergedAt: pr.mergedAt });
    }
  }
  return merged;
}

/**
 * Hours from the earliest failed run to the next successful run created after
 * it. Null when nothing failed or no success followed the first failure.
 */
export function recoveryHours(runs: WorkflowRun[]): number | null {
  const sorted = [...runs].sort(byCreatedAt);
  const failedIdx = sorted.findIndex((r) => r.conclusion === 'failure');
  if (failedIdx === -1) return null;
  const recovered = sorted.slice(failedIdx + 1).find((r) => r.conclusion === 'success');
  if (!recovered) return null;
  return elapsed(sorted[failedIdx].createdAt, recovered.createdAt, MS_PER_HOUR);
}

export function doraMetrics(cdRuns: WorkflowRun[]): DoraMetrics {
  const total = cdRuns.length;
  const failed = countConclusion(cdRuns, 'failure');
  return {
    deployments_total: total,
    deployments_successful: countConclusion(cdRuns, 'success'),
    deployments_failed: failed,
    change_failure_rate_percent: percentage(failed, total),
    mttr_hours: round2OrNull(recoveryHours(cdRuns)),
  };
}

export function pullRequestMetrics(closedPrs: PullRequest[], since: Date): PullRequestMetrics {
  const merged = mergedSince(closedPrs, since);
  const leadTimes = merged.map((pr) => elapsed(pr.createdAt, pr.mergedAt, MS_PER_HOUR));
  return {
    pr_throughput: merged.length,
    pr_lead_time_avg_hours: round2OrNull(mean(leadTimes)),
    pr_lead_time_median_hours: round2OrNull(upperMedian(leadTimes)),
  };
}

export function ciHealthMetrics(ciRuns: WorkflowRun[]): CiHealthMetrics {
  return {
    ci_runs_total: ciRuns.length,
    ci_success_rate_percent: percentage(countConclusion(ciRuns, 'success'), ciRuns.length),
    ci_avg_duration_minutes: round2OrNull(mean(runDurations(ciRuns))),
  };
}

export function deployHealthMetrics(cdRuns: WorkflowRun[]): DeployHealthMetrics {
  const successful = cdRuns.filter((r) => r.conclusion === 'success');
  return {
    deploy_avg_duration_minutes: round2OrNull(mean(runDurations(successful))),
  };
}

export function securityMetrics(securityRuns: WorkflowRun[]): SecurityMetrics {
  const latest = [...securityRuns].sort((a, b) => byCreatedAt(b, a))[0];
  return {
    security_runs_total: securityRuns.length,
    security_success_rate_percent: percentage(countConclusion(securityRuns, 'success'), securityRuns.length),
    security_last_conclusion: latest ? latest.conclusion : null,
  };
}

export function dependabotMetrics(openPrs: PullRequest[], closedPrs: PullRequest[], since: Date): DependabotMetrics {
  const isDependabot = (pr: PullRequest) => pr.authorLogin === DEPENDABOT_LOGIN;
  return {
    dependabot_prs_open: openPrs.filter(isDependabot).length,
    dependabot_prs_merged: mergedSince(closedPrs.filter(isDependabot), since).length,
  };
}
