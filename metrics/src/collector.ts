import {
  ciHealthMetrics,
  dependabotMetrics,
  deployHealthMetrics,
  doraMetrics,
  pullRequestMetrics,
  securityMetrics,
  windowStart,
} from './aggregations.js';
import type { MetricsConfig } from './config.js';
import type { GitHubClient, QueryParams } from './githubClient.js';
import type {
  CiHealthMetrics,
  DependabotMetrics,
  DeployHealthMetrics,
  DoraMetrics,
  MetricsReport,
  PullRequestMetrics,
  SecurityMetrics,
} from './report.js';
import { PullRequestsPage, WorkflowRunsPage, type PullRequest, type WorkflowRun } from './schemas.js';

export const CD_WORKFLOW = 'CD - Azure Web App';
export const CI_WORKFLOW = 'CI';
export const SECURITY_WORKFLOW = 'Security';

const CLOSED_PRS: QueryParams = { state: 'closed', sort: 'updated', direction: 'desc' };
const OPEN_PRS: QueryParams = { state: 'open' };

/**
 * Pulls workflow runs and pull requests for one repository and reduces them to
 * the dashboard's metric groups. Every group issues its own requests, one
 * after another; the first failed request rejects the whole collection.
 */
export class MetricsCollector {
  constructor(
    private readonly client: GitHubClient,
    private readonly config: MetricsConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  windowStart(): Date {
    return windowStart(this.now(), this.config.windowDays);
  }

  async getWorkflowRuns(workflowName: string): Promise<WorkflowRun[]> {
    const created = `>=${this.windowStart().toISOString().slice(0, 10)}`;
    const runs = await this.client.getPaginated(
      `/repos/${this.config.repository}/actions/runs`,
      { created },
      WorkflowRunsPage,
    );
    const wanted = workflowName.toLowerCase();
    return runs.filter((run) => run.name.toLowerCase() === wanted);
  }

  async getPullRequests(params: QueryParams): Promise<PullRequest[]> {
    return this.client.getPaginated(`/repos/${this.config.repository}/pulls`, params, PullRequestsPage);
  }

  async collectDoraMetrics(): Promise<DoraMetrics> {
    return doraMetrics(await this.getWorkflowRuns(CD_WORKFLOW));
  }

  async collectPullRequestMetrics(): Promise<PullRequestMetrics> {
    return pullRequestMetrics(await this.getPullRequests(CLOSED_PRS), this.windowStart());
  }

  async collectCiMetrics(): Promise<CiHealthMetrics> {
    return ciHealthMetrics(await this.getWorkflowRuns(CI_WORKFLOW));
  }

  async collectDeployHealthMetrics(): Promise<DeployHealthMetrics> {
    return deployHealthMetrics(await this.getWorkflowRuns(CD_WORKFLOW));
  }

  async collectSecurityMetrics(): Promise<SecurityMetrics> {
    return securityMetrics(await this.getWorkflowRuns(SECURITY_WORKFLOW));
  }

  async collectDependabotMetrics(): Promise<DependabotMetrics> {
    const openPrs = await this.getPullRequests(OPEN_PRS);
    const closedPrs = await this.getPullRequests(CLOSED_PRS);
    return dependabotMetrics(openPrs, closedPrs, this.windowStart());
  }

  async collectAll(): Promise<MetricsReport> {
    const generatedAt = this.now().toISOString();
    console.log(`[metrics] collecting ${this.config.repository} over the last ${this.config.windowDays} days`);
    const dora = await this.collectDoraMetrics();
    const pullRequests = await this.collectPullRequestMetrics();
    const ciHealth = await this.collectCiMetrics();
    const deployHealth = await this.collectDeployHealthMetrics();
    const security = await this.collectSecurityMetrics();
    const dependabot = await this.collectDependabotMetrics();
    return Object.freeze({
      generated_at: generatedAt,
      window_days: this.config.windowDays,
      repository: this.config.repository,
      dora,
      pull_requests: pullRequests,
      ci_health: ciHealth,
      deploy_health: deployHealth,
      security,
      dependabot,
    });
  }
}
