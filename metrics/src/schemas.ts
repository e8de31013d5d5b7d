import { z } from 'zod';

export const CONCLUSIONS = ['success', 'failure', 'other'] as const;

export type Conclusion = typeof CONCLUSIONS[number];

// cancelled, skipped, timed_out, still running (null) etc. all collapse to 'other'
const timestamp = z.string().datetime({ offset: true });

const toConclusion = (value: string | null | undefined): Conclusion =>
  value === 'success' || value === 'failure' ? value : 'other';

export const WorkflowRun = z.object({
  name: z.string().nullable().optional(),
  conclusion: z.string().nullable().optional(),
  created_at: timestamp,
  run_started_at: timestamp.nullable().optional(),
  updated_at: timestamp.nullable().optional(),
}).transform((run) => ({
  name: run.name ?? '',
  conclusion: toConclusion(run.conclusion),
  createdAt: run.created_at,
  runStartedAt: run.run_started_at ?? null,
  updatedAt: run.updated_at ?? null,
}));
export type WorkflowRun = z.infer<typeof WorkflowRun>;

export const PullRequest = z.object({
  user: z.object({ login: z.string() }).nullable().optional(),
  state: z.string(),
  created_at: timestamp,
  merged_at: timestamp.nullable().optional(),
}).transform((pr) => ({
  authorLogin: pr.user?.login ?? null,
  state: pr.state,
  createdAt: pr.created_at,
  mergedAt: pr.merged_at ?? null,
}));
export type PullRequest = z.infer<typeof PullRequest>;

/** `GET /repos/{repo}/actions/runs` wraps its items in `workflow_runs`. */
export const WorkflowRunsPage = z.object({
  workflow_runs: z.array(WorkflowRun),
}).transform((page) => page.workflow_runs);

export const PullRequestsPage = z.array(PullRequest);
