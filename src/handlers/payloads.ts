import { PullRequest, Repository } from '../models/types';
import { HealthCheckResult } from '../utils/health-monitor';
import { RateLimitStatus } from '../services/github-client';

// Wire shapes sent to the host. Field names follow the GitHub REST API.

export interface ApiResponse {
  success: boolean;
  data?: unknown;
  error?: string;
}

export interface AccountPayload {
  login: string;
  avatar_url: string;
}

export interface RepositoryPayload {
  id: number;
  name: string;
  full_name: string;
  description: string;
  stargazers_count: number;
  forks_count: number;
  open_issues_count: number;
  language: string | null;
  updated_at: string;
  created_at: string;
  pushed_at: string | null;
  html_url: string;
  private: boolean;
  fork: boolean;
  archived: boolean;
  default_branch: string;
  topics: string[];
  owner: AccountPayload | null;
}

export interface PullRequestPayload {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: string;
  created_at: string;
  updated_at: string;
  html_url: string;
  draft: boolean;
  mergeable_state: string;
  user: AccountPayload;
  head: { ref: string } | null;
  base: { ref: string } | null;
  requested_reviewers: Array<{ login: string }>;
}

export interface HealthPayload {
  healthy: boolean;
  message: string;
  repos_configured: number;
  cache_entries: number;
  has_github_token: boolean;
  rate_limit: RateLimitStatus;
  components: Array<Pick<HealthCheckResult, 'component' | 'status' | 'message'>>;
}

export function success(data: unknown): ApiResponse {
  return { success: true, data };
}

export function failure(error: string): ApiResponse {
  return { success: false, error };
}

export function toRepositoryPayload(repository: Repository): RepositoryPayload {
  return {
    id: repository.id,
    name: repository.name,
    full_name: repository.fullName,
    description: repository.description,
    stargazers_count: repository.starCount,
    forks_count: repository.forkCount,
    open_issues_count: repository.openIssueCount,
    language: repository.primaryLanguage,
    updated_at: repository.updatedAt,
    created_at: repository.createdAt,
    pushed_at: repository.pushedAt,
    html_url: repository.htmlUrl,
    private: repository.isPrivate,
    fork: repository.isFork,
    archived: repository.isArchived,
    default_branch: repository.defaultBranch,
    topics: [...repository.topics],
    owner: repository.owner ? { login: repository.owner.login, avatar_url: repository.owner.avatarUrl } : null,
  };
}

export function toPullRequestPayload(pullRequest: PullRequest): PullRequestPayload {
  return {
    id: pullRequest.id,
    number: pullRequest.number,
    title: pullRequest.title,
    body: pullRequest.body,
    state: pullRequest.state,
    created_at: pullRequest.createdAt,
    updated_at: pullRequest.updatedAt,
    html_url: pullRequest.htmlUrl,
    draft: pullRequest.isDraft,
    mergeable_state: pullRequest.mergeableState,
    user: { login: pullRequest.author.login, avatar_url: pullRequest.author.avatarUrl },
    head: pullRequest.headRef !== null ? { ref: pullRequest.headRef } : null,
    base: pullRequest.baseRef !== null ? { ref: pullRequest.baseRef } : null,
    requested_reviewers: pullRequest.requestedReviewers.map(login => ({ login })),
  };
}
