// Core data model interfaces for the repository dashboard

export interface AccountRef {
  login: string;
  avatarUrl: string;
}

export interface Repository {
  id: number;
  name: string;
  fullName: string; // owner/name format
  description: string;
  starCount: number;
  forkCount: number;
  openIssueCount: number;
  primaryLanguage: string | null;
  updatedAt: string;
  createdAt: string;
  pushedAt: string | null;
  htmlUrl: string;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
  defaultBranch: string;
  topics: string[];
  owner: AccountRef | null;
}

export type PullRequestState = 'open' | 'closed' | 'merged';

export type MergeableState = 'clean' | 'dirty' | 'unstable' | 'blocked' | 'unknown';

export interface PullRequest {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: PullRequestState;
  createdAt: string;
  updatedAt: string;
  htmlUrl: string;
  author: AccountRef;
  isDraft: boolean;
  mergeableState: MergeableState;
  headRef: string | null;
  baseRef: string | null;
  requestedReviewers: string[];
}

export interface DashboardSettings {
  githubToken: string | undefined;
  repositories: string[];
  refreshInterval: number; // seconds
  compactView: boolean;
  showPrivateRepos: boolean;
  maxReposPerPage: number;
  maxPRsPerRepo: number;
  cacheTimeout: number; // seconds
}

// Persisted / wire form of the settings, as stored under the settings key
export interface StoredDashboardSettings {
  github_token: string;
  repositories: string[];
  refresh_interval: number;
  compact_view: boolean;
  show_private_repos: boolean;
  max_repos_per_page: number;
  max_prs_per_repo: number;
  cache_timeout: number;
}

export interface PluginSetting {
  key: string;
  value: unknown;
  version: string;
  updatedAt: Date;
}

export interface UpsertPluginSettingInput {
  key: string;
  value: unknown;
  version: string;
}
