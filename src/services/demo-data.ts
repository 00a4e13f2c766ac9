import { PullRequest, Repository } from '../models/types';

// Shown when nothing is configured so the panel renders something meaningful

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

function ago(now: number, ms: number): string {
  return new Date(now - ms).toISOString();
}

export function demoRepositories(now: number = Date.now()): Repository[] {
  return [
    {
      id: 1,
      name: 'plugin-host',
      fullName: 'demo-org/plugin-host',
      description: 'Extensible plugin host for desktop tools - configure a GitHub token for real data',
      starCount: 1250,
      forkCount: 180,
      openIssueCount: 23,
      primaryLanguage: 'Go',
      updatedAt: ago(now, 2 * HOUR),
      createdAt: ago(now, 365 * DAY),
      pushedAt: ago(now, 2 * HOUR),
      htmlUrl: 'https://github.com/demo-org/plugin-host',
      isPrivate: false,
      isFork: false,
      isArchived: false,
      defaultBranch: 'main',
      topics: ['go', 'plugins', 'development'],
      owner: { login: 'demo-org', avatarUrl: '' },
    },
    {
      id: 2,
      name: 'plugin-collection',
      fullName: 'demo-org/plugin-collection',
      description: 'Plugin collection for the host - monitor GitHub repositories and pull requests',
      starCount: 89,
      forkCount: 34,
      openIssueCount: 8,
      primaryLanguage: 'Go',
      updatedAt: ago(now, HOUR),
      createdAt: ago(now, 180 * DAY),
      pushedAt: ago(now, HOUR),
      htmlUrl: 'https://github.com/demo-org/plugin-collection',
      isPrivate: false,
      isFork: false,
      isArchived: false,
      defaultBranch: 'main',
      topics: ['plugins', 'extensions', 'github'],
      owner: { login: 'demo-org', avatarUrl: '' },
    },
  ];
}

export function demoPullRequests(fullName: string, now: number = Date.now()): PullRequest[] {
  return [
    {
      id: 42,
      number: 42,
      title: 'Add enhanced dashboard features',
      body: 'Adds caching, better error handling and a refreshed layout to the dashboard.',
      state: 'open',
      createdAt: ago(now, DAY),
      updatedAt: ago(now, HOUR),
      htmlUrl: `https://github.com/${fullName}/pull/42`,
      author: { login: 'developer', avatarUrl: 'https://github.com/identicons/developer.png' },
      isDraft: false,
      mergeableState: 'clean',
      headRef: 'feature/enhanced-dashboard',
      baseRef: 'main',
      requestedReviewers: [],
    },
    {
      id: 38,
      number: 38,
      title: 'Fix responsive layout issues',
      body: 'Addresses narrow-panel layout problems and improves accessibility.',
      state: 'open',
      createdAt: ago(now, 2 * DAY),
      updatedAt: ago(now, 2 * HOUR),
      htmlUrl: `https://github.com/${fullName}/pull/38`,
      author: { login: 'designer', avatarUrl: 'https://github.com/identicons/designer.png' },
      isDraft: true,
      mergeableState: 'unknown',
      headRef: null,
      baseRef: null,
      requestedReviewers: [],
    },
  ];
}
