import {
  AccountRef,
  MergeableState,
  PullRequest,
  PullRequestState,
  Repository,
} from '../models/types';
import { DecodeError } from '../utils/error-handler';

type JsonObject = Record<string, unknown>;

const GHOST_ACCOUNT: Readonly<AccountRef> = { login: 'ghost', avatarUrl: '' };

const MERGEABLE_STATES: readonly MergeableState[] = ['clean', 'dirty', 'unstable', 'blocked', 'unknown'];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, field: string): JsonObject {
  if (!isObject(value)) {
    throw new DecodeError(`Expected an object for '${field}'`, field);
  }
  return value;
}

function requireString(source: JsonObject, field: string): string {
  const value = source[field];
  if (typeof value !== 'string') {
    throw new DecodeError(`Expected string field '${field}'`, field);
  }
  return value;
}

function optionalString(source: JsonObject, field: string): string | null {
  const value = source[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new DecodeError(`Expected string field '${field}'`, field);
  }
  return value;
}

function requireCount(source: JsonObject, field: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new DecodeError(`Expected non-negative integer field '${field}'`, field);
  }
  return value;
}

function optionalBoolean(source: JsonObject, field: string): boolean {
  const value = source[field];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new DecodeError(`Expected boolean field '${field}'`, field);
  }
  return value;
}

function decodeAccount(value: unknown, field: string): AccountRef {
  const account = expectObject(value, field);
  return {
    login: requireString(account, 'login'),
    avatarUrl: optionalString(account, 'avatar_url') ?? '',
  };
}

function decodeRef(value: unknown): string | null {
  return isObject(value) ? optionalString(value, 'ref') : null;
}

function toMergeableState(value: unknown): MergeableState {
  return MERGEABLE_STATES.find(state => state === value) ?? 'unknown';
}

export function decodeRepository(body: unknown): Repository {
  const source = expectObject(body, 'repository');
  const topics = source.topics;

  return {
    id: requireCount(source, 'id'),
    name: requireString(source, 'name'),
    fullName: requireString(source, 'full_name'),
    description: optionalString(source, 'description') ?? '',
    starCount: requireCount(source, 'stargazers_count'),
    forkCount: requireCount(source, 'forks_count'),
    openIssueCount: requireCount(source, 'open_issues_count'),
    primaryLanguage: optionalString(source, 'language'),
    updatedAt: requireString(source, 'updated_at'),
    createdAt: optionalString(source, 'created_at') ?? '',
    pushedAt: optionalString(source, 'pushed_at'),
    htmlUrl: requireString(source, 'html_url'),
    isPrivate: optionalBoolean(source, 'private'),
    isFork: optionalBoolean(source, 'fork'),
    isArchived: optionalBoolean(source, 'archived'),
    defaultBranch: optionalString(source, 'default_branch') ?? '',
    topics: Array.isArray(topics) ? topics.filter((topic): topic is string => typeof topic === 'string') : [],
    owner: isObject(source.owner) ? decodeAccount(source.owner, 'owner') : null,
  };
}

export function decodePullRequest(body: unknown): PullRequest {
  const source = expectObject(body, 'pull request');

  const number = requireCount(source, 'number');
  if (number === 0) {
    throw new DecodeError("Expected positive integer field 'number'", 'number');
  }

  const rawState = requireString(source, 'state');
  let state: PullRequestState;
  if (optionalString(source, 'merged_at') !== null) {
    state = 'merged';
  } else if (rawState === 'open' || rawState === 'closed') {
    state = rawState;
  } else {
    throw new DecodeError(`Unknown pull request state '${rawState}'`, 'state');
  }

  const reviewers = source.requested_reviewers;

  return {
    id: requireCount(source, 'id'),
    number,
    title: requireString(source, 'title'),
    body: optionalString(source, 'body'),
    state,
    createdAt: requireString(source, 'created_at'),
    updatedAt: requireString(source, 'updated_at'),
    htmlUrl: requireString(source, 'html_url'),
    // GitHub reports deleted accounts as a null user
    author: source.user === null || source.user === undefined ? { ...GHOST_ACCOUNT } : decodeAccount(source.user, 'user'),
    isDraft: optionalBoolean(source, 'draft'),
    mergeableState: toMergeableState(source.mergeable_state),
    headRef: decodeRef(source.head),
    baseRef: decodeRef(source.base),
    requestedReviewers: Array.isArray(reviewers)
      ? reviewers.filter(isObject).map(reviewer => requireString(reviewer, 'login'))
      : [],
  };
}

export function decodePullRequests(body: unknown): PullRequest[] {
  if (!Array.isArray(body)) {
    throw new DecodeError('Expected an array of pull requests');
  }
  return body.map(decodePullRequest);
}
