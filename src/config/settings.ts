import { DashboardSettings, StoredDashboardSettings } from '../models/types';
import { ConfigInvalidError } from '../utils/error-handler';

type BoundedField = 'refreshInterval' | 'maxReposPerPage' | 'maxPRsPerRepo' | 'cacheTimeout';

export const SETTINGS_BOUNDS: Record<BoundedField, { min: number; max: number }> = {
  refreshInterval: { min: 30, max: 3600 },
  maxReposPerPage: { min: 1, max: 100 },
  maxPRsPerRepo: { min: 1, max: 50 },
  cacheTimeout: { min: 0, max: 86400 },
};

export const DEFAULT_SETTINGS: Readonly<DashboardSettings> = Object.freeze({
  githubToken: undefined,
  repositories: [],
  refreshInterval: 300,
  compactView: false,
  showPrivateRepos: true,
  maxReposPerPage: 50,
  maxPRsPerRepo: 20,
  cacheTimeout: 300,
});

export const REDACTED_TOKEN = '[REDACTED]';

const REPOSITORY_NAME_PATTERN = /^[A-Za-z0-9-]+\/[A-Za-z0-9._-]+$/;

export interface NormalizedSettings {
  settings: DashboardSettings;
  warnings: string[];
}

export function defaultSettings(): DashboardSettings {
  return { ...DEFAULT_SETTINGS, repositories: [] };
}

export function isValidRepositoryName(name: string): boolean {
  return REPOSITORY_NAME_PATTERN.test(name);
}

function clampInteger(value: number, field: BoundedField, warnings: string[]): number {
  const { min, max } = SETTINGS_BOUNDS[field];

  if (!Number.isFinite(value)) {
    warnings.push(`${field} is not a finite number, using default ${DEFAULT_SETTINGS[field]}`);
    return DEFAULT_SETTINGS[field];
  }

  const rounded = Math.round(value);
  if (rounded < min) {
    warnings.push(`${field} too low (${rounded}), set to ${min}`);
    return min;
  }
  if (rounded > max) {
    warnings.push(`${field} too high (${rounded}), set to ${max}`);
    return max;
  }
  return rounded;
}

/**
 * Corrects out-of-range values in place of rejecting them. Every correction is reported as a warning.
 */
export function normalizeSettings(input: DashboardSettings): NormalizedSettings {
  const warnings: string[] = [];

  const repositories: string[] = [];
  for (const entry of input.repositories) {
    const name = entry.trim();
    if (isValidRepositoryName(name)) {
      repositories.push(name);
    } else {
      warnings.push(`Ignoring invalid repository name '${entry}' (expected owner/name)`);
    }
  }

  const token = input.githubToken?.trim();

  return {
    settings: {
      githubToken: token ? token : undefined,
      repositories,
      refreshInterval: clampInteger(input.refreshInterval, 'refreshInterval', warnings),
      compactView: input.compactView,
      showPrivateRepos: input.showPrivateRepos,
      maxReposPerPage: clampInteger(input.maxReposPerPage, 'maxReposPerPage', warnings),
      maxPRsPerRepo: clampInteger(input.maxPRsPerRepo, 'maxPRsPerRepo', warnings),
      cacheTimeout: clampInteger(input.cacheTimeout, 'cacheTimeout', warnings),
    },
    warnings,
  };
}

export function toStoredSettings(settings: DashboardSettings): StoredDashboardSettings {
  return {
    github_token: settings.githubToken ?? '',
    repositories: [...settings.repositories],
    refresh_interval: settings.refreshInterval,
    compact_view: settings.compactView,
    show_private_repos: settings.showPrivateRepos,
    max_repos_per_page: settings.maxReposPerPage,
    max_prs_per_repo: settings.maxPRsPerRepo,
    cache_timeout: settings.cacheTimeout,
  };
}

export function redactStoredSettings(stored: StoredDashboardSettings): StoredDashboardSettings {
  return {
    ...stored,
    github_token: stored.github_token ? REDACTED_TOKEN : '',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function readSettings(raw: Record<string, unknown>, onInvalid: (field: string) => void): DashboardSettings {
  const settings = defaultSettings();

  const token = raw.github_token;
  if (typeof token === 'string') {
    settings.githubToken = token;
  } else if (token !== undefined && token !== null) {
    onInvalid('github_token');
  }

  const repositories = raw.repositories;
  if (Array.isArray(repositories)) {
    for (const entry of repositories) {
      if (typeof entry === 'string') {
        settings.repositories.push(entry);
      } else {
        onInvalid('repositories');
      }
    }
  } else if (repositories !== undefined && repositories !== null) {
    onInvalid('repositories');
  }

  const numericFields: Array<[keyof StoredDashboardSettings, BoundedField]> = [
    ['refresh_interval', 'refreshInterval'],
    ['max_repos_per_page', 'maxReposPerPage'],
    ['max_prs_per_repo', 'maxPRsPerRepo'],
    ['cache_timeout', 'cacheTimeout'],
  ];
  for (const [wireName, field] of numericFields) {
    const value = raw[wireName];
    if (isNumber(value)) {
      settings[field] = value;
    } else if (value !== undefined) {
      onInvalid(wireName);
    }
  }

  if (isBoolean(raw.compact_view)) {
    settings.compactView = raw.compact_view;
  } else if (raw.compact_view !== undefined) {
    onInvalid('compact_view');
  }

  if (isBoolean(raw.show_private_repos)) {
    settings.showPrivateRepos = raw.show_private_repos;
  } else if (raw.show_private_repos !== undefined) {
    onInvalid('show_private_repos');
  }

  return settings;
}

/**
 * Decodes a set-config payload. Fields of the wrong type reject the whole payload;
 * missing fields take their defaults.
 */
export function decodeSettingsPayload(raw: unknown): DashboardSettings {
  if (!isRecord(raw)) {
    throw new ConfigInvalidError('Invalid config format');
  }

  return readSettings(raw, (field) => {
    throw new ConfigInvalidError('Invalid config format', field);
  });
}

/**
 * Reads settings found in plugin storage. Fields of the wrong type are skipped and reported.
 */
export function readStoredSettings(raw: unknown): { settings: DashboardSettings; skipped: string[] } | null {
  if (!isRecord(raw)) {
    return null;
  }

  const skipped: string[] = [];
  const settings = readSettings(raw, (field) => {
    if (!skipped.includes(field)) {
      skipped.push(field);
    }
  });

  return { settings, skipped };
}
