import {
  decodeSettingsPayload,
  defaultSettings,
  isValidRepositoryName,
  normalizeSettings,
  readStoredSettings,
  redactStoredSettings,
  toStoredSettings,
} from '../../../src/config/settings';
import { ConfigInvalidError } from '../../../src/utils/error-handler';

describe('dashboard settings', () => {
  describe('normalizeSettings', () => {
    it('should clamp refresh_interval values to the allowed range', () => {
      const low = normalizeSettings({ ...defaultSettings(), refreshInterval: 10 });
      const high = normalizeSettings({ ...defaultSettings(), refreshInterval: 10000 });

      expect(low.settings.refreshInterval).toBe(30);
      expect(low.warnings).toEqual(['refreshInterval too low (10), set to 30']);
      expect(high.settings.refreshInterval).toBe(3600);
      expect(high.warnings).toEqual(['refreshInterval too high (10000), set to 3600']);
    });

    it('should clamp the remaining bounded fields', () => {
      const { settings } = normalizeSettings({
        ...defaultSettings(),
        maxReposPerPage: 0,
        maxPRsPerRepo: 500,
        cacheTimeout: -5,
      });

      expect(settings.maxReposPerPage).toBe(1);
      expect(settings.maxPRsPerRepo).toBe(50);
      expect(settings.cacheTimeout).toBe(0);
    });

    it('should round fractional values', () => {
      const { settings, warnings } = normalizeSettings({ ...defaultSettings(), refreshInterval: 90.6 });

      expect(settings.refreshInterval).toBe(91);
      expect(warnings).toEqual([]);
    });

    it('should fall back to the default for non-finite numbers', () => {
      const { settings, warnings } = normalizeSettings({ ...defaultSettings(), cacheTimeout: Number.NaN });

      expect(settings.cacheTimeout).toBe(300);
      expect(warnings).toEqual(['cacheTimeout is not a finite number, using default 300']);
    });

    it('should drop invalid repository names and keep duplicates', () => {
      const { settings, warnings } = normalizeSettings({
        ...defaultSettings(),
        repositories: ['octo-org/widgets', 'not-a-repo', ' octo-org/gadgets ', 'octo-org/widgets'],
      });

      expect(settings.repositories).toEqual(['octo-org/widgets', 'octo-org/gadgets', 'octo-org/widgets']);
      expect(warnings).toEqual(["Ignoring invalid repository name 'not-a-repo' (expected owner/name)"]);
    });

    it('should treat a blank token as absent', () => {
      const { settings } = normalizeSettings({ ...defaultSettings(), githubToken: '   ' });
      expect(settings.githubToken).toBeUndefined();
    });
  });

  describe('isValidRepositoryName', () => {
    it.each([
      ['octo-org/widgets', true],
      ['octo-org/widgets.js', true],
      ['octo-org', false],
      ['octo-org/widgets/extra', false],
      ['/widgets', false],
    ])('%s -> %s', (name, expected) => {
      expect(isValidRepositoryName(name)).toBe(expected);
    });
  });

  describe('wire form', () => {
    it('should convert to snake_case with an empty token when none is set', () => {
      expect(toStoredSettings(defaultSettings())).toEqual({
        github_token: '',
        repositories: [],
        refresh_interval: 300,
        compact_view: false,
        show_private_repos: true,
        max_repos_per_page: 50,
        max_prs_per_repo: 20,
        cache_timeout: 300,
      });
    });

    it('should redact only a present token', () => {
      const withToken = toStoredSettings({ ...defaultSettings(), githubToken: 'test-token' });

      expect(redactStoredSettings(withToken).github_token).toBe('[REDACTED]');
      expect(redactStoredSettings(toStoredSettings(defaultSettings())).github_token).toBe('');
    });
  });

  describe('decodeSettingsPayload', () => {
    it('should fill missing fields with defaults', () => {
      const settings = decodeSettingsPayload({ repositories: ['octo-org/widgets'], refresh_interval: 60 });

      expect(settings).toEqual({
        ...defaultSettings(),
        repositories: ['octo-org/widgets'],
        refreshInterval: 60,
      });
    });

    it('should accept a null token and null repositories', () => {
      const settings = decodeSettingsPayload({ github_token: null, repositories: null });

      expect(settings.githubToken).toBeUndefined();
      expect(settings.repositories).toEqual([]);
    });

    it('should reject a payload that is not an object', () => {
      expect(() => decodeSettingsPayload([1, 2])).toThrow(ConfigInvalidError);
    });

    it('should reject a field of the wrong type', () => {
      expect(() => decodeSettingsPayload({ refresh_interval: '60' })).toThrow('Invalid config format');
      expect(() => decodeSettingsPayload({ repositories: ['ok/repo', 7] })).toThrow(ConfigInvalidError);
      expect(() => decodeSettingsPayload({ compact_view: 'yes' })).toThrow(ConfigInvalidError);
    });
  });

  describe('readStoredSettings', () => {
    it('should skip fields of the wrong type and report them', () => {
      const result = readStoredSettings({ refresh_interval: 'soon', compact_view: true, repositories: ['a/b', 3, 4] });

      expect(result?.settings.refreshInterval).toBe(300);
      expect(result?.settings.compactView).toBe(true);
      expect(result?.settings.repositories).toEqual(['a/b']);
      expect(result?.skipped).toEqual(['repositories', 'refresh_interval']);
    });

    it('should return null for a stored value that is not an object', () => {
      expect(readStoredSettings('settings')).toBeNull();
    });
  });
});
