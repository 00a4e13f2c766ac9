import { AppConfig, ConfigManager } from '../../../src/config';
import { MessageType } from '../../../src/handlers/message-dispatcher';
import { PluginSetting, UpsertPluginSettingInput } from '../../../src/models/types';
import { DashboardPlugin } from '../../../src/services/dashboard-plugin';
import { SettingsStore } from '../../../src/services/settings-service';

class MemorySettingsStore implements SettingsStore {
  value: unknown;
  writes = 0;
  failReads = false;

  async findById(key: string): Promise<PluginSetting | null> {
    if (this.failReads) {
      throw new Error('SQLITE_CANTOPEN: unable to open database file');
    }
    return this.value === undefined ? null : { key, value: this.value, version: '1.0.0', updatedAt: new Date() };
  }

  async upsert(input: UpsertPluginSettingInput): Promise<PluginSetting> {
    this.writes += 1;
    this.value = input.value;
    return { ...input, updatedAt: new Date() };
  }
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json; charset=utf-8', 'x-ratelimit-remaining': '4990' },
  });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

describe('DashboardPlugin', () => {
  let config: AppConfig;
  let store: MemorySettingsStore;
  let fetchMock: jest.Mock<Promise<Response>, [string | URL | Request, RequestInit?]>;
  let plugin: DashboardPlugin;

  beforeEach(() => {
    config = new ConfigManager({ NODE_ENV: 'test', ENCRYPTION_KEY: 'test-secret' }).getConfig();
    store = new MemorySettingsStore();
    fetchMock = jest.fn(async (input: string | URL | Request) => {
      const url = urlOf(input);
      if (url.endsWith('/user')) {
        return jsonResponse({ login: 'octocat' });
      }
      return jsonResponse({
        id: 7,
        name: 'widgets',
        full_name: 'octo-org/widgets',
        description: 'Widgets',
        stargazers_count: 5,
        forks_count: 1,
        open_issues_count: 0,
        language: 'TypeScript',
        updated_at: '2026-01-01T00:00:00Z',
        html_url: 'https://github.com/octo-org/widgets',
      });
    });
    plugin = new DashboardPlugin({ config, store, fetch: fetchMock });
  });

  afterEach(async () => {
    await plugin.stop();
  });

  it('should start on demo data without a token or repositories', async () => {
    await plugin.start();

    expect(plugin.isRunning()).toBe(true);
    expect(plugin.scheduler.getIntervalSeconds()).toBe(300);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should verify connectivity and warm the cache when configured', async () => {
    store.value = { github_token: 'test-token', repositories: ['octo-org/widgets'], refresh_interval: 120 };

    await plugin.start();

    const urls = fetchMock.mock.calls.map(([input]) => urlOf(input));
    expect(urls).toEqual(['https://api.github.com/user', 'https://api.github.com/repos/octo-org/widgets']);
    expect(plugin.cache.repositories.get('octo-org/widgets')?.value.starCount).toBe(5);
    expect(plugin.scheduler.getIntervalSeconds()).toBe(120);
  });

  it('should continue with defaults when settings cannot be loaded', async () => {
    store.failReads = true;

    await plugin.start();

    expect(plugin.isRunning()).toBe(true);
    expect(plugin.settings.get().repositories).toEqual([]);
  });

  it('should only start once', async () => {
    await plugin.start();
    await plugin.start();

    expect(plugin.isRunning()).toBe(true);
  });

  it('should reschedule the refresh timer after a config change', async () => {
    await plugin.start();

    const response = await plugin.handleMessage(MessageType.SetConfig, JSON.stringify({ refresh_interval: 60 }));

    expect(response).toEqual({ success: true, data: 'Configuration updated' });
    expect(plugin.scheduler.getIntervalSeconds()).toBe(60);
  });

  it('should persist the settings on stop', async () => {
    await plugin.start();

    await plugin.stop();
    await plugin.stop();

    expect(plugin.isRunning()).toBe(false);
    expect(plugin.scheduler.isRunning()).toBe(false);
    expect(store.writes).toBe(1);
  });

  it('should not persist when stopped before starting', async () => {
    await plugin.stop();

    expect(store.writes).toBe(0);
  });
});
