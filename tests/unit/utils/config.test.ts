import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '../../../src/errors';
import { ConfigLoader } from '../../../src/utils/config';

function configFile(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    sources: {
      hackernews: { enabled: true, requestDelayMs: 1000, timeoutMs: 10000 },
      devto: { enabled: true, tag: 'programming', requestDelayMs: 300, timeoutMs: 8000 },
    },
    ingestion: { maxItemsPerSource: 40 },
    categories: [
      { label: 'AI', keywords: ['AI', ' LLM ', 'ai'] },
      { label: 'Python', keywords: ['python'] },
    ],
    database: { path: 'data/test.db' },
    ...overrides,
  };
}

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'techtrends-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(dir, 'techtrends.json');
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  it('loads a config file and normalizes its rules', () => {
    const path = writeConfig(configFile());

    const config = ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path });

    expect(config.categories).toEqual([
      { label: 'AI', keywords: ['ai', 'llm'] },
      { label: 'Python', keywords: ['python'] },
    ]);
    expect(config.ingestion.maxItemsPerSource).toBe(40);
    expect(config.sources.devto.apiKey).toBeUndefined();
    expect(config.database.path).toBe(join(process.cwd(), 'data/test.db'));
    expect(config.trends).toEqual({ defaultWindowDays: 7, defaultTopN: 20 });
  });

  it('applies environment overrides', () => {
    const path = writeConfig(configFile());

    const config = ConfigLoader.loadConfig({
      TECHTRENDS_CONFIG: path,
      MAX_ARTICLES_PER_SOURCE: '5',
      SCRAPING_DELAY_MS: '0',
      DEVTO_API_KEY: 'test-secret',
      DATABASE_PATH: ':memory:',
    });

    expect(config.ingestion.maxItemsPerSource).toBe(5);
    expect(config.sources.hackernews.requestDelayMs).toBe(0);
    expect(config.sources.devto.requestDelayMs).toBe(0);
    expect(config.sources.devto.apiKey).toBe('test-secret');
    expect(config.database.path).toBe(':memory:');
  });

  it('rejects a malformed override', () => {
    const path = writeConfig(configFile());

    expect(() =>
      ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path, MAX_ARTICLES_PER_SOURCE: 'zero' })
    ).toThrow('MAX_ARTICLES_PER_SOURCE must be an integer >= 1, got "zero"');
  });

  it('fails on a missing file', () => {
    const path = join(dir, 'absent.json');

    expect(() => ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path })).toThrow(
      new ConfigError(`Config file not found: ${path}`)
    );
  });

  it('fails on invalid JSON', () => {
    const path = writeConfig('{ not json');

    expect(() => ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path })).toThrow(ConfigError);
  });

  it('names the invalid field', () => {
    const path = writeConfig(configFile({ ingestion: { maxItemsPerSource: 0 } }));

    expect(() => ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path })).toThrow(
      /ingestion\.maxItemsPerSource/
    );
  });

  it('rejects duplicate category labels', () => {
    const path = writeConfig(
      configFile({
        categories: [
          { label: 'AI', keywords: ['ai'] },
          { label: 'AI', keywords: ['llm'] },
        ],
      })
    );

    expect(() => ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path })).toThrow(
      'Duplicate category label: AI'
    );
  });

  it('requires at least one enabled source', () => {
    const path = writeConfig(
      configFile({
        sources: {
          hackernews: { enabled: false, requestDelayMs: 1000, timeoutMs: 10000 },
          devto: { enabled: false, tag: 'programming', requestDelayMs: 300, timeoutMs: 8000 },
        },
      })
    );

    expect(() => ConfigLoader.loadConfig({ TECHTRENDS_CONFIG: path })).toThrow(
      'At least one source must be enabled'
    );
  });

  it('loads the bundled default config', () => {
    const config = ConfigLoader.loadConfig({});

    expect(ConfigLoader.getEnabledSources(config)).toEqual(['hackernews', 'devto']);
    expect(config.categories.map(rule => rule.label)).toEqual([
      'AI',
      'Python',
      'JavaScript',
      'DevOps',
      'Web',
      'Data',
      'Cloud',
      'Security',
    ]);
  });

  it('hides the API key when listing environment variables', () => {
    expect(ConfigLoader.getEnvironmentVariables({ DEVTO_API_KEY: 'test-secret' })).toMatchObject({
      DEVTO_API_KEY: '[SET]',
    });
  });
});
