import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigManager } from '../manager';
import { ConfigError } from '../../../shared/errors';
import { RecordingLogger } from '../../../__tests__/fakes';

describe('ConfigManager', () => {
  let repoRoot: string;

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'gitbrief-config-'));
  });

  afterEach(() => {
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(repoRoot, '.gitbrief.yml'), content, 'utf-8');
  }

  it('falls back to defaults without a file or environment', () => {
    const config = ConfigManager.load(repoRoot, {});

    expect(config).toMatchObject({
      repoRoot,
      language: 'en',
      provider: 'auto',
      days: 7,
      models: { openrouter: 'xiaomi/mimo-v2-flash:free', gemini: 'gemini-flash-latest' },
      prompt: { maxChars: 8000, subjectMaxLength: 72 },
      generation: { temperature: 0.3, maxOutputTokens: 1024 },
      retry: { retries: 2, initialBackoffMs: 1000, maxBackoffMs: 8000, factor: 2, timeoutMs: 60000 },
      credentials: { openrouter: undefined, gemini: undefined },
      slackWebhookUrl: undefined,
      debug: false
    });
  });

  it('reads the YAML file and lets the environment override it', () => {
    writeConfig('language: ko\ndays: 3\nprompt:\n  maxChars: 4000\n');

    const config = ConfigManager.load(repoRoot, { GITBRIEF_DAYS: '14', GITBRIEF_DEBUG: 'true' });

    expect(config.language).toBe('ko');
    expect(config.days).toBe(14);
    expect(config.prompt).toEqual({ maxChars: 4000, subjectMaxLength: 72 });
    expect(config.debug).toBe(true);
  });

  it('merges nested environment values into the file section', () => {
    writeConfig('prompt:\n  subjectMaxLength: 50\n');

    const config = ConfigManager.load(repoRoot, { GITBRIEF_MAX_DIFF: '2000' });

    expect(config.prompt).toEqual({ maxChars: 2000, subjectMaxLength: 50 });
  });

  it('takes credentials from the environment and ignores blank ones', () => {
    const config = ConfigManager.load(repoRoot, {
      OPENROUTER_API_KEY: '  ',
      GEMINI_API_KEY: 'test-secret',
      SLACK_WEBHOOK_URL: 'https://hooks.example.test/placeholder'
    });

    expect(config.credentials).toEqual({ openrouter: undefined, gemini: 'test-secret' });
    expect(config.slackWebhookUrl).toBe('https://hooks.example.test/placeholder');
  });

  it('ignores an invalid file with a warning', () => {
    writeConfig('days: 0\n');
    const logger = new RecordingLogger();

    const config = ConfigManager.load(repoRoot, { GITBRIEF_LANG: 'KO' }, logger);

    expect(config.days).toBe(7);
    expect(config.language).toBe('ko');
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0].level).toBe('warn');
    expect(logger.lines[0].message.startsWith('Ignoring .gitbrief.yml: days:')).toBe(true);
  });

  it('ignores a file whose top level is not a mapping', () => {
    writeConfig('- one\n- two\n');
    const logger = new RecordingLogger();

    expect(ConfigManager.load(repoRoot, {}, logger).days).toBe(7);
    expect(logger.lines).toEqual([{ level: 'warn', message: 'Ignoring .gitbrief.yml: expected a mapping at the top level' }]);
  });

  it('rejects invalid environment values by variable name', () => {
    writeConfig('days: 3\n');
    const logger = new RecordingLogger();

    const error = (() => {
      try {
        ConfigManager.load(repoRoot, { GITBRIEF_DAYS: 'abc' }, logger);
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: 'ConfigError',
      variables: ['GITBRIEF_DAYS'],
      hint: 'Fix or unset GITBRIEF_DAYS; run gitbrief init to see the supported settings.'
    });
    expect(logger.lines).toEqual([]);
    expect(() => ConfigManager.load(repoRoot, { GITBRIEF_PROVIDER: 'other' })).toThrow(/^Invalid environment override GITBRIEF_PROVIDER: provider:/);
  });

  it('writes a default file once and reads it back as the defaults', () => {
    expect(ConfigManager.createDefault(repoRoot)).toBe(true);
    expect(ConfigManager.createDefault(repoRoot)).toBe(false);

    const logger = new RecordingLogger();
    const config = ConfigManager.load(repoRoot, {}, logger);

    expect(logger.lines).toEqual([]);
    const { repoRoot: _root, ...fromFile } = config;
    const { repoRoot: _other, ...defaults } = ConfigManager.load(path.join(repoRoot, 'missing'), {});
    expect(fromFile).toEqual(defaults);
    expect(config.models.openrouter).toBe('xiaomi/mimo-v2-flash:free');
    expect(config.days).toBe(7);
  });
});
