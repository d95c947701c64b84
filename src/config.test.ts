import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig, requireToken } from './config.ts';
import { ConfigError } from './errors.ts';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      discordToken: undefined,
      guildId: undefined,
      staffRoleId: undefined,
      wordsFile: path.resolve(process.cwd(), 'data', 'words.json'),
      resignKeepsWin: false,
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      DISCORD_TOKEN: ' test-token ',
      GUILD_ID: '123',
      STAFF_ROLE_ID: '',
      WORDS_FILE: '/tmp/words.json',
      HANGMAN_RESIGN_KEEPS_WIN: 'TRUE',
      LOG_LEVEL: 'Debug',
    });
    expect(config.discordToken).toBe('test-token');
    expect(config.guildId).toBe('123');
    expect(config.staffRoleId).toBeUndefined();
    expect(config.wordsFile).toBe('/tmp/words.json');
    expect(config.resignKeepsWin).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'constructor' })).toThrow(ConfigError);
  });

  it('rejects a malformed flag', () => {
    expect(() => loadConfig({ HANGMAN_RESIGN_KEEPS_WIN: 'yes' })).toThrow(
      'HANGMAN_RESIGN_KEEPS_WIN trebuie să fie true sau false, nu "yes"',
    );
  });
});

describe('requireToken', () => {
  it('needs DISCORD_TOKEN', () => {
    expect(() => requireToken(loadConfig({}))).toThrow('Lipsește DISCORD_TOKEN în .env');
    expect(requireToken(loadConfig({ DISCORD_TOKEN: 'test-token' }))).toBe('test-token');
  });
});
