import 'dotenv/config';
import path from 'path';
import { ConfigError } from './errors.ts';
import { isLogLevel, type LogLevel } from './logger.ts';

export interface Config {
  discordToken?: string;
  guildId?: string;
  staffRoleId?: string;
  wordsFile: string;
  resignKeepsWin: boolean;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function blankToUndefined(v: string | undefined) {
  const t = v?.trim();
  return t ? t : undefined;
}

function parseBool(name: string, v: string | undefined, fallback: boolean): boolean {
  const t = blankToUndefined(v)?.toLowerCase();
  if (t === undefined) return fallback;
  if (t === 'true' || t === '1') return true;
  if (t === 'false' || t === '0') return false;
  throw new ConfigError(`${name} trebuie să fie true sau false, nu "${v}"`);
}

export function loadConfig(env: Env = process.env): Config {
  const level = blankToUndefined(env.LOG_LEVEL)?.toLowerCase() ?? 'info';
  if (!isLogLevel(level)) throw new ConfigError(`LOG_LEVEL necunoscut: "${level}"`);

  return {
    discordToken: blankToUndefined(env.DISCORD_TOKEN),
    guildId: blankToUndefined(env.GUILD_ID),
    staffRoleId: blankToUndefined(env.STAFF_ROLE_ID),
    wordsFile: path.resolve(process.cwd(), blankToUndefined(env.WORDS_FILE) ?? path.join('data', 'words.json')),
    resignKeepsWin: parseBool('HANGMAN_RESIGN_KEEPS_WIN', env.HANGMAN_RESIGN_KEEPS_WIN, false),
    logLevel: level,
  };
}

export function requireToken(config: Config): string {
  if (!config.discordToken) throw new ConfigError('Lipsește DISCORD_TOKEN în .env');
  return config.discordToken;
}
