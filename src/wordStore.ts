// src/wordStore.ts
import { promises as fs } from 'fs';
import path from 'path';
import { randomInt } from 'node:crypto';
import { WordStoreError } from './errors.ts';
import { createLogger } from './logger.ts';

type Store = Record<string, string[]>;

const log = createLogger('words');

const DEFAULT_WORDS = new URL('../data/default-words.json', import.meta.url);

const PLAYABLE = /^[a-z]+$/;

export function normalize(s: string) {
  return s.trim().toLowerCase().normalize('NFD').replace(/\p{Diacritic}/gu, '');
}

export function isPlayable(word: string) {
  return PLAYABLE.test(word);
}

function isErrno(e: unknown, code: string) {
  return e instanceof Error && 'code' in e && e.code === code;
}

export interface WordStore {
  getCategories(): Promise<string[]>;
  pick(category: string | 'random'): Promise<{ word: string; category: string }>;
  addWord(category: string, word: string): Promise<void>;
  removeWord(category: string, word: string): Promise<void>;
}

export function createWordStore(dataFile: string): WordStore {
  async function ensureDataFile() {
    await fs.mkdir(path.dirname(dataFile), { recursive: true });
    try {
      await fs.access(dataFile);
    } catch (e) {
      if (!isErrno(e, 'ENOENT')) throw e;
      log.info(`Creez lista implicită de cuvinte în ${dataFile}`);
      await fs.copyFile(DEFAULT_WORDS, dataFile);
    }
  }

  async function loadStore(): Promise<Store> {
    await ensureDataFile();
    const raw = await fs.readFile(dataFile, 'utf8');
    const json: unknown = JSON.parse(raw);
    if (!json || typeof json !== 'object' || Array.isArray(json)) {
      throw new WordStoreError(`${dataFile} nu conține un obiect de categorii.`);
    }

    const cleaned: Store = {};
    for (const [cat, arr] of Object.entries(json)) {
      const words = Array.isArray(arr) ? arr.filter((w): w is string => typeof w === 'string') : [];
      const playable = words.map(normalize).filter(isPlayable);
      if (playable.length < words.length) {
        log.warn(`Categoria "${cat}": ${words.length - playable.length} cuvinte ignorate (doar a-z).`);
      }
      cleaned[normalize(cat)] = Array.from(new Set(playable)).sort();
    }
    return cleaned;
  }

  async function saveStore(store: Store) {
    await ensureDataFile();
    await fs.writeFile(dataFile, JSON.stringify(store, null, 2), 'utf8');
  }

  return {
    async getCategories() {
      const store = await loadStore();
      return Object.keys(store).sort((a, b) => a.localeCompare(b));
    },

    async pick(category) {
      const store = await loadStore();
      let cat = normalize(category);

      if (cat === 'random' || !store[cat]?.length) {
        const nonEmpty = Object.keys(store).filter((c) => store[c].length > 0);
        if (!nonEmpty.length) throw new WordStoreError('Lista de cuvinte este goală.');
        cat = nonEmpty[randomInt(nonEmpty.length)];
      }

      const list = store[cat];
      return { word: list[randomInt(list.length)], category: cat };
    },

    async addWord(category, word) {
      const store = await loadStore();
      const cat = normalize(category);
      const w = normalize(word);
      if (!isPlayable(w)) throw new WordStoreError(`Cuvântul "${word}" poate conține doar litere a-z.`);

      if (!store[cat]) store[cat] = [];
      if (store[cat].includes(w)) return;

      store[cat].push(w);
      store[cat].sort();
      await saveStore(store);
    },

    async removeWord(category, word) {
      const store = await loadStore();
      const cat = normalize(category);
      const w = normalize(word);

      if (!store[cat]) throw new WordStoreError(`Categoria "${cat}" nu există.`);
      const idx = store[cat].indexOf(w);
      if (idx === -1) throw new WordStoreError(`Cuvântul "${w}" nu există în categoria "${cat}".`);

      store[cat].splice(idx, 1);
      await saveStore(store);
    },
  };
}
