import { createWordStore, type WordStore } from './wordStore.ts';

export type Category = string;

let store: WordStore | undefined;

export function useWordStore(dataFile: string): WordStore {
  store = createWordStore(dataFile);
  return store;
}

function current(): WordStore {
  if (!store) throw new Error('Word store neinițializat: apelează useWordStore() la pornire.');
  return store;
}

export async function categories(): Promise<Category[]> {
  return current().getCategories();
}

export async function pickWord(category: Category | 'random'): Promise<{ word: string; category: Category }> {
  return current().pick(category);
}

export async function addWord(category: Category, word: string): Promise<void> {
  return current().addWord(category, word);
}

export async function removeWord(category: Category, word: string): Promise<void> {
  return current().removeWord(category, word);
}
