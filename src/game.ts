import { randomBytes, randomInt } from 'node:crypto';
import { InvalidGuessError, InvalidWordError } from './errors.ts';
import type { Game, ResignOptions, RevealedLetter, Tally } from './types.ts';

export const MAX_TURNS = 7;

const WORD_RE = /^[a-z]+$/;
const LETTER_RE = /^[a-z]$/;

/** ===== Creare ===== */
export function newGame(word: string, name: string = randomName()): Game {
  if (!WORD_RE.test(word)) throw new InvalidWordError(word);

  return {
    name,
    state: 'initializing',
    turnsLeft: MAX_TURNS,
    letters: word.split(''),
    used: new Set<string>(),
  };
}

/**
 * Nume aleator de 4–10 caractere din alfabetul base64url (A-Z a-z 0-9 - _).
 * `n` octeți dau cel puțin `n` caractere, deci tăierea la `n` e mereu validă.
 */
export function randomName(): string {
  const length = randomInt(4, 11);
  return randomBytes(length).toString('base64url').slice(0, length);
}

export function isOver(game: Game): boolean {
  return game.state === 'won' || game.state === 'lost';
}

/** ===== Mutări ===== */
export function makeMove(game: Game, guess: string): Game {
  if (isOver(game)) return game;
  if (!LETTER_RE.test(guess)) throw new InvalidGuessError(guess);

  if (game.used.has(guess)) return { ...game, state: 'already_used' };

  const good = game.letters.includes(guess);
  // fără încercări rămase o literă greșită nu mai schimbă nimic
  if (!good && game.turnsLeft <= 0) return game;

  const used = new Set(game.used).add(guess);

  if (good) {
    const won = game.letters.every((l) => used.has(l));
    return { ...game, used, state: won ? 'won' : 'good_guess' };
  }

  if (game.turnsLeft === 1) return { ...game, used, state: 'lost', turnsLeft: 0 };
  return { ...game, used, state: 'bad_guess', turnsLeft: game.turnsLeft - 1 };
}

export function tally(game: Game): Tally {
  const lost = game.state === 'lost';
  return {
    state: game.state,
    turnsLeft: game.turnsLeft,
    letters: game.letters.map((letter): RevealedLetter => {
      if (game.used.has(letter)) return { kind: 'guessed', letter };
      return lost ? { kind: 'revealed', letter } : { kind: 'hidden' };
    }),
    guesses: [...game.used].sort(),
  };
}

/**
 * Ends the game as lost. A won game is overridden too unless `keepWon` is set.
 */
export function resign(game: Game, options: ResignOptions = {}): Game {
  if (game.state === 'lost') return game;
  if (game.state === 'won' && options.keepWon) return game;
  return { ...game, state: 'lost' };
}
