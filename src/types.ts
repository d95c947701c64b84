export type GameState =
  | 'initializing'
  | 'good_guess'
  | 'bad_guess'
  | 'already_used'
  | 'lost'
  | 'won';

export interface Game {
  readonly name: string;
  readonly state: GameState;
  readonly turnsLeft: number;      // 7 → 0
  readonly letters: readonly string[];
  readonly used: ReadonlySet<string>;
}

export type RevealedLetter =
  | { kind: 'guessed'; letter: string }
  | { kind: 'revealed'; letter: string }   // arătată doar pentru că jocul s-a pierdut
  | { kind: 'hidden' };

export interface Tally {
  state: GameState;
  turnsLeft: number;
  letters: RevealedLetter[];
  guesses: string[];
}

/** Forma trimisă pe fir: literă, `_` sau `[literă]` pentru literele dezvăluite la pierdere. */
export type WireLetter = string | [string];

export interface WireTally {
  game_state: GameState;
  turns_left: number;
  letters: WireLetter[];
  guesses: string[];
}

export interface ResignOptions {
  keepWon?: boolean;
}
