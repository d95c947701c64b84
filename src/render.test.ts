import { describe, it, expect } from 'vitest';
import { makeMove, newGame, resign, tally } from './game.ts';
import {
  HANGMAN_PICS,
  buildBoardEmbed,
  gallows,
  renderBoard,
  renderMasked,
  statusLine,
  toWireLetter,
  toWireLetters,
  toWireTally,
} from './render.ts';

function anaconda() {
  return makeMove(makeMove(newGame('anaconda'), 'a'), 'n');
}

describe('wire format', () => {
  it('maps each letter kind', () => {
    expect(toWireLetter({ kind: 'guessed', letter: 'b' })).toBe('b');
    expect(toWireLetter({ kind: 'revealed', letter: 'w' })).toEqual(['w']);
    expect(toWireLetter({ kind: 'hidden' })).toBe('_');
  });

  it('maps a whole word', () => {
    expect(toWireLetters(tally(resign(anaconda())).letters)).toEqual(['a', 'n', 'a', ['c'], ['o'], 'n', ['d'], 'a']);
  });

  it('serializes a tally', () => {
    const wire = toWireTally(tally(anaconda()));
    expect(JSON.stringify(wire)).toBe(
      '{"game_state":"good_guess","turns_left":7,"letters":["a","n","a","_","_","n","_","a"],"guesses":["a","n"]}',
    );
  });
});

describe('renderMasked', () => {
  it('shows underscores while playing', () => {
    expect(renderMasked(tally(anaconda()).letters)).toBe('a n a _ _ n _ a');
  });

  it('brackets letters exposed by a loss', () => {
    expect(renderMasked(tally(resign(anaconda())).letters)).toBe('a n a [c] [o] n [d] a');
  });
});

describe('gallows', () => {
  it('grows with wrong guesses', () => {
    expect(gallows(7)).toBe(HANGMAN_PICS[0]);
    expect(gallows(3)).toBe(HANGMAN_PICS[4]);
    expect(gallows(0)).toBe(HANGMAN_PICS[7]);
  });

  it('stays in range', () => {
    expect(gallows(9)).toBe(HANGMAN_PICS[0]);
    expect(gallows(-1)).toBe(HANGMAN_PICS[7]);
  });
});

describe('renderBoard', () => {
  it('lists word, turns and guesses', () => {
    const lines = renderBoard(tally(anaconda())).split('\n');
    expect(lines).toContain('**Cuvânt:** `a n a _ _ n _ a`');
    expect(lines).toContain('Încercări rămase: **7**');
    expect(lines).toContain('Litere folosite: `a`, `n`');
    expect(lines.at(-1)).toBe(statusLine('good_guess'));
  });

  it('shows a dash before any guess', () => {
    const lines = renderBoard(tally(newGame('abc'))).split('\n');
    expect(lines).toContain('Litere folosite: —');
    expect(lines.at(-1)).toBe(statusLine('initializing'));
  });
});

describe('buildBoardEmbed', () => {
  it('colors by state', () => {
    const embed = buildBoardEmbed(tally(resign(anaconda())), 'Test');
    expect(embed.data.title).toBe('Test');
    expect(embed.data.color).toBe(0xc53030);
    expect(embed.data.description).toContain('`a n a [c] [o] n [d] a`');
  });
});
