import { EmbedBuilder } from 'discord.js';
import { MAX_TURNS } from './game.ts';
import type { GameState, RevealedLetter, Tally, WireLetter, WireTally } from './types.ts';

/** ===== ASCII art (index = greșeli făcute) ===== */
export const HANGMAN_PICS = [
  '```\n +---+\n |   |\n     |\n     |\n     |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n     |\n     |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n |   |\n     |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n/|   |\n     |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n/|\\  |\n     |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n/|\\  |\n/    |\n     |\n========\n```',
  '```\n +---+\n |   |\n O   |\n/|\\  |\n/ \\  |\n     |\n========\n```',
  '```\n +---+\n |   |\n X   |\n/|\\  |\n/ \\  |\n     |\n========\n```',
];

const STATUS: Record<GameState, string> = {
  initializing: '🎮 Joc nou! Ghicește o literă cu `/hangman guess`.',
  good_guess: '✅ Litera este în cuvânt!',
  bad_guess: '❌ Litera nu este în cuvânt.',
  already_used: '⚠️ Ai mai încercat litera asta.',
  won: '🏆 Bravo! Ai ghicit cuvântul.',
  lost: '💀 Ai pierdut. Literele din paranteze nu au fost ghicite.',
};

const COLORS: Record<GameState, number> = {
  initializing: 0x2b6cb0,
  good_guess: 0x2f855a,
  bad_guess: 0xc05621,
  already_used: 0xb7791f,
  won: 0x38a169,
  lost: 0xc53030,
};

/** ===== Formatul de pe fir ===== */
export function toWireLetter(l: RevealedLetter): WireLetter {
  switch (l.kind) {
    case 'guessed': return l.letter;
    case 'revealed': return [l.letter];
    case 'hidden': return '_';
  }
}

export function toWireLetters(letters: RevealedLetter[]): WireLetter[] {
  return letters.map(toWireLetter);
}

export function toWireTally(t: Tally): WireTally {
  return {
    game_state: t.state,
    turns_left: t.turnsLeft,
    letters: toWireLetters(t.letters),
    guesses: [...t.guesses],
  };
}

/** ===== Text ===== */
export function renderMasked(letters: RevealedLetter[]): string {
  return letters
    .map((l) => {
      const w = toWireLetter(l);
      return typeof w === 'string' ? w : `[${w[0]}]`;
    })
    .join(' ');
}

export function gallows(turnsLeft: number): string {
  const wrong = Math.min(Math.max(MAX_TURNS - turnsLeft, 0), HANGMAN_PICS.length - 1);
  return HANGMAN_PICS[wrong];
}

export function statusLine(state: GameState): string {
  return STATUS[state];
}

export function renderBoard(t: Tally): string {
  return (
    `${gallows(t.turnsLeft)}\n` +
    `**Cuvânt:** \`${renderMasked(t.letters)}\`\n\n` +
    `Încercări rămase: **${t.turnsLeft}**\n` +
    `Litere folosite: ${t.guesses.length ? '`' + t.guesses.join('`, `') + '`' : '—'}\n\n` +
    statusLine(t.state)
  );
}

/** ===== Embeds ===== */
export function buildBoardEmbed(t: Tally, title = '🎮 Spânzurătoarea'): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(title)
    .setDescription(renderBoard(t))
    .setColor(COLORS[t.state]);
}
