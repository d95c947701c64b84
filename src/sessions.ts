import { isOver, makeMove, newGame, resign } from './game.ts';
import type { Game, ResignOptions } from './types.ts';

export const MAX_GAMES = 1000;

/**
 * One game per player. Every transition replaces the stored value, so the
 * store is the single owner of each game.
 *
 * Finished games stay so `status` can show the final board. Once more than
 * `maxGames` are held, `start` drops the finished games of other players.
 */
export class SessionStore {
  private readonly games = new Map<string, Game>();

  constructor(
    private readonly resignOptions: ResignOptions = {},
    private readonly maxGames = MAX_GAMES,
  ) {}

  get size() {
    return this.games.size;
  }

  get(playerId: string): Game | undefined {
    return this.games.get(playerId);
  }

  start(playerId: string, word: string, name?: string): Game {
    const game = newGame(word, name);
    this.games.set(playerId, game);
    if (this.games.size > this.maxGames) this.pruneFinished(playerId);
    return game;
  }

  guess(playerId: string, letter: string): Game | undefined {
    const game = this.games.get(playerId);
    if (!game) return undefined;

    const next = makeMove(game, letter);
    this.games.set(playerId, next);
    return next;
  }

  resign(playerId: string): Game | undefined {
    const game = this.games.get(playerId);
    if (!game) return undefined;

    this.games.delete(playerId);
    return resign(game, this.resignOptions);
  }

  end(playerId: string): boolean {
    return this.games.delete(playerId);
  }

  private pruneFinished(keep: string) {
    for (const [id, game] of this.games) {
      if (id !== keep && isOver(game)) this.games.delete(id);
    }
  }
}
