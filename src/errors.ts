export class HangmanError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidWordError extends HangmanError {
  constructor(readonly word: string) {
    super(`some characters of '${word}' not a-z`, 'INVALID_WORD');
  }
}

export class InvalidGuessError extends HangmanError {
  constructor(readonly guess: string) {
    super(`guess '${guess}' not a-z`, 'INVALID_GUESS');
  }
}

export class WordStoreError extends HangmanError {
  constructor(message: string) {
    super(message, 'WORD_STORE');
  }
}

export class ConfigError extends HangmanError {
  constructor(message: string) {
    super(message, 'CONFIG');
  }
}
