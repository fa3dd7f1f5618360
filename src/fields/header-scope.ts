import { HeaderError } from '../errors.js';

/**
 * Tracks which header a visitor is inside, so errors raised by the bit
 * cursor or a coder name the innermost failing header.
 */
export class HeaderScope {
  run(name: string, body: () => void): void {
    try {
      body();
    } catch (error) {
      if (error instanceof HeaderError && error.header === undefined) {
        throw new HeaderError(error.code, error.message, name);
      }
      throw error;
    }
  }
}
