import { logger, type Logger } from '../utils/logger.js';
import { formatBook, type Book } from './book.js';

export const NO_BOOKS_MESSAGE = 'No books in the library.';

/**
 * Presents a list of books to the user.
 */
export interface BookFormatter {
  present(books: readonly Book[]): void;
}

/**
 * One info line per book, or a single line when the library is empty.
 */
export class LoggingBookFormatter implements BookFormatter {
  constructor(private readonly log: Logger = logger.child('library')) {}

  present(books: readonly Book[]): void {
    if (books.length === 0) {
      this.log.info(NO_BOOKS_MESSAGE);
      return;
    }
    for (const book of books) {
      this.log.info(formatBook(book));
    }
  }
}
