import { LoggingBookFormatter, type BookFormatter } from './book-formatter.js';
import { createBook } from './book.js';
import type { LibraryInterface } from './library-interface.js';

/**
 * Mediates between the command loop and whichever library it is given.
 * Holds no book state of its own.
 */
export class LibraryManager {
  constructor(
    private readonly library: LibraryInterface,
    private readonly formatter: BookFormatter = new LoggingBookFormatter()
  ) {}

  addBook(title: string, author: string, year: string | number): void {
    this.library.addBook(createBook(title, author, year));
  }

  removeBook(title: string): void {
    this.library.removeBook(title);
  }

  showBooks(): void {
    this.formatter.present(this.library.listBooks());
  }
}
