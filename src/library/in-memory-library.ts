import type { Book } from './book.js';
import type { LibraryInterface } from './library-interface.js';

/**
 * Array-backed library.
 */
export class InMemoryLibrary implements LibraryInterface {
  private readonly books: Book[] = [];

  addBook(book: Book): void {
    this.books.push(book);
  }

  removeBook(title: string): void {
    const index = this.books.findIndex(book => book.title === title);
    if (index !== -1) {
      this.books.splice(index, 1);
    }
  }

  listBooks(): readonly Book[] {
    return [...this.books];
  }
}
