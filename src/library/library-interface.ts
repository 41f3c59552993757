import type { Book } from './book.js';

/**
 * Storage contract for the library. The manager and the command loop only
 * ever see this interface, so any backing strategy can be swapped in.
 */
export interface LibraryInterface {
  /** Append a book; duplicates are kept. */
  addBook(book: Book): void;
  /** Remove the first book whose title matches exactly. No-op when absent. */
  removeBook(title: string): void;
  /** Books in insertion order. */
  listBooks(): readonly Book[];
}
