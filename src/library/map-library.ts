import type { Book } from './book.js';
import type { LibraryInterface } from './library-interface.js';

interface Shelved {
  seq: number;
  book: Book;
}

/**
 * Title-indexed library. Each entry records its insertion sequence so the
 * listing order matches InMemoryLibrary.
 */
export class MapLibrary implements LibraryInterface {
  private readonly shelves = new Map<string, Shelved[]>();
  private nextSeq = 0;

  addBook(book: Book): void {
    const shelf = this.shelves.get(book.title) ?? [];
    shelf.push({ seq: this.nextSeq++, book });
    this.shelves.set(book.title, shelf);
  }

  removeBook(title: string): void {
    const shelf = this.shelves.get(title);
    if (!shelf) return;

    shelf.shift();
    if (shelf.length === 0) {
      this.shelves.delete(title);
    }
  }

  listBooks(): readonly Book[] {
    const all: Shelved[] = [];
    for (const shelf of this.shelves.values()) {
      all.push(...shelf);
    }
    return all.sort((a, b) => a.seq - b.seq).map(entry => entry.book);
  }
}
