/**
 * Book record
 */

export interface Book {
  readonly title: string;
  readonly author: string;
  readonly year: string | number;
}

export function createBook(title: string, author: string, year: string | number): Book {
  return Object.freeze({ title, author, year });
}

export function formatBook(book: Book): string {
  return `Title: ${book.title}, Author: ${book.author}, Year: ${book.year}`;
}
