import { BookLock } from "./bookLock.js";
import { OrderBook } from "./orderBook.js";

/**
 * Owns every order book (one per symbol), the lock that guards each one and
 * the system-wide order id index used to find an order's book.
 */
export class BookRegistry {
  private books = new Map<string, OrderBook>();
  private locks = new Map<string, BookLock>();
  private orderSymbols = new Map<number, string>();

  getOrCreateBook(symbol: string): OrderBook {
    let book = this.books.get(symbol);
    if (!book) {
      book = new OrderBook(symbol);
      this.books.set(symbol, book);
    }
    return book;
  }

  getBook(symbol: string): OrderBook | undefined {
    return this.books.get(symbol);
  }

  symbols(): string[] {
    return [...this.books.keys()];
  }

  get lockCount(): number {
    return this.locks.size;
  }

  /**
   * Run `fn` under the symbol's lock. A lock left idle for a symbol that
   * still has no book is dropped, so lookups of unknown symbols leave
   * nothing behind.
   */
  async runExclusive<T>(symbol: string, fn: () => T | Promise<T>): Promise<T> {
    const lock = this.lockFor(symbol);
    try {
      return await lock.runExclusive(fn);
    } finally {
      if (lock.pending === 0 && !this.books.has(symbol) && this.locks.get(symbol) === lock) {
        this.locks.delete(symbol);
      }
    }
  }

  lockFor(symbol: string): BookLock {
    let lock = this.locks.get(symbol);
    if (!lock) {
      lock = new BookLock();
      this.locks.set(symbol, lock);
    }
    return lock;
  }

  /* ───────── Order id index ───────── */

  symbolOf(orderId: number): string | undefined {
    return this.orderSymbols.get(orderId);
  }

  track(orderId: number, symbol: string): void {
    this.orderSymbols.set(orderId, symbol);
  }

  untrack(orderId: number): void {
    this.orderSymbols.delete(orderId);
  }
}
