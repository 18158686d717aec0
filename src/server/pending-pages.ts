/**
 * Pending pages
 *
 * Pages whose document has been sent but whose browser session has not
 * attached yet. Each page is filed under a random token that the document's
 * runtime announces when it connects. A token can be claimed once; pages
 * nobody claims within the TTL are dropped.
 */

import * as crypto from 'crypto';
import { PageAccumulator } from '../web/page';

interface PendingPage {
  page: PageAccumulator;
  expiresAt: number;
}

export class PendingPages {
  private pages = new Map<string, PendingPage>();
  private ttlMs: number;
  private now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get size(): number {
    return this.pages.size;
  }

  store(page: PageAccumulator): string {
    this.sweep();
    const token = crypto.randomBytes(16).toString('hex');
    this.pages.set(token, { page, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  /** Take the page filed under the token; undefined when unknown, claimed or expired */
  claim(token: string): PageAccumulator | undefined {
    this.sweep();
    const entry = this.pages.get(token);
    if (!entry) return undefined;
    this.pages.delete(token);
    return entry.page;
  }

  /** Drop expired pages; returns how many were dropped */
  sweep(): number {
    const now = this.now();
    let dropped = 0;
    for (const [token, entry] of this.pages) {
      if (entry.expiresAt <= now) {
        this.pages.delete(token);
        dropped++;
      }
    }
    return dropped;
  }
}
