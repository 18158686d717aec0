/**
 * Page accumulator
 *
 * A page is built in two phases. The build phase collects the HTML of every
 * tile together with the UI actions that wire the tiles up. The document is
 * then sent to the browser in one response, and once the browser's session
 * is live the actions run against it, each registering its handlers on
 * elements the tiles already rendered, addressed by element ID.
 *
 * Appends are prepends on an internal list; the accessors hand the items back
 * in the order they were added.
 */

import { ClientSession } from './client-session';

/** HTML for one self-contained dashboard widget */
export type HtmlFragment = string;

/** Registration step run once the page's markup is live in a browser session */
export type UIAction = (session: ClientSession) => void | Promise<void>;

interface Cons<T> {
  head: T;
  tail: Cons<T> | null;
}

function toArray<T>(list: Cons<T> | null): T[] {
  const out: T[] = [];
  for (let node = list; node; node = node.tail) {
    out.push(node.head);
  }
  return out.reverse();
}

export class PageAccumulator {
  private tileList: Cons<HtmlFragment> | null = null;
  private actionList: Cons<UIAction> | null = null;
  private tileCount = 0;
  private actionCount = 0;

  addTile(fragment: HtmlFragment): void {
    this.tileList = { head: fragment, tail: this.tileList };
    this.tileCount++;
  }

  addAction(action: UIAction): void {
    this.actionList = { head: action, tail: this.actionList };
    this.actionCount++;
  }

  get tiles(): HtmlFragment[] {
    return toArray(this.tileList);
  }

  get actions(): UIAction[] {
    return toArray(this.actionList);
  }

  get size(): { tiles: number; actions: number } {
    return { tiles: this.tileCount, actions: this.actionCount };
  }

  /**
   * Run every action against the session in the order added, then send the
   * scripts they buffered in one message.
   */
  async runActions(session: ClientSession): Promise<void> {
    for (const action of this.actions) {
      await action(session);
    }
    session.flush();
  }
}
