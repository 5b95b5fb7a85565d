import type { CombatantId } from "../domain/types";

/**
 * Initiative list by stable id. Units in [cursor, dueEnd) are still due this
 * round; units that ended their turn sit after dueEnd. Entries before the
 * cursor are units skipped this round (dead ones).
 */
export class TurnOrder {
  private ids: CombatantId[] = [];
  private cursorIndex = 0;
  private dueEnd = 0;

  reset(ids: readonly CombatantId[]): void {
    this.ids = [...ids];
    this.cursorIndex = 0;
    this.dueEnd = this.ids.length;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get length(): number {
    return this.ids.length;
  }

  /** every due unit has been consumed: the round is over */
  get exhausted(): boolean {
    return this.cursorIndex >= this.dueEnd;
  }

  toArray(): CombatantId[] {
    return [...this.ids];
  }

  has(id: CombatantId): boolean {
    return this.ids.includes(id);
  }

  current(): CombatantId | null {
    return this.exhausted ? null : this.ids[this.cursorIndex];
  }

  /** still-due ids starting at the cursor */
  due(): CombatantId[] {
    return this.ids.slice(this.cursorIndex, this.dueEnd);
  }

  skipCurrent(): void {
    if (!this.exhausted) this.cursorIndex += 1;
  }

  startNextRound(): void {
    this.cursorIndex = 0;
    this.dueEnd = this.ids.length;
  }

  remove(id: CombatantId): boolean {
    const idx = this.ids.indexOf(id);
    if (idx === -1) return false;
    this.ids.splice(idx, 1);
    if (idx < this.cursorIndex) this.cursorIndex -= 1;
    if (idx < this.dueEnd) this.dueEnd -= 1;
    return true;
  }

  /** Moves `id` behind everyone: it is no longer due this round. */
  requeue(id: CombatantId): boolean {
    if (!this.remove(id)) return false;
    this.ids.push(id);
    return true;
  }

  /**
   * Inserts `id` among the due units, after every unit that does not sort
   * strictly after it, so equal keys keep their existing order.
   */
  insertDue(id: CombatantId, compare: (a: CombatantId, b: CombatantId) => number): void {
    let at = this.dueEnd;
    for (let i = this.cursorIndex; i < this.dueEnd; i++) {
      if (compare(id, this.ids[i]) < 0) {
        at = i;
        break;
      }
    }
    this.ids.splice(at, 0, id);
    this.dueEnd += 1;
  }
}
