/**
 * StateMap.ts - Keyed contract storage with an undo journal
 *
 * Contracts keep their maps (tree nodes, nullifiers, bets, balances) in
 * StateMaps. `checkpoint()` starts a fresh journal and returns a closure that
 * undoes every write made since, which is how the ledger rolls back a failed
 * transaction without copying whole maps.
 */

export class StateMap<V> {
  private entries = new Map<string, V>();
  private journal: Array<[string, V | undefined]> | undefined;

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: V): void {
    this.record(key);
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    if (!this.entries.has(key)) return false;
    this.record(key);
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  values(): V[] {
    return [...this.entries.values()];
  }

  checkpoint(): () => void {
    const journal: Array<[string, V | undefined]> = [];
    this.journal = journal;

    return () => {
      for (let i = journal.length - 1; i >= 0; i--) {
        const [key, previous] = journal[i];
        if (previous === undefined) {
          this.entries.delete(key);
        } else {
          this.entries.set(key, previous);
        }
      }
      journal.length = 0;
    };
  }

  private record(key: string) {
    this.journal?.push([key, this.entries.get(key)]);
  }
}
