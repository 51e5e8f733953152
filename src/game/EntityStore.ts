/**
 * Indexed storage for short-lived entities (bullets, power-ups).
 * Ids are handed out monotonically and never reused within a store's lifetime, so a stale id
 * simply misses instead of aliasing a newer entity. `values()` returns a snapshot, which keeps
 * removal during iteration well-defined.
 */
export class EntityStore<T extends { id: number }> {
  private readonly items = new Map<number, T>();
  private nextId = 1;

  /** Reserve the id the next `add` call should use. */
  allocateId(): number {
    return this.nextId++;
  }

  add(entity: T): T {
    if (this.items.has(entity.id)) {
      throw new RangeError(`EntityStore: duplicate id ${entity.id}`);
    }
    this.items.set(entity.id, entity);
    return entity;
  }

  get(id: number): T | undefined {
    return this.items.get(id);
  }

  has(id: number): boolean {
    return this.items.has(id);
  }

  remove(id: number): boolean {
    return this.items.delete(id);
  }

  /** Removes every entity matching `pred`; returns the removed ones in insertion order. */
  removeWhere(pred: (entity: T) => boolean): T[] {
    const removed: T[] = [];
    for (const entity of this.values()) {
      if (pred(entity)) {
        this.items.delete(entity.id);
        removed.push(entity);
      }
    }
    return removed;
  }

  values(): T[] {
    return Array.from(this.items.values());
  }

  clear(): void {
    this.items.clear();
  }

  get size(): number {
    return this.items.size;
  }
}
