import type { AllocatedResource } from './types';

/**
 * Ordered record of the external resources currently held
 * Appended during acquisition, consumed last-in-first-out during teardown
 */
export class ResourceStack {
  private entries: AllocatedResource[] = [];

  push(resource: AllocatedResource): void {
    this.entries.push(resource);
  }

  /**
   * Most recently acquired entry, left in place
   */
  peek(): AllocatedResource | undefined {
    return this.entries[this.entries.length - 1];
  }

  pop(): AllocatedResource | undefined {
    return this.entries.pop();
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Entries in acquisition order (bottom of the stack first)
   */
  snapshot(): readonly AllocatedResource[] {
    return [...this.entries];
  }
}
