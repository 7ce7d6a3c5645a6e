/**
 * Issues `N0`, `N1`, ... for one generation run. A new run gets a new
 * allocator; ids are never reused within a run.
 */
export class NodeIdAllocator {
  private nodeIdCounter = 0;

  next(): string {
    return `N${this.nodeIdCounter++}`;
  }

  get issued(): number {
    return this.nodeIdCounter;
  }
}
