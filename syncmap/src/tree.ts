/**
 * Generic ordered multi-way tree. The root of a sync map carries no value;
 * every other node carries one fragment.
 */
export class Tree<T> {
  private parentNode: Tree<T> | undefined;
  private readonly childNodes: Tree<T>[] = [];

  constructor(public value?: T) {}

  get parent(): Tree<T> | undefined {
    return this.parentNode;
  }

  get children(): readonly Tree<T>[] {
    return this.childNodes;
  }

  get isRoot(): boolean {
    return this.parentNode === undefined;
  }

  get isLeaf(): boolean {
    return this.childNodes.length === 0;
  }

  /** True if this node carries no value */
  get isEmpty(): boolean {
    return this.value === undefined;
  }

  /**
   * Children carrying a value, in order. A valueless (structural) child is
   * skipped, and its own non-empty children take its place.
   */
  get childrenNotEmpty(): Tree<T>[] {
    const result: Tree<T>[] = [];
    for (const child of this.childNodes) {
      if (child.isEmpty) {
        result.push(...child.childrenNotEmpty);
      } else {
        result.push(child);
      }
    }
    return result;
  }

  get vchildrenNotEmpty(): T[] {
    const values: T[] = [];
    for (const child of this.childrenNotEmpty) {
      if (child.value !== undefined) {
        values.push(child.value);
      }
    }
    return values;
  }

  /** Number of levels: 1 for a lone node */
  get height(): number {
    let childHeight = 0;
    for (const child of this.childNodes) {
      childHeight = Math.max(childHeight, child.height);
    }
    return childHeight + 1;
  }

  /**
   * Attach a node as the last (or first) child.
   * The node is detached from its previous parent first.
   */
  addChild(node: Tree<T>, asLast = true): void {
    if (node === this) {
      throw new Error('Cannot add a tree node as a child of itself');
    }
    for (let ancestor = this.parentNode; ancestor; ancestor = ancestor.parentNode) {
      if (ancestor === node) {
        throw new Error('Cannot add an ancestor of a tree node as its child');
      }
    }
    node.parentNode?.removeChild(node);
    node.parentNode = this;
    if (asLast) {
      this.childNodes.push(node);
    } else {
      this.childNodes.unshift(node);
    }
  }

  removeChild(node: Tree<T>): void {
    const index = this.childNodes.indexOf(node);
    if (index === -1) {
      return;
    }
    this.childNodes.splice(index, 1);
    node.parentNode = undefined;
  }

  removeChildren(): void {
    for (const child of this.childNodes) {
      child.parentNode = undefined;
    }
    this.childNodes.length = 0;
  }

  /** Visit every node depth first, siblings in order, starting with this one */
  *preOrder(): Generator<Tree<T>> {
    yield this;
    for (const child of this.childNodes) {
      yield* child.preOrder();
    }
  }
}
