import { type BddNode, type NodeKey, type Ref, nodeKey, renderNode } from './node';
import { OutOfRangeError } from './errors';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * Append-only store of BDD nodes with structural deduplication. Every node
 * is stored at most once, so two references are equal exactly when the
 * nodes they address are structurally equal.
 */
export class NodeTable {
  private readonly nodes: BddNode[] = [];
  private readonly index: Map<NodeKey, Ref> = new Map();

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Returns the reference of an equal stored node, or appends the node and
   * returns its new reference.
   */
  add(node: BddNode): Ref {
    const key = nodeKey(node);
    const existing = this.index.get(key);
    if (existing !== undefined) return existing;

    const ref = this.nodes.length;
    this.nodes.push(node);
    this.index.set(key, ref);

    debugLogger.logNode(LogComponent.TABLE, LogLevel.TRACE, 'Added', ref, () =>
      renderNode(node)
    );
    return ref;
  }

  /**
   * Looks up a node by reference and throws if the reference was never issued.
   */
  get(ref: Ref): BddNode {
    const node = Number.isInteger(ref) ? this.nodes[ref] : undefined;
    if (node === undefined) throw new OutOfRangeError(ref, this.nodes.length);
    return node;
  }

  has(ref: Ref): boolean {
    return Number.isInteger(ref) && ref >= 0 && ref < this.nodes.length;
  }

  *entries(): IterableIterator<[Ref, BddNode]> {
    for (let ref = 0; ref < this.nodes.length; ref++) {
      const node = this.nodes[ref];
      if (node !== undefined) yield [ref, node];
    }
  }
}
