/**
 * Kinds of node stored in a BDD node table.
 */
export const enum NodeKind {
  Terminal, // constant leaf, false or true
  Decision, // test of a single variable with low/high children
}

/**
 * Index of a node in its manager's node table. References are only
 * meaningful relative to the table that issued them.
 */
export type Ref = number;

/** Reference of the constant false terminal in every manager. */
export const FALSE: Ref = 0;

/** Reference of the constant true terminal in every manager. */
export const TRUE: Ref = 1;

/** Constant leaf. */
export type Terminal = { readonly kind: NodeKind.Terminal; readonly value: boolean };

/** Decision on `variable`: `low` is taken when it is 0, `high` when it is 1. */
export type Decision = {
  readonly kind: NodeKind.Decision;
  readonly variable: string;
  readonly low: Ref;
  readonly high: Ref;
};

export type BddNode = Terminal | Decision;

/**
 * Structural key of a node, used for deduplication in the unique table.
 */
export type NodeKey = `T:${0 | 1}` | `D:${string}:${number}:${number}`;

export function terminal(value: boolean): Terminal {
  return { kind: NodeKind.Terminal, value };
}

export function decision(variable: string, low: Ref, high: Ref): Decision {
  return { kind: NodeKind.Decision, variable, low, high };
}

export function isTerminal(node: BddNode): node is Terminal {
  return node.kind === NodeKind.Terminal;
}

export function nodeKey(node: BddNode): NodeKey {
  switch (node.kind) {
    case NodeKind.Terminal:
      return node.value ? 'T:1' : 'T:0';
    case NodeKind.Decision:
      return `D:${node.variable}:${node.low}:${node.high}`;
  }
}

/**
 * Renders a node for debugging, e.g. `Node(x, low=0, high=1)`.
 */
export function renderNode(node: BddNode): string {
  switch (node.kind) {
    case NodeKind.Terminal:
      return `Terminal(${node.value})`;
    case NodeKind.Decision:
      return `Node(${node.variable}, low=${node.low}, high=${node.high})`;
  }
}
