import { type Ref, NodeKind } from './node';
import { UnassignedVariableError } from './errors';
import type { BddManager } from './manager';

export type Classification = 'tautology' | 'contradiction' | 'contingent';

/**
 * Returns every reference reachable from `root`, each once, in depth-first
 * order with the root first and low children visited before high ones.
 */
export function reachable(manager: BddManager, root: Ref): Ref[] {
  const visited = new Set<Ref>();
  const out: Ref[] = [];

  const go = (ref: Ref) => {
    if (visited.has(ref)) return;
    visited.add(ref);
    out.push(ref);
    const node = manager.nodeAt(ref);
    if (node.kind !== NodeKind.Decision) return;
    go(node.low);
    go(node.high);
  };

  go(root);
  return out;
}

/**
 * Evaluates the function at `root` under an assignment. Only the variables
 * tested along the followed path need a value.
 */
export function evaluate(
  manager: BddManager,
  root: Ref,
  assignment: Readonly<Record<string, boolean>>
): boolean {
  let node = manager.nodeAt(root);
  while (node.kind === NodeKind.Decision) {
    const value = Object.hasOwn(assignment, node.variable)
      ? assignment[node.variable]
      : undefined;
    if (value === undefined) throw new UnassignedVariableError(node.variable);
    node = manager.nodeAt(value ? node.high : node.low);
  }
  return node.value;
}

/**
 * Counts the satisfying assignments of `root` over the manager's whole
 * variable ordering.
 */
export function satCount(manager: BddManager, root: Ref): bigint {
  const width = manager.variableOrdering().length;
  const levelOf = (ref: Ref) => Math.min(manager.level(ref), width);
  const memo = new Map<Ref, bigint>();

  // assignments to the variables from this node's level downwards
  const count = (ref: Ref): bigint => {
    const cached = memo.get(ref);
    if (cached !== undefined) return cached;

    const node = manager.nodeAt(ref);
    let res: bigint;
    if (node.kind === NodeKind.Terminal) {
      res = node.value ? 1n : 0n;
    } else {
      const lvl = levelOf(ref);
      const skipped = (child: Ref) => BigInt(levelOf(child) - lvl - 1);
      res =
        (count(node.low) << skipped(node.low)) +
        (count(node.high) << skipped(node.high));
    }
    memo.set(ref, res);
    return res;
  };

  return count(root) << BigInt(levelOf(root));
}

/**
 * Returns one satisfying partial assignment of `root`, preferring low
 * edges, or undefined when the function is unsatisfiable.
 */
export function anySat(
  manager: BddManager,
  root: Ref
): Record<string, boolean> | undefined {
  if (manager.isFalse(root)) return undefined;

  const path: [string, boolean][] = [];
  let node = manager.nodeAt(root);
  while (node.kind === NodeKind.Decision) {
    const takeHigh = manager.isFalse(node.low);
    path.push([node.variable, takeHigh]);
    node = manager.nodeAt(takeHigh ? node.high : node.low);
  }
  // own data properties, so a variable named __proto__ is kept
  return Object.fromEntries(path);
}

/**
 * Variables the function at `root` depends on, in ordering order.
 */
export function support(manager: BddManager, root: Ref): string[] {
  const vars = new Set<string>();
  for (const ref of reachable(manager, root)) {
    const node = manager.nodeAt(ref);
    if (node.kind === NodeKind.Decision) vars.add(node.variable);
  }
  return manager.variableOrdering().filter((v) => vars.has(v));
}

export function classify(manager: BddManager, root: Ref): Classification {
  if (manager.isTrue(root)) return 'tautology';
  if (manager.isFalse(root)) return 'contradiction';
  return 'contingent';
}
