import { type Ref, NodeKind } from './node';
import type { BddManager } from './manager';
import { reachable } from './analysis';
import { debugLogger, LogComponent } from './debug-logger';

const RULE = '='.repeat(50);

/**
 * Renders the whole node table of a manager as a plain-text listing,
 * headed by a summary of the diagram at `root`.
 */
export function toListing(manager: BddManager, root: Ref): string {
  const lines: string[] = [
    RULE,
    'ROBDD Output',
    RULE,
    '',
    `Variable ordering: [${manager.variableOrdering().join(', ')}]`,
    `Root node index: ${root}`,
    `Total nodes: ${manager.nodeCount()}`,
    '',
  ];

  if (manager.isTrue(root)) {
    lines.push('Result: TAUTOLOGY (always TRUE)', '');
  } else if (manager.isFalse(root)) {
    lines.push('Result: CONTRADICTION (always FALSE)', '');
  }

  lines.push('Node listing:', '-'.repeat(40));
  for (const [ref, node] of manager.nodes()) {
    switch (node.kind) {
      case NodeKind.Terminal:
        lines.push(
          `  [${ref}] Terminal: ${node.value ? '1 (TRUE)' : '0 (FALSE)'}`
        );
        break;
      case NodeKind.Decision:
        lines.push(
          `  [${ref}] Variable: ${node.variable}`,
          `        Low (0) -> ${node.low}`,
          `        High (1) -> ${node.high}`
        );
        break;
    }
  }

  debugLogger.debug(
    LogComponent.EXPORT,
    `Listed ${manager.nodeCount()} nodes for root #${root}`
  );
  return lines.join('\n') + '\n';
}

/**
 * Renders the diagram at `root` in Graphviz DOT. Both terminals are always
 * drawn; decision nodes only when reachable from the root.
 */
export function toDot(manager: BddManager, root: Ref): string {
  const lines: string[] = [
    'digraph BDD {',
    '    rankdir=TB;',
    '    node [shape=circle];',
    '',
    '    // Terminal nodes',
    `    ${manager.FALSE} [label="0", shape=box, style=filled, fillcolor="#ffcccc"];`,
    `    ${manager.TRUE} [label="1", shape=box, style=filled, fillcolor="#ccffcc"];`,
    '',
    '    // Decision nodes and edges',
  ];

  let drawn = 0;
  for (const ref of reachable(manager, root)) {
    const node = manager.nodeAt(ref);
    if (node.kind !== NodeKind.Decision) continue;
    drawn++;
    lines.push(
      `    ${ref} [label="${node.variable}"];`,
      `    ${ref} -> ${node.low} [style=dashed, color=red, label="0"];`,
      `    ${ref} -> ${node.high} [style=solid, color=blue, label="1"];`
    );
  }
  lines.push('}');

  debugLogger.debug(
    LogComponent.EXPORT,
    `Drew ${drawn} decision nodes for root #${root}`
  );
  return lines.join('\n') + '\n';
}
