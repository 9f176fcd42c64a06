import { BddManager } from './manager';
import { type Ref } from './node';
import { type Classification, classify } from './analysis';
import { toDot, toListing } from './export';
import { debugLogger, LogComponent } from './debug-logger';

export interface BatchCase {
  name: string;
  formula: string;
  ordering: string[];
}

export type BatchResult =
  | {
      name: string;
      ok: true;
      root: Ref;
      nodeCount: number;
      classification: Classification;
      listing: string;
      dot: string;
    }
  | { name: string; ok: false; error: Error };

// x1..x5 with at least three of them true, written out as minterms
const AT_LEAST_3_OF_5 = [
  'x1 & x2 & x3 & ~x4 & ~x5',
  'x1 & x2 & ~x3 & x4 & ~x5',
  'x1 & x2 & ~x3 & ~x4 & x5',
  'x1 & ~x2 & x3 & x4 & ~x5',
  'x1 & ~x2 & x3 & ~x4 & x5',
  'x1 & ~x2 & ~x3 & x4 & x5',
  '~x1 & x2 & x3 & x4 & ~x5',
  '~x1 & x2 & x3 & ~x4 & x5',
  '~x1 & x2 & ~x3 & x4 & x5',
  '~x1 & ~x2 & x3 & x4 & x5',
  'x1 & x2 & x3 & x4 & ~x5',
  'x1 & x2 & x3 & ~x4 & x5',
  'x1 & x2 & ~x3 & x4 & x5',
  'x1 & ~x2 & x3 & x4 & x5',
  '~x1 & x2 & x3 & x4 & x5',
  'x1 & x2 & x3 & x4 & x5',
]
  .map((term) => `(${term})`)
  .join(' | ');

// 3-bit unsigned x > y, most significant bit first
const GREATER_THAN_3_BIT = [
  '(x1 & ~y1)',
  '((~(x1 ^ y1)) & x2 & ~y2)',
  '((~(x1 ^ y1)) & (~(x2 ^ y2)) & x3 & ~y3)',
].join(' | ');

export const defaultCases: readonly BatchCase[] = [
  {
    name: 'Formula1_XOR',
    formula: '(a & ~c) | (b ^ d)',
    ordering: ['a', 'b', 'c', 'd'],
  },
  {
    name: 'Formula2_AtLeast3of5',
    formula: AT_LEAST_3_OF_5,
    ordering: ['x1', 'x2', 'x3', 'x4', 'x5'],
  },
  {
    name: 'Formula3_Comparison',
    formula: GREATER_THAN_3_BIT,
    ordering: ['x1', 'y1', 'x2', 'y2', 'x3', 'y3'],
  },
  {
    name: 'Custom_Transitivity',
    formula: '((A -> B) & (B -> C)) -> (A -> C)',
    ordering: ['A', 'B', 'C'],
  },
  { name: 'Simple_AND', formula: 'a & b', ordering: ['a', 'b'] },
  { name: 'Simple_OR', formula: 'a | b', ordering: ['a', 'b'] },
  { name: 'Simple_XOR', formula: 'a ^ b', ordering: ['a', 'b'] },
];

/**
 * Builds every case in a fresh manager. A failing case is reported in its
 * result and does not stop the remaining ones.
 */
export function runBatch(cases: readonly BatchCase[]): BatchResult[] {
  return cases.map((c): BatchResult => {
    debugLogger.info(LogComponent.BATCH, `Running ${c.name}: ${c.formula}`);
    try {
      const manager = new BddManager(c.ordering);
      const root = manager.parse(c.formula);
      return {
        name: c.name,
        ok: true,
        root,
        nodeCount: manager.nodeCount(),
        classification: classify(manager, root),
        listing: toListing(manager, root),
        dot: toDot(manager, root),
      };
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      debugLogger.info(LogComponent.BATCH, `${c.name} failed: ${err.message}`);
      return { name: c.name, ok: false, error: err };
    }
  });
}
