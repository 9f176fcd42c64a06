import {
  type BddNode,
  type Ref,
  FALSE,
  TRUE,
  NodeKind,
  decision,
  renderNode,
  terminal,
} from './node';
import { NodeTable } from './node-table';
import { InvalidOrderingError, UnknownVariableError } from './errors';
import { type FormulaBuilder, isIdentifier, parseFormula } from './parse';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

export interface BddManagerOptions {
  /**
   * Caches NOT and AND results per manager. Results are identical either
   * way; only the amount of recomputation changes. Defaults to true.
   */
  memoize?: boolean;
}

type ApplyKey = `${Ref},${Ref}`;

/**
 * Builds and combines reduced ordered BDDs over a fixed variable ordering.
 *
 * All diagrams built by one manager live in a single deduplicating node
 * table and are addressed by integer references, so two diagrams denote the
 * same Boolean function exactly when their references are equal.
 */
export class BddManager implements FormulaBuilder<Ref> {
  readonly FALSE: Ref;
  readonly TRUE: Ref;

  private readonly ordering: readonly string[];
  private readonly levels: ReadonlyMap<string, number>;
  private readonly table = new NodeTable();

  private readonly memoize: boolean;
  private readonly notMemo = new Map<Ref, Ref>();
  private readonly andMemo = new Map<ApplyKey, Ref>();

  /**
   * @param ordering - distinct variable names; earlier names are tested
   *   closer to the root
   */
  constructor(ordering: readonly string[], options: BddManagerOptions = {}) {
    const levels = new Map<string, number>();
    ordering.forEach((name, level) => {
      if (!isIdentifier(name))
        throw new InvalidOrderingError(name, 'is not a valid identifier');
      if (levels.has(name))
        throw new InvalidOrderingError(name, 'appears more than once');
      levels.set(name, level);
    });

    this.ordering = [...ordering];
    this.levels = levels;
    this.memoize = options.memoize ?? true;

    this.FALSE = this.table.add(terminal(false));
    this.TRUE = this.table.add(terminal(true));

    debugLogger.info(
      LogComponent.MANAGER,
      `Created manager over [${this.ordering.join(', ')}]`
    );
  }

  /**
   * Returns the decision node for (variable, low, high), or `low` itself
   * when both children coincide. The variable must precede the top
   * variables of both children in the ordering.
   */
  make(variable: string, low: Ref, high: Ref): Ref {
    if (low === high) return low;
    const ref = this.table.add(decision(variable, low, high));
    debugLogger.logNode(LogComponent.MAKE, LogLevel.TRACE, 'Made', ref, () =>
      renderNode(this.table.get(ref))
    );
    return ref;
  }

  /**
   * Returns the diagram of a single variable.
   */
  createVariable(name: string): Ref {
    if (!this.levels.has(name))
      throw new UnknownVariableError(name, this.ordering);
    return this.make(name, FALSE, TRUE);
  }

  /** Alias of {@link createVariable} used by the formula parser. */
  variable(name: string): Ref {
    return this.createVariable(name);
  }

  /**
   * Level of the variable tested at `ref`, or Infinity for terminals.
   */
  level(ref: Ref): number {
    const node = this.table.get(ref);
    if (node.kind === NodeKind.Terminal) return Number.POSITIVE_INFINITY;
    return this.levels.get(node.variable) ?? Number.POSITIVE_INFINITY;
  }

  not(a: Ref): Ref {
    const cached = this.memoize ? this.notMemo.get(a) : undefined;
    if (cached !== undefined) return cached;

    const node = this.table.get(a);
    const res =
      node.kind === NodeKind.Terminal
        ? node.value
          ? FALSE
          : TRUE
        : this.make(node.variable, this.not(node.low), this.not(node.high));

    if (this.memoize) this.notMemo.set(a, res);
    return res;
  }

  and(a: Ref, b: Ref): Ref {
    if (a === FALSE || b === FALSE) return FALSE;
    if (a === TRUE) return b;
    if (b === TRUE) return a;

    const key: ApplyKey = `${a},${b}`;
    const cached = this.memoize ? this.andMemo.get(key) : undefined;
    if (cached !== undefined) return cached;

    const an = this.table.get(a);
    const bn = this.table.get(b);
    if (an.kind !== NodeKind.Decision || bn.kind !== NodeKind.Decision)
      throw new Error(`Internal error: terminal #${a} or #${b} in apply`);
    const aLevel = this.level(a);
    const bLevel = this.level(b);

    let res: Ref;
    if (aLevel === bLevel) {
      res = this.make(
        an.variable,
        this.and(an.low, bn.low),
        this.and(an.high, bn.high)
      );
    } else if (aLevel < bLevel) {
      res = this.make(an.variable, this.and(an.low, b), this.and(an.high, b));
    } else {
      res = this.make(bn.variable, this.and(a, bn.low), this.and(a, bn.high));
    }

    debugLogger.trace(LogComponent.APPLY, `and(${a}, ${b}) = ${res}`);
    if (this.memoize) this.andMemo.set(key, res);
    return res;
  }

  /** De Morgan: a | b = ~(~a & ~b). */
  or(a: Ref, b: Ref): Ref {
    return this.not(this.and(this.not(a), this.not(b)));
  }

  /** a ^ b = (a & ~b) | (~a & b). */
  xor(a: Ref, b: Ref): Ref {
    return this.or(this.and(a, this.not(b)), this.and(this.not(a), b));
  }

  /** a -> b = ~a | b. */
  implies(a: Ref, b: Ref): Ref {
    return this.or(this.not(a), b);
  }

  /** a <-> b = (a -> b) & (b -> a). */
  iff(a: Ref, b: Ref): Ref {
    return this.and(this.implies(a, b), this.implies(b, a));
  }

  /**
   * Builds the diagram of a textual formula, see {@link parseFormula}.
   */
  parse(formula: string): Ref {
    const root = parseFormula(formula, this);
    debugLogger.debug(
      LogComponent.MANAGER,
      `Parsed '${formula}' to #${root} (${this.table.size} nodes in table)`
    );
    return root;
  }

  nodeCount(): number {
    return this.table.size;
  }

  nodeAt(ref: Ref): BddNode {
    return this.table.get(ref);
  }

  /** Every stored node with its reference, in index order. */
  nodes(): IterableIterator<[Ref, BddNode]> {
    return this.table.entries();
  }

  isTrue(ref: Ref): boolean {
    return ref === TRUE;
  }

  isFalse(ref: Ref): boolean {
    return ref === FALSE;
  }

  variableOrdering(): string[] {
    return [...this.ordering];
  }
}
