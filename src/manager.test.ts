import { assert, expect } from 'chai';
import { BddManager } from './manager';
import { FALSE, NodeKind, TRUE } from './node';
import {
  InvalidOrderingError,
  UnexpectedTokenError,
  UnknownVariableError,
} from './errors';
import { TokenKind } from './parse';
import { reachable, satCount, support } from './analysis';

describe('manager.ts', () => {
  describe('construction', () => {
    it('creates the two terminals at fixed references', () => {
      const m = new BddManager(['a', 'b']);
      expect(m.FALSE).to.equal(0);
      expect(m.TRUE).to.equal(1);
      expect(m.nodeCount()).to.equal(2);
      expect(m.nodeAt(0)).to.deep.equal({ kind: NodeKind.Terminal, value: false });
      expect(m.nodeAt(1)).to.deep.equal({ kind: NodeKind.Terminal, value: true });
    });

    it('rejects duplicate and malformed variable names', () => {
      expect(() => new BddManager(['a', 'b', 'a'])).to.throw(InvalidOrderingError);
      expect(() => new BddManager(['a b'])).to.throw(InvalidOrderingError);
      expect(() => new BddManager([''])).to.throw(InvalidOrderingError);
    });

    it('returns a copy of the ordering', () => {
      const ordering = ['x', 'y'];
      const m = new BddManager(ordering);
      const copy = m.variableOrdering();
      copy.push('z');
      ordering.push('w');
      expect(m.variableOrdering()).to.deep.equal(['x', 'y']);
    });
  });

  describe('make', () => {
    it('returns the shared child when low equals high', () => {
      const m = new BddManager(['a', 'b']);
      const b = m.createVariable('b');
      const before = m.nodeCount();
      for (const r of [FALSE, TRUE, b]) {
        expect(m.make('a', r, r)).to.equal(r);
      }
      expect(m.nodeCount()).to.equal(before);
    });

    it('returns the same reference for the same triple', () => {
      const m = new BddManager(['a', 'b']);
      const b = m.createVariable('b');
      const first = m.make('a', FALSE, b);
      expect(m.make('a', FALSE, b)).to.equal(first);
      expect(m.nodeCount()).to.equal(first + 1);
    });
  });

  describe('createVariable', () => {
    it('builds a single decision node', () => {
      const m = new BddManager(['a', 'b']);
      const a = m.createVariable('a');
      expect(a).to.equal(2);
      expect(m.nodeAt(a)).to.deep.equal({
        kind: NodeKind.Decision,
        variable: 'a',
        low: FALSE,
        high: TRUE,
      });
      expect(m.createVariable('a')).to.equal(a);
    });

    it('throws UnknownVariableError outside the ordering', () => {
      const m = new BddManager(['a', 'b']);
      expect(() => m.createVariable('z'))
        .to.throw(UnknownVariableError)
        .with.property('variable', 'z');
    });
  });

  describe('level', () => {
    it('is the ordering position, or Infinity for terminals', () => {
      const m = new BddManager(['a', 'b']);
      expect(m.level(m.createVariable('b'))).to.equal(1);
      expect(m.level(m.createVariable('a'))).to.equal(0);
      expect(m.level(TRUE)).to.equal(Number.POSITIVE_INFINITY);
    });
  });

  describe('apply', () => {
    const operands = (m: BddManager) => {
      const a = m.createVariable('a');
      const b = m.createVariable('b');
      return [FALSE, TRUE, a, b, m.and(a, b), m.xor(a, b), m.not(a)];
    };

    it('satisfies the terminal identities', () => {
      const m = new BddManager(['a', 'b']);
      for (const x of operands(m)) {
        expect(m.and(TRUE, x)).to.equal(x);
        expect(m.and(x, TRUE)).to.equal(x);
        expect(m.and(FALSE, x)).to.equal(FALSE);
        expect(m.or(TRUE, x)).to.equal(TRUE);
        expect(m.or(FALSE, x)).to.equal(x);
      }
    });

    it('negates twice back to the same reference', () => {
      const m = new BddManager(['a', 'b']);
      for (const x of operands(m)) {
        expect(m.not(m.not(x))).to.equal(x);
      }
    });

    it('agrees with De Morgan for every pair', () => {
      const m = new BddManager(['a', 'b']);
      const xs = operands(m);
      for (const x of xs) {
        for (const y of xs) {
          expect(m.or(x, y)).to.equal(m.not(m.and(m.not(x), m.not(y))));
          expect(m.and(x, y)).to.equal(m.and(y, x));
        }
      }
    });

    it('builds the canonical diagram of xor', () => {
      const m = new BddManager(['a', 'b']);
      const a = m.createVariable('a');
      const b = m.createVariable('b');
      const x = m.xor(a, b);
      expect(m.nodeAt(x)).to.deep.equal({
        kind: NodeKind.Decision,
        variable: 'a',
        low: b,
        high: m.not(b),
      });
    });

    it('derives implies and iff from the basic operators', () => {
      const m = new BddManager(['a', 'b']);
      const a = m.createVariable('a');
      const b = m.createVariable('b');
      expect(m.implies(a, b)).to.equal(m.or(m.not(a), b));
      expect(m.iff(a, b)).to.equal(m.not(m.xor(a, b)));
      expect(m.implies(a, a)).to.equal(TRUE);
      expect(m.iff(a, m.not(a))).to.equal(FALSE);
    });

    it('produces identical tables with and without the cache', () => {
      const formulas = [
        '((x1 & ~y1) | ((~(x1 ^ y1)) & x2 & ~y2)) <-> (x2 -> y1)',
        '(x1 | y1) & (x2 | y2) & ~(x1 & y2)',
        'x1 ^ y1 ^ x2 ^ y2',
      ];
      const ordering = ['x1', 'y1', 'x2', 'y2'];
      const cached = new BddManager(ordering);
      const uncached = new BddManager(ordering, { memoize: false });

      for (const f of formulas) {
        expect(uncached.parse(f)).to.equal(cached.parse(f));
      }
      expect([...uncached.nodes()]).to.deep.equal([...cached.nodes()]);
    });
  });

  describe('parse', () => {
    it('detects tautologies and contradictions', () => {
      const m = new BddManager(['a']);
      expect(m.parse('a | ~a')).to.equal(1);
      expect(m.parse('a & ~a')).to.equal(0);
      assert.isTrue(m.isTrue(m.parse('a -> a')));
      assert.isTrue(m.isFalse(m.parse('a ^ a')));
    });

    it('proves transitivity of implication under every ordering', () => {
      const orderings = [
        ['A', 'B', 'C'],
        ['A', 'C', 'B'],
        ['B', 'A', 'C'],
        ['B', 'C', 'A'],
        ['C', 'A', 'B'],
        ['C', 'B', 'A'],
      ];
      for (const ordering of orderings) {
        const m = new BddManager(ordering);
        expect(m.parse('((A -> B) & (B -> C)) -> (A -> C)')).to.equal(TRUE);
      }
    });

    it('returns the same reference for equivalent formulas', () => {
      const m = new BddManager(['a', 'b', 'c']);
      expect(m.parse('a & b')).to.equal(m.parse('b & a'));
      expect(m.parse('~(a | b)')).to.equal(m.parse('~a & ~b'));
      expect(m.parse('a -> b')).to.equal(m.parse('~a | b'));
      expect(m.parse('a <-> b')).to.equal(m.parse('~(a ^ b)'));
      expect(m.parse('a & (b | c)')).to.equal(m.parse('(a & b) | (a & c)'));
    });

    it('builds a non-constant xor with one decision per distinct subfunction', () => {
      const m = new BddManager(['a', 'b']);
      const root = m.parse('a ^ b');
      assert.isFalse(m.isTrue(root));
      assert.isFalse(m.isFalse(root));
      expect(support(m, root)).to.deep.equal(['a', 'b']);
      expect(satCount(m, root)).to.equal(2n);

      const decisions = reachable(m, root).filter(
        (r) => m.nodeAt(r).kind === NodeKind.Decision
      );
      expect(decisions.map((r) => m.level(r))).to.deep.equal([0, 1, 1]);
    });

    it('throws UnknownVariableError for identifiers outside the ordering', () => {
      const m = new BddManager(['a', 'b']);
      expect(() => m.parse('a & z'))
        .to.throw(UnknownVariableError)
        .with.property('variable', 'z');
    });

    it('throws UnexpectedTokenError for malformed formulas', () => {
      const m = new BddManager(['a', 'b']);
      expect(() => m.parse('(a & b')).to.throw(UnexpectedTokenError);
      expect(() => m.parse('')).to.throw(UnexpectedTokenError);
      expect(() => m.parse('a &')).to.throw(
        "unexpected end of formula at 2, expected variable or '('"
      );
      expect(() => m.parse('a)'))
        .to.throw(UnexpectedTokenError)
        .with.property('token')
        .that.deep.equals({ kind: TokenKind.RPAREN, value: ')', pos: 1 });
    });

    it('keeps the table usable after a failed parse', () => {
      const m = new BddManager(['a', 'b']);
      expect(() => m.parse('(a & b) | z')).to.throw(UnknownVariableError);
      const root = m.parse('a & b');
      expect(root).to.equal(m.and(m.createVariable('a'), m.createVariable('b')));
      for (const r of reachable(m, root)) {
        expect(r).to.be.below(m.nodeCount());
      }
    });
  });
});
