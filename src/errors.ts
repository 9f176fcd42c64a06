import type { Token } from './parse';
import type { Ref } from './node';

export enum BddErrorKind {
  UnknownVariable = 'UnknownVariable',
  UnexpectedToken = 'UnexpectedToken',
  OutOfRange = 'OutOfRange',
  InvalidOrdering = 'InvalidOrdering',
  UnassignedVariable = 'UnassignedVariable',
}

/**
 * Base class of every error raised by the BDD manager, its parser and the
 * read-only queries built on top of them.
 */
export abstract class BddError extends Error {
  abstract readonly kind: BddErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Represents a variable that is not part of the manager's ordering.
 */
export class UnknownVariableError extends BddError {
  readonly kind = BddErrorKind.UnknownVariable;

  constructor(
    public readonly variable: string,
    public readonly ordering: readonly string[]
  ) {
    super(
      `unknown variable '${variable}', expected one of [${ordering.join(', ')}]`
    );
  }
}

/**
 * Represents a token that does not fit the grammar at its position. An EOF
 * token means the formula ended early.
 */
export class UnexpectedTokenError extends BddError {
  readonly kind = BddErrorKind.UnexpectedToken;

  constructor(
    public readonly token: Token,
    public readonly expected: string
  ) {
    super(
      token.value === ''
        ? `unexpected end of formula at ${token.pos}, expected ${expected}`
        : `unexpected '${token.value}' at ${token.pos}, expected ${expected}`
    );
  }
}

/**
 * Represents a lookup of a reference the node table never issued.
 */
export class OutOfRangeError extends BddError {
  readonly kind = BddErrorKind.OutOfRange;

  constructor(
    public readonly ref: Ref,
    public readonly size: number
  ) {
    super(`reference ${ref} is out of range for a table of ${size} nodes`);
  }
}

/**
 * Represents a variable ordering with duplicate or malformed identifiers.
 */
export class InvalidOrderingError extends BddError {
  readonly kind = BddErrorKind.InvalidOrdering;

  constructor(
    public readonly variable: string,
    reason: string
  ) {
    super(`invalid variable ordering: '${variable}' ${reason}`);
  }
}

/**
 * Represents a decision on a variable the caller gave no value for.
 */
export class UnassignedVariableError extends BddError {
  readonly kind = BddErrorKind.UnassignedVariable;

  constructor(public readonly variable: string) {
    super(`no value assigned to variable '${variable}'`);
  }
}
