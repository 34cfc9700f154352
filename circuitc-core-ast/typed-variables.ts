import type { Hashable } from 'circuitc-core-utils';

export type ValueKind = 'field' | 'bool';

/**
 * A variable is identified by its name together with its kind.
 * `field x` and `bool x` are different variables.
 */
export class Variable implements Hashable {
  constructor(public readonly name: string, public readonly kind: ValueKind) {}

  static fieldElement(name: string): Variable {
    return new Variable(name, 'field');
  }

  static boolean(name: string): Variable {
    return new Variable(name, 'bool');
  }

  uniqueHash(): string {
    return `${this.kind}:${this.name}`;
  }

  toString(): string {
    return `${this.kind} ${this.name}`;
  }
}
