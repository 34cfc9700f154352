import { debugPrintTypedExpression, FieldElementExpression } from 'circuitc-core-ast';

export abstract class CompileTimeError<T = string> {
  constructor(
    public readonly errorType: T,
    public readonly functionName: string,
    public readonly reason: string
  ) {}

  toString(): string {
    return `${this.functionName}: [${this.errorType}]: ${this.reason}`;
  }
}

export class DivisionByZeroError extends CompileTimeError<'DivisionByZero'> {
  constructor(functionName: string, expression: FieldElementExpression) {
    super(
      'DivisionByZero',
      functionName,
      `Divisor of \`${debugPrintTypedExpression(expression)}\` is zero.`
    );
  }
}

export class ExponentOutOfBoundsError extends CompileTimeError<'ExponentOutOfBounds'> {
  constructor(functionName: string, expression: FieldElementExpression, maximumExponent: bigint) {
    super(
      'ExponentOutOfBounds',
      functionName,
      `Exponent of \`${debugPrintTypedExpression(
        expression
      )}\` exceeds the maximum exponent ${maximumExponent}.`
    );
  }
}

export type InternalInvariant = 'NoLoopAfterUnrolling' | 'ConstantKindConsistency';

/**
 * Thrown when an earlier stage handed over a program that breaks the contract of the middle end.
 * It is a compiler bug, so it is never collected as a user-facing error.
 */
export class InternalCompilerError extends Error {
  constructor(public readonly invariant: InternalInvariant, public readonly detail: string) {
    super(`Internal compiler error [${invariant}]: ${detail}`);
    this.name = 'InternalCompilerError';
  }
}

export interface ReadonlyGlobalErrorCollector {
  getErrors(): readonly CompileTimeError[];

  getFunctionErrorCollector(functionName: string): FunctionErrorCollector;
}

interface WriteOnlyGlobalErrorCollector {
  reportError(error: CompileTimeError): void;
}

export class FunctionErrorCollector {
  constructor(
    public readonly functionName: string,
    private readonly collectorDelegate: WriteOnlyGlobalErrorCollector
  ) {}

  reportError(error: CompileTimeError): void {
    this.collectorDelegate.reportError(error);
  }

  reportDivisionByZeroError(expression: FieldElementExpression): void {
    this.reportError(new DivisionByZeroError(this.functionName, expression));
  }

  reportExponentOutOfBoundsError(
    expression: FieldElementExpression,
    maximumExponent: bigint
  ): void {
    this.reportError(new ExponentOutOfBoundsError(this.functionName, expression, maximumExponent));
  }

  /** Errors reported to the returned collector reach this one only after `commit` is called. */
  createPendingCollector(): PendingFunctionErrorCollector {
    return new PendingFunctionErrorCollector(this);
  }
}

class PendingErrors implements WriteOnlyGlobalErrorCollector {
  readonly errors: CompileTimeError[] = [];

  reportError(error: CompileTimeError): void {
    this.errors.push(error);
  }
}

export class PendingFunctionErrorCollector extends FunctionErrorCollector {
  constructor(
    private readonly parent: FunctionErrorCollector,
    private readonly pendingErrors: PendingErrors = new PendingErrors()
  ) {
    super(parent.functionName, pendingErrors);
  }

  commit(): void {
    this.pendingErrors.errors.forEach((error) => this.parent.reportError(error));
    this.pendingErrors.errors.length = 0;
  }
}

class GlobalErrorCollector implements ReadonlyGlobalErrorCollector, WriteOnlyGlobalErrorCollector {
  private readonly errors: CompileTimeError[] = [];

  getErrors(): readonly CompileTimeError[] {
    return this.errors;
  }

  getFunctionErrorCollector(functionName: string): FunctionErrorCollector {
    return new FunctionErrorCollector(functionName, this);
  }

  reportError(error: CompileTimeError): void {
    this.errors.push(error);
  }
}

export const createGlobalErrorCollector = (): ReadonlyGlobalErrorCollector =>
  new GlobalErrorCollector();
