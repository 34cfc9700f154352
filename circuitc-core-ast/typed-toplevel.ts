import { debugPrintTypedStatement, TypedStatement } from './typed-statements';
import type { ValueKind, Variable } from './typed-variables';

export interface TypedFunction {
  readonly name: string;
  readonly parameters: readonly Variable[];
  readonly returnKinds: readonly ValueKind[];
  readonly statements: readonly TypedStatement[];
}

/** Functions appear in declaration order. A function may only call the ones declared before it. */
export interface TypedProgram {
  readonly functions: readonly TypedFunction[];
}

export const debugPrintTypedFunction = ({
  name,
  parameters,
  returnKinds,
  statements,
}: TypedFunction): string => {
  const header = `def ${name}(${parameters.map(String).join(', ')}) -> (${returnKinds.join(
    ', '
  )}) {`;
  const body = statements.map((it) => debugPrintTypedStatement(it, 1)).join('\n');
  return body === '' ? `${header}\n}\n` : `${header}\n${body}\n}\n`;
};

export const debugPrintTypedProgram = ({ functions }: TypedProgram): string =>
  functions.map(debugPrintTypedFunction).join('\n');
