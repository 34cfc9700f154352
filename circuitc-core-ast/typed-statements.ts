import {
  debugPrintTypedExpression,
  debugPrintTypedExpressionList,
  FieldElementNumberExpression,
  TypedExpression,
  TypedExpressionList,
} from './typed-expressions';
import type { Variable } from './typed-variables';

interface BaseTypedStatement {
  readonly __type__: string;
}

export interface TypedDeclarationStatement extends BaseTypedStatement {
  readonly __type__: 'TypedDeclarationStatement';
  readonly variable: Variable;
}

export interface TypedDefinitionStatement extends BaseTypedStatement {
  readonly __type__: 'TypedDefinitionStatement';
  readonly variable: Variable;
  readonly assignedExpression: TypedExpression;
}

export interface TypedMultipleDefinitionStatement extends BaseTypedStatement {
  readonly __type__: 'TypedMultipleDefinitionStatement';
  readonly variables: readonly Variable[];
  readonly expressionList: TypedExpressionList;
}

export interface TypedReturnStatement extends BaseTypedStatement {
  readonly __type__: 'TypedReturnStatement';
  readonly expressions: readonly TypedExpression[];
}

/** Asserts that both sides evaluate to the same value at runtime. */
export interface TypedConditionStatement extends BaseTypedStatement {
  readonly __type__: 'TypedConditionStatement';
  readonly e1: TypedExpression;
  readonly e2: TypedExpression;
}

/** Bounded loop. Unrolling removes every loop before the middle end runs. */
export interface TypedForStatement extends BaseTypedStatement {
  readonly __type__: 'TypedForStatement';
  readonly variable: Variable;
  readonly from: FieldElementNumberExpression;
  readonly to: FieldElementNumberExpression;
  readonly statements: readonly TypedStatement[];
}

export type TypedStatement =
  | TypedDeclarationStatement
  | TypedDefinitionStatement
  | TypedMultipleDefinitionStatement
  | TypedReturnStatement
  | TypedConditionStatement
  | TypedForStatement;

type ConstructorArgumentObject<S extends BaseTypedStatement> = Omit<S, '__type__'>;

export const TYPED_DECLARATION = (variable: Variable): TypedDeclarationStatement => ({
  __type__: 'TypedDeclarationStatement',
  variable,
});

export const TYPED_DEFINITION = ({
  variable,
  assignedExpression,
}: ConstructorArgumentObject<TypedDefinitionStatement>): TypedDefinitionStatement => ({
  __type__: 'TypedDefinitionStatement',
  variable,
  assignedExpression,
});

export const TYPED_MULTIPLE_DEFINITION = ({
  variables,
  expressionList,
}: ConstructorArgumentObject<TypedMultipleDefinitionStatement>): TypedMultipleDefinitionStatement => ({
  __type__: 'TypedMultipleDefinitionStatement',
  variables,
  expressionList,
});

export const TYPED_RETURN = (expressions: readonly TypedExpression[]): TypedReturnStatement => ({
  __type__: 'TypedReturnStatement',
  expressions,
});

export const TYPED_CONDITION = ({
  e1,
  e2,
}: ConstructorArgumentObject<TypedConditionStatement>): TypedConditionStatement => ({
  __type__: 'TypedConditionStatement',
  e1,
  e2,
});

export const TYPED_FOR = ({
  variable,
  from,
  to,
  statements,
}: ConstructorArgumentObject<TypedForStatement>): TypedForStatement => ({
  __type__: 'TypedForStatement',
  variable,
  from,
  to,
  statements,
});

export const debugPrintTypedStatement = (statement: TypedStatement, startLevel = 0): string => {
  const collector: string[] = [];
  const printer = (s: TypedStatement, level: number) => {
    const indentation = '  '.repeat(level);
    switch (s.__type__) {
      case 'TypedDeclarationStatement':
        collector.push(`${indentation}${s.variable};\n`);
        break;
      case 'TypedDefinitionStatement':
        collector.push(
          `${indentation}${s.variable.name} = ${debugPrintTypedExpression(s.assignedExpression)};\n`
        );
        break;
      case 'TypedMultipleDefinitionStatement':
        collector.push(
          `${indentation}${s.variables
            .map((it) => it.name)
            .join(', ')} = ${debugPrintTypedExpressionList(s.expressionList)};\n`
        );
        break;
      case 'TypedReturnStatement':
        collector.push(
          `${indentation}return ${s.expressions.map(debugPrintTypedExpression).join(', ')};\n`
        );
        break;
      case 'TypedConditionStatement':
        collector.push(
          `${indentation}assert ${debugPrintTypedExpression(s.e1)} == ${debugPrintTypedExpression(
            s.e2
          )};\n`
        );
        break;
      case 'TypedForStatement':
        collector.push(`${indentation}for ${s.variable} in ${s.from.value}..${s.to.value} do\n`);
        s.statements.forEach((it) => printer(it, level + 1));
        collector.push(`${indentation}endfor\n`);
        break;
    }
  };
  printer(statement, startLevel);
  return collector.join('').trimEnd();
};
