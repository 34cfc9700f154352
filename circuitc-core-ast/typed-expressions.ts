import type { ValueKind } from './typed-variables';

import { FieldElement } from 'circuitc-core-utils';

export type FieldElementBinaryOperator = '+' | '-' | '*' | '/' | '**';

export type ComparisonOperator = '==' | '<' | '<=' | '>' | '>=';

interface BaseTypedExpression {
  readonly __type__: string;
  readonly kind: ValueKind;
}

interface BaseFieldElementExpression extends BaseTypedExpression {
  readonly kind: 'field';
}

interface BaseBooleanExpression extends BaseTypedExpression {
  readonly kind: 'bool';
}

export interface FieldElementNumberExpression extends BaseFieldElementExpression {
  readonly __type__: 'FieldElementNumberExpression';
  readonly value: FieldElement;
}

export interface FieldElementIdentifierExpression extends BaseFieldElementExpression {
  readonly __type__: 'FieldElementIdentifierExpression';
  readonly name: string;
}

export interface FieldElementBinaryExpression extends BaseFieldElementExpression {
  readonly __type__: 'FieldElementBinaryExpression';
  readonly operator: FieldElementBinaryOperator;
  readonly e1: FieldElementExpression;
  readonly e2: FieldElementExpression;
}

export interface FieldElementIfElseExpression extends BaseFieldElementExpression {
  readonly __type__: 'FieldElementIfElseExpression';
  readonly condition: BooleanExpression;
  readonly e1: FieldElementExpression;
  readonly e2: FieldElementExpression;
}

export interface FieldElementFunctionCallExpression extends BaseFieldElementExpression {
  readonly __type__: 'FieldElementFunctionCallExpression';
  readonly functionName: string;
  readonly functionArguments: readonly TypedExpression[];
}

export type FieldElementExpression =
  | FieldElementNumberExpression
  | FieldElementIdentifierExpression
  | FieldElementBinaryExpression
  | FieldElementIfElseExpression
  | FieldElementFunctionCallExpression;

export interface BooleanValueExpression extends BaseBooleanExpression {
  readonly __type__: 'BooleanValueExpression';
  readonly value: boolean;
}

export interface BooleanIdentifierExpression extends BaseBooleanExpression {
  readonly __type__: 'BooleanIdentifierExpression';
  readonly name: string;
}

export interface BooleanComparisonExpression extends BaseBooleanExpression {
  readonly __type__: 'BooleanComparisonExpression';
  readonly operator: ComparisonOperator;
  readonly e1: FieldElementExpression;
  readonly e2: FieldElementExpression;
}

export type BooleanExpression =
  | BooleanValueExpression
  | BooleanIdentifierExpression
  | BooleanComparisonExpression;

export type TypedExpression = FieldElementExpression | BooleanExpression;

/** The expressions known at compile time. */
export type TypedLiteralExpression = FieldElementNumberExpression | BooleanValueExpression;

export interface TypedFunctionCallExpressionList {
  readonly __type__: 'TypedFunctionCallExpressionList';
  readonly functionName: string;
  readonly functionArguments: readonly TypedExpression[];
  readonly returnKinds: readonly ValueKind[];
}

export type TypedExpressionList = TypedFunctionCallExpressionList;

type ConstructorArgumentObject<E extends BaseTypedExpression> = Omit<E, '__type__' | 'kind'>;

export const FIELD_NUMBER = (
  value: number | bigint | FieldElement
): FieldElementNumberExpression => {
  let fieldElement: FieldElement;
  if (typeof value === 'number') {
    fieldElement = FieldElement.fromNumber(value);
  } else if (typeof value === 'bigint') {
    fieldElement = FieldElement.fromBigInt(value);
  } else {
    fieldElement = value;
  }
  return { __type__: 'FieldElementNumberExpression', kind: 'field', value: fieldElement };
};

export const FIELD_IDENTIFIER = (name: string): FieldElementIdentifierExpression => ({
  __type__: 'FieldElementIdentifierExpression',
  kind: 'field',
  name,
});

export const FIELD_BINARY = ({
  operator,
  e1,
  e2,
}: ConstructorArgumentObject<FieldElementBinaryExpression>): FieldElementBinaryExpression => ({
  __type__: 'FieldElementBinaryExpression',
  kind: 'field',
  operator,
  e1,
  e2,
});

export const FIELD_IF_ELSE = ({
  condition,
  e1,
  e2,
}: ConstructorArgumentObject<FieldElementIfElseExpression>): FieldElementIfElseExpression => ({
  __type__: 'FieldElementIfElseExpression',
  kind: 'field',
  condition,
  e1,
  e2,
});

export const FIELD_FUNCTION_CALL = ({
  functionName,
  functionArguments,
}: ConstructorArgumentObject<FieldElementFunctionCallExpression>): FieldElementFunctionCallExpression => ({
  __type__: 'FieldElementFunctionCallExpression',
  kind: 'field',
  functionName,
  functionArguments,
});

export const BOOL_TRUE: BooleanValueExpression = {
  __type__: 'BooleanValueExpression',
  kind: 'bool',
  value: true,
};

export const BOOL_FALSE: BooleanValueExpression = {
  __type__: 'BooleanValueExpression',
  kind: 'bool',
  value: false,
};

export const BOOL_VALUE = (value: boolean): BooleanValueExpression =>
  value ? BOOL_TRUE : BOOL_FALSE;

export const BOOL_IDENTIFIER = (name: string): BooleanIdentifierExpression => ({
  __type__: 'BooleanIdentifierExpression',
  kind: 'bool',
  name,
});

export const BOOL_COMPARISON = ({
  operator,
  e1,
  e2,
}: ConstructorArgumentObject<BooleanComparisonExpression>): BooleanComparisonExpression => ({
  __type__: 'BooleanComparisonExpression',
  kind: 'bool',
  operator,
  e1,
  e2,
});

export const TYPED_FUNCTION_CALL_LIST = ({
  functionName,
  functionArguments,
  returnKinds,
}: Omit<TypedFunctionCallExpressionList, '__type__'>): TypedFunctionCallExpressionList => ({
  __type__: 'TypedFunctionCallExpressionList',
  functionName,
  functionArguments,
  returnKinds,
});

export const isTypedLiteralExpression = (
  expression: TypedExpression
): expression is TypedLiteralExpression =>
  expression.__type__ === 'FieldElementNumberExpression' ||
  expression.__type__ === 'BooleanValueExpression';

const debugPrintFunctionCall = (
  functionName: string,
  functionArguments: readonly TypedExpression[]
): string => `${functionName}(${functionArguments.map(debugPrintTypedExpression).join(', ')})`;

export const debugPrintTypedExpression = (expression: TypedExpression): string => {
  switch (expression.__type__) {
    case 'FieldElementNumberExpression':
      return expression.value.toString();
    case 'BooleanValueExpression':
      return String(expression.value);
    case 'FieldElementIdentifierExpression':
    case 'BooleanIdentifierExpression':
      return expression.name;
    case 'FieldElementBinaryExpression':
    case 'BooleanComparisonExpression':
      return `(${debugPrintTypedExpression(expression.e1)} ${
        expression.operator
      } ${debugPrintTypedExpression(expression.e2)})`;
    case 'FieldElementIfElseExpression':
      return `(if ${debugPrintTypedExpression(
        expression.condition
      )} then ${debugPrintTypedExpression(expression.e1)} else ${debugPrintTypedExpression(
        expression.e2
      )} fi)`;
    case 'FieldElementFunctionCallExpression':
      return debugPrintFunctionCall(expression.functionName, expression.functionArguments);
  }
};

export const debugPrintTypedExpressionList = (expressionList: TypedExpressionList): string =>
  debugPrintFunctionCall(expressionList.functionName, expressionList.functionArguments);
