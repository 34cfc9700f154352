import {
  BooleanExpression,
  ComparisonOperator,
  FieldElementBinaryOperator,
  FieldElementExpression,
  FieldElementNumberExpression,
  TypedExpression,
  TypedExpressionList,
  BOOL_COMPARISON,
  BOOL_IDENTIFIER,
  BOOL_VALUE,
  FIELD_BINARY,
  FIELD_FUNCTION_CALL,
  FIELD_IDENTIFIER,
  FIELD_IF_ELSE,
  FIELD_NUMBER,
  TYPED_FUNCTION_CALL_LIST,
} from './typed-expressions';
import {
  TypedStatement,
  TYPED_CONDITION,
  TYPED_DECLARATION,
  TYPED_DEFINITION,
  TYPED_FOR,
  TYPED_MULTIPLE_DEFINITION,
  TYPED_RETURN,
} from './typed-statements';
import type { TypedFunction, TypedProgram } from './typed-toplevel';
import { ValueKind, Variable } from './typed-variables';

import { error, FieldElement } from 'circuitc-core-utils';

type JSONObject = { readonly [key: string]: unknown };

const FIELD_ELEMENT_BINARY_OPERATORS: readonly FieldElementBinaryOperator[] = [
  '+',
  '-',
  '*',
  '/',
  '**',
];
const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '<', '<=', '>', '>='];

const decodeObject = (json: unknown): JSONObject =>
  typeof json === 'object' && json !== null && !Array.isArray(json)
    ? (json as JSONObject)
    : error(`Expected an object, got ${JSON.stringify(json)}.`);

const decodeArray = <T>(json: unknown, decoder: (element: unknown) => T): readonly T[] =>
  Array.isArray(json) ? json.map(decoder) : error(`Expected an array, got ${JSON.stringify(json)}.`);

const decodeString = (json: unknown): string =>
  typeof json === 'string' ? json : error(`Expected a string, got ${JSON.stringify(json)}.`);

const decodeOneOf = <T extends string>(json: unknown, options: readonly T[]): T => {
  const option = options.find((it) => it === json);
  return option ?? error(`Expected one of ${options.join(', ')}, got ${JSON.stringify(json)}.`);
};

const decodeValueKind = (json: unknown): ValueKind => decodeOneOf(json, ['field', 'bool']);

const decodeVariable = (json: unknown): Variable => {
  const { name, kind } = decodeObject(json);
  return new Variable(decodeString(name), decodeValueKind(kind));
};

const decodeFieldElementNumber = (json: unknown): FieldElementNumberExpression => {
  const { __type__, value } = decodeObject(json);
  if (__type__ !== 'FieldElementNumberExpression') return error('Expected a number literal.');
  const fieldElement = FieldElement.fromString(decodeString(value));
  return fieldElement == null ? error(`Bad field element ${value}.`) : FIELD_NUMBER(fieldElement);
};

const decodeFieldElementExpression = (json: unknown): FieldElementExpression => {
  const object = decodeObject(json);
  switch (object.__type__) {
    case 'FieldElementNumberExpression':
      return decodeFieldElementNumber(object);
    case 'FieldElementIdentifierExpression':
      return FIELD_IDENTIFIER(decodeString(object.name));
    case 'FieldElementBinaryExpression':
      return FIELD_BINARY({
        operator: decodeOneOf(object.operator, FIELD_ELEMENT_BINARY_OPERATORS),
        e1: decodeFieldElementExpression(object.e1),
        e2: decodeFieldElementExpression(object.e2),
      });
    case 'FieldElementIfElseExpression':
      return FIELD_IF_ELSE({
        condition: decodeBooleanExpression(object.condition),
        e1: decodeFieldElementExpression(object.e1),
        e2: decodeFieldElementExpression(object.e2),
      });
    case 'FieldElementFunctionCallExpression':
      return FIELD_FUNCTION_CALL({
        functionName: decodeString(object.functionName),
        functionArguments: decodeArray(object.functionArguments, decodeTypedExpression),
      });
    default:
      return error(`Unknown field element expression ${JSON.stringify(object.__type__)}.`);
  }
};

const decodeBooleanExpression = (json: unknown): BooleanExpression => {
  const object = decodeObject(json);
  switch (object.__type__) {
    case 'BooleanValueExpression': {
      const { value } = object;
      return typeof value === 'boolean' ? BOOL_VALUE(value) : error('Expected a boolean literal.');
    }
    case 'BooleanIdentifierExpression':
      return BOOL_IDENTIFIER(decodeString(object.name));
    case 'BooleanComparisonExpression':
      return BOOL_COMPARISON({
        operator: decodeOneOf(object.operator, COMPARISON_OPERATORS),
        e1: decodeFieldElementExpression(object.e1),
        e2: decodeFieldElementExpression(object.e2),
      });
    default:
      return error(`Unknown boolean expression ${JSON.stringify(object.__type__)}.`);
  }
};

const decodeTypedExpression = (json: unknown): TypedExpression => {
  const { __type__ } = decodeObject(json);
  return typeof __type__ === 'string' && __type__.startsWith('Boolean')
    ? decodeBooleanExpression(json)
    : decodeFieldElementExpression(json);
};

const decodeTypedExpressionList = (json: unknown): TypedExpressionList => {
  const object = decodeObject(json);
  if (object.__type__ !== 'TypedFunctionCallExpressionList') {
    return error(`Unknown expression list ${JSON.stringify(object.__type__)}.`);
  }
  return TYPED_FUNCTION_CALL_LIST({
    functionName: decodeString(object.functionName),
    functionArguments: decodeArray(object.functionArguments, decodeTypedExpression),
    returnKinds: decodeArray(object.returnKinds, decodeValueKind),
  });
};

const decodeTypedStatement = (json: unknown): TypedStatement => {
  const object = decodeObject(json);
  switch (object.__type__) {
    case 'TypedDeclarationStatement':
      return TYPED_DECLARATION(decodeVariable(object.variable));
    case 'TypedDefinitionStatement': {
      const variable = decodeVariable(object.variable);
      const assignedExpression = decodeTypedExpression(object.assignedExpression);
      if (variable.kind !== assignedExpression.kind) {
        return error(`Cannot assign a ${assignedExpression.kind} to ${variable}.`);
      }
      return TYPED_DEFINITION({ variable, assignedExpression });
    }
    case 'TypedMultipleDefinitionStatement':
      return TYPED_MULTIPLE_DEFINITION({
        variables: decodeArray(object.variables, decodeVariable),
        expressionList: decodeTypedExpressionList(object.expressionList),
      });
    case 'TypedReturnStatement':
      return TYPED_RETURN(decodeArray(object.expressions, decodeTypedExpression));
    case 'TypedConditionStatement':
      return TYPED_CONDITION({
        e1: decodeTypedExpression(object.e1),
        e2: decodeTypedExpression(object.e2),
      });
    case 'TypedForStatement':
      return TYPED_FOR({
        variable: decodeVariable(object.variable),
        from: decodeFieldElementNumber(object.from),
        to: decodeFieldElementNumber(object.to),
        statements: decodeArray(object.statements, decodeTypedStatement),
      });
    default:
      return error(`Unknown statement ${JSON.stringify(object.__type__)}.`);
  }
};

const decodeTypedFunction = (json: unknown): TypedFunction => {
  const { name, parameters, returnKinds, statements } = decodeObject(json);
  return {
    name: decodeString(name),
    parameters: decodeArray(parameters, decodeVariable),
    returnKinds: decodeArray(returnKinds, decodeValueKind),
    statements: decodeArray(statements, decodeTypedStatement),
  };
};

export const serializeTypedProgram = (program: TypedProgram): string =>
  `${JSON.stringify(program, null, 2)}\n`;

/** Returns null when the document is not a well-formed typed program. */
export const deserializeTypedProgram = (source: string): TypedProgram | null => {
  try {
    const { functions } = decodeObject(JSON.parse(source));
    return { functions: decodeArray(functions, decodeTypedFunction) };
  } catch {
    return null;
  }
};
