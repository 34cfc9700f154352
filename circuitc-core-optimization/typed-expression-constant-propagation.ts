import {
  BooleanComparisonExpression,
  BooleanExpression,
  FieldElementBinaryExpression,
  FieldElementExpression,
  TypedExpression,
  TypedExpressionList,
  TypedFunction,
  TypedLiteralExpression,
  Variable,
  debugPrintTypedExpression,
  BOOL_COMPARISON,
  BOOL_VALUE,
  FIELD_BINARY,
  FIELD_FUNCTION_CALL,
  FIELD_IF_ELSE,
  FIELD_NUMBER,
  TYPED_FUNCTION_CALL_LIST,
} from 'circuitc-core-ast';
import { FunctionErrorCollector, InternalCompilerError } from 'circuitc-core-errors';
import type { FieldElement, ReadonlyHashMap } from 'circuitc-core-utils';

export interface ConstantPropagationContext {
  /** Variables proven to hold a literal so far in the current function. */
  readonly constants: ReadonlyHashMap<Variable, TypedLiteralExpression>;
  /** Functions already propagated. Calls are never resolved against them. */
  readonly functions: readonly TypedFunction[];
  readonly errorCollector: FunctionErrorCollector;
  readonly maximumExponent: bigint;
}

const kindMismatch = (variable: Variable, constant: TypedLiteralExpression): never => {
  throw new InternalCompilerError(
    'ConstantKindConsistency',
    `\`${variable}\` is bound to the ${constant.kind} constant \`${debugPrintTypedExpression(
      constant
    )}\`.`
  );
};

const foldFieldElementBinaryExpression = (
  expression: FieldElementBinaryExpression,
  v1: FieldElement,
  v2: FieldElement,
  { errorCollector, maximumExponent }: ConstantPropagationContext
): FieldElementExpression => {
  switch (expression.operator) {
    case '+':
      return FIELD_NUMBER(v1.add(v2));
    case '-':
      return FIELD_NUMBER(v1.subtract(v2));
    case '*':
      return FIELD_NUMBER(v1.multiply(v2));
    case '/': {
      const quotient = v1.divide(v2);
      if (quotient == null) {
        errorCollector.reportDivisionByZeroError(expression);
        return expression;
      }
      return FIELD_NUMBER(quotient);
    }
    case '**': {
      const exponent = v2.toBigInt();
      if (exponent > maximumExponent) {
        errorCollector.reportExponentOutOfBoundsError(expression, maximumExponent);
        return expression;
      }
      return FIELD_NUMBER(v1.pow(exponent));
    }
  }
};

const foldComparison = (
  operator: BooleanComparisonExpression['operator'],
  v1: FieldElement,
  v2: FieldElement
): boolean => {
  switch (operator) {
    case '==':
      return v1.equals(v2);
    case '<':
      return v1.lessThan(v2);
    case '<=':
      return v1.lessThanOrEqual(v2);
    case '>':
      return v1.greaterThan(v2);
    case '>=':
      return v1.greaterThanOrEqual(v2);
  }
};

export const propagateConstantsInFieldElementExpression = (
  expression: FieldElementExpression,
  context: ConstantPropagationContext
): FieldElementExpression => {
  switch (expression.__type__) {
    case 'FieldElementNumberExpression':
      return expression;
    case 'FieldElementIdentifierExpression': {
      const variable = Variable.fieldElement(expression.name);
      const constant = context.constants.get(variable);
      if (constant == null) return expression;
      return constant.kind === 'field'
        ? FIELD_NUMBER(constant.value)
        : kindMismatch(variable, constant);
    }
    case 'FieldElementBinaryExpression': {
      const e1 = propagateConstantsInFieldElementExpression(expression.e1, context);
      const e2 = propagateConstantsInFieldElementExpression(expression.e2, context);
      const rebuilt = FIELD_BINARY({ operator: expression.operator, e1, e2 });
      if (
        e1.__type__ !== 'FieldElementNumberExpression' ||
        e2.__type__ !== 'FieldElementNumberExpression'
      ) {
        return rebuilt;
      }
      return foldFieldElementBinaryExpression(rebuilt, e1.value, e2.value, context);
    }
    case 'FieldElementIfElseExpression': {
      // Both branches are folded, but only the errors of a branch that survives are reported.
      const condition = propagateConstantsInBooleanExpression(expression.condition, context);
      const consequenceErrorCollector = context.errorCollector.createPendingCollector();
      const alternativeErrorCollector = context.errorCollector.createPendingCollector();
      const e1 = propagateConstantsInFieldElementExpression(expression.e1, {
        ...context,
        errorCollector: consequenceErrorCollector,
      });
      const e2 = propagateConstantsInFieldElementExpression(expression.e2, {
        ...context,
        errorCollector: alternativeErrorCollector,
      });
      if (condition.__type__ === 'BooleanValueExpression') {
        if (condition.value) {
          consequenceErrorCollector.commit();
          return e1;
        }
        alternativeErrorCollector.commit();
        return e2;
      }
      consequenceErrorCollector.commit();
      alternativeErrorCollector.commit();
      return FIELD_IF_ELSE({ condition, e1, e2 });
    }
    case 'FieldElementFunctionCallExpression':
      return FIELD_FUNCTION_CALL({
        functionName: expression.functionName,
        functionArguments: expression.functionArguments.map((it) =>
          propagateConstantsInTypedExpression(it, context)
        ),
      });
  }
};

export const propagateConstantsInBooleanExpression = (
  expression: BooleanExpression,
  context: ConstantPropagationContext
): BooleanExpression => {
  switch (expression.__type__) {
    case 'BooleanValueExpression':
      return expression;
    case 'BooleanIdentifierExpression': {
      const variable = Variable.boolean(expression.name);
      const constant = context.constants.get(variable);
      if (constant == null) return expression;
      return constant.kind === 'bool'
        ? BOOL_VALUE(constant.value)
        : kindMismatch(variable, constant);
    }
    case 'BooleanComparisonExpression': {
      const e1 = propagateConstantsInFieldElementExpression(expression.e1, context);
      const e2 = propagateConstantsInFieldElementExpression(expression.e2, context);
      if (
        e1.__type__ !== 'FieldElementNumberExpression' ||
        e2.__type__ !== 'FieldElementNumberExpression'
      ) {
        return BOOL_COMPARISON({ operator: expression.operator, e1, e2 });
      }
      return BOOL_VALUE(foldComparison(expression.operator, e1.value, e2.value));
    }
  }
};

export const propagateConstantsInTypedExpression = (
  expression: TypedExpression,
  context: ConstantPropagationContext
): TypedExpression =>
  expression.kind === 'field'
    ? propagateConstantsInFieldElementExpression(expression, context)
    : propagateConstantsInBooleanExpression(expression, context);

export const propagateConstantsInTypedExpressionList = (
  expressionList: TypedExpressionList,
  context: ConstantPropagationContext
): TypedExpressionList =>
  TYPED_FUNCTION_CALL_LIST({
    functionName: expressionList.functionName,
    functionArguments: expressionList.functionArguments.map((it) =>
      propagateConstantsInTypedExpression(it, context)
    ),
    returnKinds: expressionList.returnKinds,
  });
