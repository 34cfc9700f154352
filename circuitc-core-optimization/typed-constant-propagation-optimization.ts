import {
  ConstantPropagationContext,
  propagateConstantsInTypedExpression,
  propagateConstantsInTypedExpressionList,
} from './typed-expression-constant-propagation';

import {
  TypedFunction,
  TypedLiteralExpression,
  TypedStatement,
  Variable,
  isTypedLiteralExpression,
  TYPED_CONDITION,
  TYPED_DEFINITION,
  TYPED_MULTIPLE_DEFINITION,
  TYPED_RETURN,
} from 'circuitc-core-ast';
import { InternalCompilerError } from 'circuitc-core-errors';
import { hashMapOf, HashMap, isNotNull } from 'circuitc-core-utils';

export type ConstantPropagationOptions = Omit<ConstantPropagationContext, 'constants'>;

/**
 * Returns the rewritten statement, or null when the statement binds a literal and can be dropped.
 * Only definitions write to `constants`.
 */
const propagateConstantsInStatement = (
  functionName: string,
  statement: TypedStatement,
  constants: HashMap<Variable, TypedLiteralExpression>,
  options: ConstantPropagationOptions
): TypedStatement | null => {
  const context: ConstantPropagationContext = { ...options, constants };
  switch (statement.__type__) {
    case 'TypedDeclarationStatement':
      return statement;
    case 'TypedReturnStatement':
      return TYPED_RETURN(
        statement.expressions.map((it) => propagateConstantsInTypedExpression(it, context))
      );
    case 'TypedDefinitionStatement': {
      const { variable } = statement;
      const assignedExpression = propagateConstantsInTypedExpression(
        statement.assignedExpression,
        context
      );
      if (isTypedLiteralExpression(assignedExpression) && assignedExpression.kind === variable.kind) {
        constants.set(variable, assignedExpression);
        return null;
      }
      return TYPED_DEFINITION({ variable, assignedExpression });
    }
    case 'TypedConditionStatement':
      // Kept even when both sides fold to literals.
      return TYPED_CONDITION({
        e1: propagateConstantsInTypedExpression(statement.e1, context),
        e2: propagateConstantsInTypedExpression(statement.e2, context),
      });
    case 'TypedMultipleDefinitionStatement':
      return TYPED_MULTIPLE_DEFINITION({
        variables: statement.variables,
        expressionList: propagateConstantsInTypedExpressionList(statement.expressionList, context),
      });
    case 'TypedForStatement':
      throw new InternalCompilerError(
        'NoLoopAfterUnrolling',
        `Loop over \`${statement.variable}\` in function \`${functionName}\` was not unrolled.`
      );
  }
};

const optimizeTypedFunctionByConstantPropagation = (
  typedFunction: TypedFunction,
  options: ConstantPropagationOptions
): TypedFunction => {
  const constants = hashMapOf<Variable, TypedLiteralExpression>();
  return {
    ...typedFunction,
    statements: typedFunction.statements
      .map((statement) =>
        propagateConstantsInStatement(typedFunction.name, statement, constants, options)
      )
      .filter(isNotNull),
  };
};

export default optimizeTypedFunctionByConstantPropagation;
