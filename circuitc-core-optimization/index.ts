import optimizeTypedFunctionByConstantPropagation from './typed-constant-propagation-optimization';

import type { TypedFunction, TypedProgram } from 'circuitc-core-ast';
import { CompileTimeError, createGlobalErrorCollector } from 'circuitc-core-errors';

export type { ConstantPropagationContext } from './typed-expression-constant-propagation';
export {
  propagateConstantsInBooleanExpression,
  propagateConstantsInFieldElementExpression,
  propagateConstantsInTypedExpression,
  propagateConstantsInTypedExpressionList,
} from './typed-expression-constant-propagation';
export type { ConstantPropagationOptions } from './typed-constant-propagation-optimization';
export { optimizeTypedFunctionByConstantPropagation };

/** Largest exponent `**` is folded with. */
export const DEFAULT_MAXIMUM_EXPONENT: bigint = BigInt('4294967295');

export type ConstantPropagationConfiguration = {
  readonly maximumExponent?: bigint;
};

export type ConstantPropagationResult<P extends TypedProgram = TypedProgram> =
  | { readonly __type__: 'OK'; readonly program: P }
  | { readonly __type__: 'ERROR'; readonly errors: readonly CompileTimeError[] };

export const optimizeTypedProgramByConstantPropagation = <P extends TypedProgram>(
  program: P,
  { maximumExponent = DEFAULT_MAXIMUM_EXPONENT }: ConstantPropagationConfiguration = {}
): ConstantPropagationResult<P> => {
  const errorCollector = createGlobalErrorCollector();
  const functions: TypedFunction[] = [];
  program.functions.forEach((typedFunction) => {
    functions.push(
      optimizeTypedFunctionByConstantPropagation(typedFunction, {
        functions,
        errorCollector: errorCollector.getFunctionErrorCollector(typedFunction.name),
        maximumExponent,
      })
    );
  });
  const errors = errorCollector.getErrors();
  if (errors.length > 0) {
    return { __type__: 'ERROR', errors };
  }
  return { __type__: 'OK', program: { ...program, functions } };
};
