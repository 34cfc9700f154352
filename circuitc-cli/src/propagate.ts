import {
  debugPrintTypedProgram,
  deserializeTypedProgram,
  serializeTypedProgram,
  TypedProgram,
} from 'circuitc-core-ast';
import { CompileTimeError, InternalCompilerError } from 'circuitc-core-errors';
import { optimizeTypedProgramByConstantPropagation } from 'circuitc-core-optimization';
import { zip } from 'circuitc-core-utils';

export type PropagationOutcome =
  | {
      readonly __type__: 'OK';
      readonly output: string;
      /** One `<name>: <before> -> <after> statements` line per function. */
      readonly summaries: readonly string[];
    }
  | { readonly __type__: 'MALFORMED_INPUT' }
  | { readonly __type__: 'ERROR'; readonly errors: readonly CompileTimeError[] }
  | { readonly __type__: 'INTERNAL_ERROR'; readonly error: InternalCompilerError };

function summarize(before: TypedProgram, after: TypedProgram): readonly string[] {
  return zip(before.functions, after.functions).map(
    ([original, optimized]) =>
      `${original.name}: ${original.statements.length} -> ${optimized.statements.length} statements`
  );
}

export function propagateSerializedProgram(
  source: string,
  maximumExponent: bigint
): PropagationOutcome {
  const program = deserializeTypedProgram(source);
  if (program == null) return { __type__: 'MALFORMED_INPUT' };
  try {
    const result = optimizeTypedProgramByConstantPropagation(program, { maximumExponent });
    if (result.__type__ === 'ERROR') return result;
    return {
      __type__: 'OK',
      output: serializeTypedProgram(result.program),
      summaries: summarize(program, result.program),
    };
  } catch (error) {
    if (error instanceof InternalCompilerError) return { __type__: 'INTERNAL_ERROR', error };
    throw error;
  }
}

export function printSerializedProgram(source: string): string | null {
  const program = deserializeTypedProgram(source);
  return program == null ? null : debugPrintTypedProgram(program);
}
