import optimizeTypedFunctionByConstantPropagation from '../typed-constant-propagation-optimization';

import {
  TypedStatement,
  Variable,
  debugPrintTypedFunction,
  BOOL_COMPARISON,
  BOOL_IDENTIFIER,
  BOOL_VALUE,
  FIELD_BINARY,
  FIELD_IDENTIFIER,
  FIELD_IF_ELSE,
  FIELD_NUMBER,
  TYPED_CONDITION,
  TYPED_DECLARATION,
  TYPED_DEFINITION,
  TYPED_FOR,
  TYPED_FUNCTION_CALL_LIST,
  TYPED_MULTIPLE_DEFINITION,
  TYPED_RETURN,
} from 'circuitc-core-ast';
import { createGlobalErrorCollector, InternalCompilerError } from 'circuitc-core-errors';

const x = Variable.fieldElement('x');
const y = Variable.fieldElement('y');

const assertCorrectlyOptimized = (
  statements: readonly TypedStatement[],
  expected: string,
  parameters: readonly Variable[] = []
): void => {
  const globalErrorCollector = createGlobalErrorCollector();
  expect(
    debugPrintTypedFunction(
      optimizeTypedFunctionByConstantPropagation(
        { name: 'main', parameters, returnKinds: ['field'], statements },
        {
          functions: [],
          errorCollector: globalErrorCollector.getFunctionErrorCollector('main'),
          maximumExponent: BigInt(64),
        }
      )
    )
  ).toBe(expected);
  expect(globalErrorCollector.getErrors()).toEqual([]);
};

describe('optimizeTypedFunctionByConstantPropagation', () => {
  it('eliminates constant definitions and substitutes their uses', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(2) }),
        TYPED_DEFINITION({
          variable: y,
          assignedExpression: FIELD_BINARY({
            operator: '+',
            e1: FIELD_IDENTIFIER('x'),
            e2: FIELD_NUMBER(3),
          }),
        }),
        TYPED_RETURN([FIELD_IDENTIFIER('y')]),
      ],
      `def main() -> (field) {
  return 5;
}
`
    );
  });

  it('keeps declarations and non-constant definitions', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DECLARATION(x),
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(2) }),
        TYPED_DEFINITION({
          variable: y,
          assignedExpression: FIELD_BINARY({
            operator: '*',
            e1: FIELD_IDENTIFIER('a'),
            e2: FIELD_IDENTIFIER('x'),
          }),
        }),
        TYPED_RETURN([
          FIELD_BINARY({ operator: '-', e1: FIELD_IDENTIFIER('y'), e2: FIELD_IDENTIFIER('x') }),
        ]),
      ],
      `def main(field a) -> (field) {
  field x;
  y = (a * 2);
  return (y - 2);
}
`,
      [Variable.fieldElement('a')]
    );
  });

  it('tracks boolean constants separately from field element constants', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(1) }),
        TYPED_DEFINITION({
          variable: Variable.boolean('x'),
          assignedExpression: BOOL_COMPARISON({
            operator: '>',
            e1: FIELD_IDENTIFIER('x'),
            e2: FIELD_NUMBER(1),
          }),
        }),
        TYPED_RETURN([
          FIELD_IF_ELSE({
            condition: BOOL_IDENTIFIER('x'),
            e1: FIELD_IDENTIFIER('x'),
            e2: FIELD_NUMBER(0),
          }),
        ]),
      ],
      `def main() -> (field) {
  return 0;
}
`
    );
  });

  it('keeps a literal definition whose kind does not match its variable', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: Variable.boolean('b'), assignedExpression: FIELD_NUMBER(1) }),
        TYPED_RETURN([BOOL_IDENTIFIER('b')]),
      ],
      `def main() -> (field) {
  b = 1;
  return b;
}
`
    );
  });

  it('keeps assertions even when both sides are literals', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(3) }),
        TYPED_CONDITION({ e1: FIELD_IDENTIFIER('x'), e2: FIELD_NUMBER(3) }),
        TYPED_CONDITION({ e1: FIELD_IDENTIFIER('x'), e2: FIELD_NUMBER(4) }),
        TYPED_CONDITION({
          e1: BOOL_COMPARISON({ operator: '<', e1: FIELD_IDENTIFIER('a'), e2: FIELD_IDENTIFIER('x') }),
          e2: BOOL_VALUE(true),
        }),
        TYPED_RETURN([FIELD_IDENTIFIER('x')]),
      ],
      `def main() -> (field) {
  assert 3 == 3;
  assert 3 == 4;
  assert (a < 3) == true;
  return 3;
}
`
    );
  });

  it('propagates into multiple definitions without binding their variables', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(3) }),
        TYPED_MULTIPLE_DEFINITION({
          variables: [y, Variable.boolean('ok')],
          expressionList: TYPED_FUNCTION_CALL_LIST({
            functionName: 'pair',
            functionArguments: [
              FIELD_BINARY({ operator: '+', e1: FIELD_IDENTIFIER('x'), e2: FIELD_NUMBER(1) }),
            ],
            returnKinds: ['field', 'bool'],
          }),
        }),
        TYPED_RETURN([
          FIELD_IF_ELSE({
            condition: BOOL_IDENTIFIER('ok'),
            e1: FIELD_IDENTIFIER('y'),
            e2: FIELD_IDENTIFIER('x'),
          }),
        ]),
      ],
      `def main() -> (field) {
  y, ok = pair(4);
  return (if ok then y else 3 fi);
}
`
    );
  });

  it('does not let a later non-constant definition invalidate an existing constant', () => {
    assertCorrectlyOptimized(
      [
        TYPED_DEFINITION({ variable: x, assignedExpression: FIELD_NUMBER(3) }),
        TYPED_DEFINITION({ variable: y, assignedExpression: FIELD_IDENTIFIER('a') }),
        TYPED_RETURN([FIELD_IDENTIFIER('x'), FIELD_IDENTIFIER('y')]),
      ],
      `def main(field a) -> (field) {
  y = a;
  return 3, y;
}
`,
      [Variable.fieldElement('a')]
    );
  });

  it('rejects loops as an internal error', () => {
    expect(() =>
      optimizeTypedFunctionByConstantPropagation(
        {
          name: 'main',
          parameters: [],
          returnKinds: [],
          statements: [
            TYPED_FOR({
              variable: Variable.fieldElement('i'),
              from: FIELD_NUMBER(0),
              to: FIELD_NUMBER(3),
              statements: [],
            }),
          ],
        },
        {
          functions: [],
          errorCollector: createGlobalErrorCollector().getFunctionErrorCollector('main'),
          maximumExponent: BigInt(64),
        }
      )
    ).toThrow(
      new InternalCompilerError(
        'NoLoopAfterUnrolling',
        'Loop over `field i` in function `main` was not unrolled.'
      )
    );
  });
});
