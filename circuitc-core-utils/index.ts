import FieldElement from './field-element';

export { FieldElement };

export const error = (message?: string): never => {
  throw new Error(message);
};

export const isNotNull = <V>(value: V | null | undefined): value is V => value != null;

export function assertNotNull<V>(value: V | null | undefined): asserts value is V {
  if (value == null) {
    throw new Error(`Value is asserted to be not null, but it is ${value}.`);
  }
}

export const checkNotNull = <V>(value: V | null | undefined): V => {
  assertNotNull(value);
  return value;
};

export const zip = <A, B>(list1: readonly A[], list2: readonly B[]): readonly (readonly [A, B])[] => {
  const length = Math.min(list1.length, list2.length);
  const result: (readonly [A, B])[] = [];
  for (let i = 0; i < length; i += 1) {
    result.push([checkNotNull(list1[i]), checkNotNull(list2[i])]);
  }
  return result;
};

export interface Hashable {
  readonly uniqueHash: () => string | number;
}

export interface ReadonlyHashMap<K extends Hashable, V> {
  readonly get: (key: K) => V | undefined;
  readonly size: number;
}

export interface HashMap<K extends Hashable, V> extends ReadonlyHashMap<K, V> {
  readonly set: (key: K, value: V) => this;
}

class HashMapImpl<K extends Hashable, V> implements HashMap<K, V> {
  private readonly backingMap: Map<string | number, V>;

  constructor(keyValuePairs: readonly (readonly [K, V])[]) {
    this.backingMap = new Map(keyValuePairs.map(([key, value]) => [key.uniqueHash(), value] as const));
  }

  get(key: K): V | undefined {
    return this.backingMap.get(key.uniqueHash());
  }

  set(key: K, value: V): this {
    this.backingMap.set(key.uniqueHash(), value);
    return this;
  }

  get size(): number {
    return this.backingMap.size;
  }
}

export const hashMapOf = <K extends Hashable, V>(
  ...keyValuePairs: readonly (readonly [K, V])[]
): HashMap<K, V> => new HashMapImpl(keyValuePairs);
