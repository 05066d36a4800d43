/** Returns a negative number if a < b, a positive number if a > b, or 0 if a == b */
export type Comparator<K> = (a: K, b: K) => number

/** Orders keys with the built-in `<` and `===` operators */
export function defaultCompare<K>(a: K, b: K): number {
  return a === b ? 0 : a < b ? -1 : 1
}

export interface OrderedDictOptions<K, V> {
  /** (default=`<` and `===`) Total order over keys. Should run in O(1) time.
   * Two keys are the same key when this returns 0. */
  compare?: Comparator<K>,
  /** Produces the value stored when a missing key is accessed through
   * {@link OrderedDict.ref} or {@link OrderedDict.getOrInsertDefault}. Without
   * one, those calls throw a TypeError for missing keys unless they are given
   * a factory themselves. */
  defaultValue?: () => V,
}

/** @internal */
export interface ValidatedOptions<K, V> {
  compare: Comparator<K>,
  defaultValue?: () => V,
}

/** @internal */
export default function normalizeOptions<K, V>(raw?: OrderedDictOptions<K, V>|null): ValidatedOptions<K, V> {
  const props: ValidatedOptions<K, V> = {compare: defaultCompare, ...raw}
  // {...raw} copies an explicit `compare: undefined` over the default
  if (props.compare == null)
    props.compare = defaultCompare

  assertFunction(props, 'compare')
  assertFunction(props, 'defaultValue', true)

  return props
}

function assertFunction(props: object, name: string, optional?: boolean) {
  const val: unknown = Reflect.get(props, name)
  if (optional && val == null)
    return
  if (typeof val !== 'function') {
    throw new TypeError(optional
      ? `${name} must be a function when set`
      : `${name} must be a function`)
  }
}
