import {inspect} from 'node:util'

/**
 * Key text for messages and debug output. Strings print as-is; anything else
 * goes through util.inspect, which also handles null-prototype objects.
 * @internal
 */
export function formatKey(key: unknown): string {
  return typeof key === 'string' ? key : inspect(key)
}

/** Base class for errors raised by the dictionary */
class DictError extends Error {
  code: string
  /** @internal */
  constructor(code: string, message: string, cause?: unknown) {
    super(message, {cause})
    this.name = 'DictError'
    this.code = code
  }
}

/** Thrown by the read-only lookup, {@link OrderedDict.get}, when the key is absent. */
class KeyNotFoundError extends DictError {
  /** @internal */
  name = 'KeyNotFoundError'
  /** The key that was looked up */
  key: unknown
  /** @internal */
  constructor(key: unknown) {
    super('KEY_NOT_FOUND', `key not found: ${formatKey(key)}`)
    this.key = key
  }
}

export {DictError, KeyNotFoundError}
