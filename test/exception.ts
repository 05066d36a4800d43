import test from 'node:test'
import assert from 'node:assert/strict'
import {DictError, KeyNotFoundError} from '../src'

test('KeyNotFoundError carries the key and code', () => {
  const err = new KeyNotFoundError('missing')
  assert.ok(err instanceof DictError)
  assert.ok(err instanceof Error)
  assert.equal(err.name, 'KeyNotFoundError')
  assert.equal(err.code, 'KEY_NOT_FOUND')
  assert.equal(err.key, 'missing')
  assert.equal(err.message, 'key not found: missing')
})

test('DictError keeps the cause', () => {
  const cause = new Error('inner')
  const err = new DictError('CUSTOM', 'outer', cause)
  assert.equal(err.name, 'DictError')
  assert.equal(err.code, 'CUSTOM')
  assert.equal(err.cause, cause)
})
