import test from 'node:test'
import assert from 'node:assert/strict'
import {OrderedDict, Position} from '../src'

function toOrderedDict(keys: number[]): OrderedDict<number, string> {
  return new OrderedDict(keys.map((k): [number, string] => [k, 'v' + k]))
}
function walk(dict: OrderedDict<number, string>, pos: Position<number, string>): number[] {
  const keys: number[] = []
  for (; !pos.equals(dict.end()); pos.next())
    keys.push(pos.key)
  return keys
}

test('Position walks keys in ascending order', () => {
  const dict = toOrderedDict([5, 3, 8, 1, 4, 7, 9])
  assert.deepEqual(walk(dict, dict.begin()), [1, 3, 4, 5, 7, 8, 9])
})

test('Position begin(key) starts at that key', () => {
  const dict = toOrderedDict([5, 3, 8, 1, 4, 7, 9])
  const pos = dict.begin(4)
  assert.equal(pos.key, 4)
  assert.equal(pos.value, 'v4')
  assert.deepEqual(walk(dict, pos), [4, 5, 7, 8, 9])
})

test('Position begin(key) is the end for an absent key', () => {
  const dict = toOrderedDict([5, 3, 8])
  const pos = dict.begin(6)
  assert.ok(pos.done)
  assert.ok(pos.equals(dict.end()))
})

test('Position on an empty dictionary', () => {
  const dict = new OrderedDict<number, string>()
  assert.ok(dict.begin().equals(dict.end()))
  assert.ok(dict.begin().done)
  assert.deepEqual(walk(dict, dict.begin()), [])
})

test('Position equality is by entry', () => {
  const dict = toOrderedDict([2, 1, 3])
  const a = dict.begin()
  const b = dict.begin(1)
  assert.ok(a.equals(b))
  a.next()
  assert.equal(a.equals(b), false)
  assert.ok(a.equals(dict.begin(2)))
  assert.ok(dict.end().equals(dict.end()))
})

test('Position clone advances independently', () => {
  const dict = toOrderedDict([2, 1, 3])
  const a = dict.begin()
  const b = a.clone().next()
  assert.equal(a.key, 1)
  assert.equal(b.key, 2)
})

test('Position climbs past a right-hand chain to the end', () => {
  // 1 -> 2 -> 3, every node a right child
  const dict = toOrderedDict([1, 2, 3])
  const pos = dict.begin(3)
  pos.next()
  assert.ok(pos.done)
  assert.equal(pos.toString(), '[Position end]')
})

test('Position survives inserts and removal of a leaf', () => {
  const dict = toOrderedDict([5, 3, 8, 1, 4, 7, 9])
  const pos = dict.begin(4)
  dict.add(6, 'v6')
  dict.remove(9)
  assert.equal(pos.toString(), '[Position 4]')
  assert.deepEqual(walk(dict, pos), [4, 5, 6, 7, 8])
})

test('Position at an untouched node survives removal of an inner key', () => {
  const dict = toOrderedDict([5, 3, 8, 1, 4, 7, 9])
  const pos = dict.begin(7)
  // 5 takes the key of its left-subtree max, 4, whose node is detached
  dict.remove(5)
  dict.add(6, 'v6')
  assert.equal(pos.value, 'v7')
  assert.deepEqual(walk(dict, pos), [7, 8, 9])
})

test('Position at the promoted neighbor is invalidated; begin(key) finds its new node', () => {
  const dict = toOrderedDict([5, 3, 8, 1, 4, 7, 9])
  const stale = dict.begin(4)
  const root = dict.begin(5)
  dict.remove(5)
  // the root node now holds 4; the node that held 4 is detached
  assert.equal(root.key, 4)
  assert.equal(stale.equals(dict.begin(4)), false)
  assert.ok(root.equals(dict.begin(4)))
  assert.deepEqual(walk(dict, dict.begin(4)), [4, 7, 8, 9])
})

test('Position reads values set through ref', () => {
  const dict = toOrderedDict([2, 1])
  const pos = dict.begin(2)
  dict.ref(2).value = 'changed'
  assert.equal(pos.value, 'changed')
})
