import {Node, nextNode} from './Node'
import {formatKey} from './exception'

/**
 * A forward, read-only position in an {@link OrderedDict}, pointing either at
 * an entry or at the end. Obtain one with `begin()`, `begin(key)` or `end()`.
 *
 * Positions walk the tree in ascending key order using parent
 * back-references, and stay valid across inserts. A removal invalidates two
 * positions: the one at the removed key's node, and the one at the in-order
 * neighbor whose key and value move up into that node (its old node is
 * detached). Positions at any other node stay valid. Reading `key` or `value`
 * at the end, advancing past the end, or using an invalidated position are
 * precondition violations; they are not checked and the result is
 * unspecified.
 *
 * @example
 * for (let pos = dict.begin(); !pos.equals(dict.end()); pos.next()) {
 *   console.log(pos.key, pos.value)
 * }
 */
export class Position<K, V> {
  /** @internal */
  _node: Node<K, V>

  /** @internal */
  constructor(node: Node<K, V>) {
    this._node = node
  }

  /** True when this is the end position */
  get done(): boolean { return this._node === Node.NIL }

  get key(): K { return this._node.key }

  get value(): V { return this._node.value }

  /** Move to the next key in ascending order, or to the end */
  next(): this {
    this._node = nextNode(this._node)
    return this
  }

  /** Same entry, or both at the end */
  equals(other: Position<K, V>): boolean {
    return this._node === other._node
  }

  clone(): Position<K, V> {
    return new Position(this._node)
  }

  get [Symbol.toStringTag]() { return 'Position' }

  toString(): string {
    return this.done ? '[Position end]' : `[Position ${formatKey(this._node.key)}]`
  }
}
