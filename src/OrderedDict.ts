import {Node, minNode, maxNode, nextNode} from './Node'
import {Position} from './Position'
import {KeyNotFoundError, formatKey} from './exception'
import normalizeOptions, {Comparator, OrderedDictOptions} from './normalize'

/** A live reference to the value stored under one key */
export interface ValueRef<V> {
  value: V
}

/**
 * Ordered dictionary backed by an unbalanced binary search tree.
 *
 * Lookup, insertion and removal take O(depth) time. There is no rebalancing,
 * so inserting keys in sorted order degrades the tree to a list and every
 * operation to O(n). Iteration is always in ascending key order.
 *
 * Not safe for concurrent mutation; callers sharing a dictionary must
 * serialize access themselves.
 *
 * @example
 * const dict = new OrderedDict<string, number>(null, {defaultValue: () => 0})
 * dict.add('b', 2).add('a', 1)
 * dict.ref('c').value += 5 // inserts 'c' with 0, then sets 5
 * Array.from(dict.keys()) // ['a', 'b', 'c']
 */
export class OrderedDict<K, V> implements Iterable<[K, V]> {
  private _root: Node<K, V>
  private _size: number
  private _compare: Comparator<K>
  private _defaultValue?: () => V

  /**
   * @param source Initial entries, added in order. A repeated key keeps its first value.
   */
  constructor(source?: Iterable<[K, V]>|null, opt?: OrderedDictOptions<K, V>|null) {
    const props = normalizeOptions(opt)
    this._compare = props.compare
    this._defaultValue = props.defaultValue
    this._root = Node.NIL
    this._size = 0
    if (source) for (const [key, val] of source)
      this.add(key, val)
  }

  /**
   * Move-construction. The new dictionary takes over the tree of `source` in
   * O(1), leaving `source` empty.
   */
  static move<K, V>(source: OrderedDict<K, V>): OrderedDict<K, V> {
    const dict = new OrderedDict<K, V>(null, {
      compare: source._compare,
      defaultValue: source._defaultValue,
    })
    return dict.swap(source)
  }

  get size(): number { return this._size }

  get [Symbol.toStringTag]() { return 'OrderedDict' }

  toString(): string {
    return `[${this[Symbol.toStringTag]} size:${this.size}]`
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `${this.toString()}\n${this.toDebugString()}`
  }

  has(key: K): boolean {
    return this._findNode(key) !== Node.NIL
  }

  /**
   * Insert a new entry. Does nothing if the key is already present: the
   * stored value is NOT replaced. Use {@link set} to overwrite.
   */
  add(key: K, value: V): this {
    if (this._root === Node.NIL) {
      this._root = new Node(key, value)
      this._size += 1
      return this
    }
    this._insertNode(key, () => value)
    return this
  }

  /** Insert or overwrite */
  set(key: K, value: V): this {
    this.ref(key, () => value).value = value
    return this
  }

  /**
   * Read-only lookup. Never modifies the dictionary.
   * @throws {@link KeyNotFoundError} if the key is absent
   */
  get(key: K): V {
    const node = this._findNode(key)
    if (node === Node.NIL)
      throw new KeyNotFoundError(key)
    return node.value
  }

  /** Lookup without side effects */
  find(key: K): V | undefined {
    const node = this._findNode(key)
    return node === Node.NIL ? undefined : node.value
  }

  /**
   * Mutable lookup-or-create. Returns a reference bound to the entry for
   * `key`; if the key is absent, an entry holding a default value is inserted
   * first. Accessing a missing key therefore changes the dictionary.
   *
   * @param defaultValue Overrides the factory given to the constructor
   * @throws TypeError if an entry must be created and no factory is available
   */
  ref(key: K, defaultValue?: () => V): ValueRef<V> {
    const node = this._findOrInsert(key, defaultValue)
    return {
      get value() { return node.value },
      set value(val: V) { node.value = val },
    }
  }

  /** Like {@link ref} but returns the stored value itself */
  getOrInsertDefault(key: K, defaultValue?: () => V): V {
    return this._findOrInsert(key, defaultValue).value
  }

  /**
   * Remove the entry for `key`, if any. Returns true if an entry was removed.
   * Removing an absent key is a no-op.
   */
  remove(key: K): boolean {
    const node = this._findNode(key)
    if (node === Node.NIL) return false
    this._deleteNode(node)
    return true
  }

  /** Remove every entry */
  clear(): void {
    const root = this._root
    this._root = Node.NIL
    this._size = 0
    // release bottom-up with a work-list; degenerate trees can be very deep
    const stack: Array<Node<K, V>> = root === Node.NIL ? [] : [root]
    while (stack.length) {
      const node = stack[stack.length - 1]
      if (node.left !== Node.NIL) {
        stack.push(node.left)
        node.left = Node.NIL
      } else if (node.right !== Node.NIL) {
        stack.push(node.right)
        node.right = Node.NIL
      } else {
        stack.pop()
        node.detach()
      }
    }
  }

  /** Deep copy. Keys and values are copied by reference. */
  copy(): OrderedDict<K, V> {
    const dict = new OrderedDict<K, V>(null, {
      compare: this._compare,
      defaultValue: this._defaultValue,
    })
    dict._root = this._cloneTree()
    dict._size = this._size
    return dict
  }

  /**
   * Copy-assignment. Replaces this tree with a deep copy of `other`'s, and
   * takes its comparator and default factory, which the copied tree is
   * ordered by.
   */
  assign(other: OrderedDict<K, V>): this {
    if (other === this) return this
    this.clear()
    this._compare = other._compare
    this._defaultValue = other._defaultValue
    this._root = other._cloneTree()
    this._size = other._size
    return this
  }

  /**
   * Move-assignment. Exchanges the trees of both dictionaries in O(1), along
   * with their comparators and default factories.
   */
  swap(other: OrderedDict<K, V>): this {
    const {_root, _size, _compare, _defaultValue} = this
    this._root = other._root
    this._size = other._size
    this._compare = other._compare
    this._defaultValue = other._defaultValue
    other._root = _root
    other._size = _size
    other._compare = _compare
    other._defaultValue = _defaultValue
    return this
  }

  /**
   * Position of the smallest key, or {@link end} if the dictionary is empty.
   * With a key: the position of that key, or {@link end} if it is absent.
   */
  begin(): Position<K, V>
  begin(key: K): Position<K, V>
  begin(...args: [] | [key: K]): Position<K, V> {
    if (args.length === 1)
      return new Position(this._findNode(args[0]))
    return new Position(this._root === Node.NIL ? Node.NIL : minNode(this._root))
  }

  /** The position past the largest key */
  end(): Position<K, V> {
    return new Position<K, V>(Node.NIL)
  }

  min(): K | undefined {
    return this._root === Node.NIL ? undefined : minNode(this._root).key
  }

  max(): K | undefined {
    return this._root === Node.NIL ? undefined : maxNode(this._root).key
  }

  forEach(cb: (value: V, key: K, dict: OrderedDict<K, V>) => void, self?: unknown): void {
    for (const [key, val] of this.entries())
      cb.call(self, val, key, this)
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  values(): IterableIterator<V> {
    return this._iterator(node => node.value)
  }

  keys(): IterableIterator<K> {
    return this._iterator(node => node.key)
  }

  entries(): IterableIterator<[K, V]> {
    return this._iterator(node => [node.key, node.value])
  }

  /** Traverse keys, breadth-first */
  *bfs(): IterableIterator<K> {
    if (this._root === Node.NIL) return
    const queue = [this._root]
    for (let i = 0; i < queue.length; i++) {
      const next = queue[i]
      yield next.key
      if (next.left !== Node.NIL) queue.push(next.left)
      if (next.right !== Node.NIL) queue.push(next.right)
    }
  }

  /**
   * Render the tree structure, one line per key in ascending order. Each line
   * is prefixed by the path from the root, '0' for left and '1' for right,
   * indented by depth.
   *
   * @example
   * // keys added in order 2, 1, 3
   * dict.toDebugString() === ' 0: 1\n: 2\n 1: 3\n'
   */
  toDebugString(): string {
    let out = ''
    const stack: Array<[Node<K, V>, string]> = []
    let node = this._root
    let prefix = ''
    while (node !== Node.NIL || stack.length) {
      while (node !== Node.NIL) {
        stack.push([node, prefix])
        node = node.left
        prefix = ' ' + prefix + '0'
      }
      const top = stack.pop()
      if (top == null) break
      const [cur, curPrefix] = top
      out += `${curPrefix}: ${formatKey(cur.key)}\n`
      node = cur.right
      prefix = ' ' + curPrefix + '1'
    }
    return out
  }

  private _iterator<R>(get: (node: Node<K, V>) => R): IterableIterator<R> {
    const tree = this
    let node: Node<K, V> = Node.NIL
    let started = false
    return {
      [Symbol.iterator]() { return this },
      next(): IteratorResult<R> {
        if (!started) {
          node = tree._root === Node.NIL ? Node.NIL : minNode(tree._root)
          started = true
        } else {
          node = nextNode(node)
        }
        if (node === Node.NIL)
          return {done: true, value: undefined}
        return {done: false, value: get(node)}
      }
    }
  }

  private _findNode(key: K): Node<K, V> {
    let node = this._root
    let dir: number
    while (node !== Node.NIL && (dir = this._compare(key, node.key))) {
      node = dir < 0 ? node.left : node.right
    }
    return node
  }

  private _findOrInsert(key: K, defaultValue = this._defaultValue): Node<K, V> {
    const node = this._findNode(key)
    if (node !== Node.NIL)
      return node
    if (defaultValue == null)
      throw new TypeError('cannot insert a missing key without a defaultValue factory')
    if (this._root === Node.NIL) {
      this._root = new Node(key, defaultValue())
      this._size += 1
      return this._root
    }
    return this._insertNode(key, defaultValue)
  }

  /**
   * Descend from the (non-empty) root and attach a new leaf at the first
   * missing branch, or return the existing node for `key`. The value factory
   * only runs when a node is created.
   */
  private _insertNode(key: K, value: () => V): Node<K, V> {
    let node = this._root
    let dir: number
    while ((dir = this._compare(key, node.key))) {
      if (dir < 0) {
        if (node.left === Node.NIL) {
          node.left = new Node(key, value(), node)
          this._size += 1
        }
        node = node.left
      } else {
        if (node.right === Node.NIL) {
          node.right = new Node(key, value(), node)
          this._size += 1
        }
        node = node.right
      }
    }
    return node
  }

  /**
   * Removes the key held by `node`. Interior nodes are never unlinked: the
   * in-order neighbor (max of the left subtree, or else min of the right
   * subtree) donates its key and value, and the donor's own slot is cleared
   * the same way until a leaf can be detached.
   */
  private _deleteNode(node: Node<K, V>): void {
    while (!node.isLeaf()) {
      const donor = node.left !== Node.NIL ? maxNode(node.left) : minNode(node.right)
      node.key = donor.key
      node.value = donor.value
      node = donor
    }
    const parent = node.parent
    if (parent === Node.NIL) this._root = Node.NIL
    else if (parent.left === node) parent.left = Node.NIL
    else parent.right = Node.NIL
    node.detach()
    this._size -= 1
  }

  private _cloneTree(): Node<K, V> {
    const src = this._root
    if (src === Node.NIL) return Node.NIL
    const root = new Node(src.key, src.value)
    const stack: Array<[Node<K, V>, Node<K, V>]> = [[src, root]]
    while (stack.length) {
      const top = stack.pop()
      if (top == null) break
      const [from, to] = top
      if (from.left !== Node.NIL) {
        to.left = new Node(from.left.key, from.left.value, to)
        stack.push([from.left, to.left])
      }
      if (from.right !== Node.NIL) {
        to.right = new Node(from.right.key, from.right.value, to)
        stack.push([from.right, to.right])
      }
    }
    return root
  }
}
