/** @internal */
export class Node<K, V> {
  key: K
  value: V
  /** Back-reference for traversal only. Never an ownership edge. */
  parent: Node<K, V>
  left: Node<K, V>
  right: Node<K, V>

  /** Stands for "no node" (Null Object Pattern): every missing child, the
   * root's parent, the root of an empty dictionary and the end position all
   * point here, so descents and successor walks stop on one identity check.
   * Frozen; assigning to its links throws a TypeError. */
  static NIL: Node<any, any> = Object.freeze(
    new class extends Node<unknown, unknown> {
      toString() { return '·' }
      constructor() {
        super(Symbol('nil'), Symbol('nil'))
        this.parent = this.left = this.right = this
      }
    }()
  )

  constructor(key: K, value: V, parent: Node<K, V> = Node.NIL) {
    this.key = key
    this.value = value
    this.parent = parent
    this.left = this.right = Node.NIL
  }

  isLeaf(): boolean {
    return this.left === Node.NIL && this.right === Node.NIL
  }

  /** Drop every link so a removed node keeps nothing reachable */
  detach(): void {
    this.parent = this.left = this.right = Node.NIL
  }
}

/** @internal */
export function minNode<K, V>(node: Node<K, V>): Node<K, V> {
  while (node.left !== Node.NIL) node = node.left
  return node
}

/** @internal */
export function maxNode<K, V>(node: Node<K, V>): Node<K, V> {
  while (node.right !== Node.NIL) node = node.right
  return node
}

/**
 * In-order successor. Returns NIL past the last node, and for NIL itself.
 * @internal
 */
export function nextNode<K, V>(node: Node<K, V>): Node<K, V> {
  if (node === Node.NIL) return node
  if (node.right !== Node.NIL) return minNode(node.right)
  let parent = node.parent
  while (parent !== Node.NIL && node === parent.right) {
    node = parent
    parent = parent.parent
  }
  return parent
}
