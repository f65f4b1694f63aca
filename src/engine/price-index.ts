import { InvalidPriceError, NodeNotFoundError, invariant } from "./errors.js";
import { EMPTY_PRICE, type Price } from "./types.js";

export interface TreeNode {
  parent: Price;
  left: Price;
  right: Price;
  red: boolean;
}

/**
 * Red-black tree of distinct prices.
 *
 * Nodes live in a Map keyed by price and link to each other by price, with
 * EMPTY_PRICE (0) as the null link. `nil` plays the sentinel: it is black and
 * its parent pointer is borrowed by the delete fixup when the spliced child
 * is null.
 */
export class PriceIndex {
  private rootKey: Price = EMPTY_PRICE;
  private readonly nodes = new Map<Price, TreeNode>();
  private readonly nil: TreeNode = { parent: EMPTY_PRICE, left: EMPTY_PRICE, right: EMPTY_PRICE, red: false };

  // ── Queries ──────────────────────────────────────────────────

  get root(): Price {
    return this.rootKey;
  }

  get size(): number {
    return this.nodes.size;
  }

  min(): Price {
    if (this.rootKey === EMPTY_PRICE) return EMPTY_PRICE;
    return this.treeMinimum(this.rootKey);
  }

  max(): Price {
    if (this.rootKey === EMPTY_PRICE) return EMPTY_PRICE;
    return this.treeMaximum(this.rootKey);
  }

  /** Next higher price, or EMPTY_PRICE at the top. */
  successor(price: Price): Price {
    this.requireExists(price);
    const node = this.at(price);
    if (node.right !== EMPTY_PRICE) return this.treeMinimum(node.right);

    let cursor = price;
    let parent = node.parent;
    while (parent !== EMPTY_PRICE && cursor === this.at(parent).right) {
      cursor = parent;
      parent = this.at(parent).parent;
    }
    return parent;
  }

  /** Next lower price, or EMPTY_PRICE at the bottom. */
  predecessor(price: Price): Price {
    this.requireExists(price);
    const node = this.at(price);
    if (node.left !== EMPTY_PRICE) return this.treeMaximum(node.left);

    let cursor = price;
    let parent = node.parent;
    while (parent !== EMPTY_PRICE && cursor === this.at(parent).left) {
      cursor = parent;
      parent = this.at(parent).parent;
    }
    return parent;
  }

  exists(price: Price): boolean {
    if (price === EMPTY_PRICE) return false;
    if (price === this.rootKey) return true;
    const node = this.nodes.get(price);
    return node !== undefined && node.parent !== EMPTY_PRICE;
  }

  /** Read-only view of a node, for diagnostics and invariant checks. */
  inspect(price: Price): Readonly<TreeNode> | undefined {
    const node = this.nodes.get(price);
    return node ? { ...node } : undefined;
  }

  /** Ascending walk over every price. */
  *keys(): IterableIterator<Price> {
    let cursor = this.min();
    while (cursor !== EMPTY_PRICE) {
      yield cursor;
      cursor = this.successor(cursor);
    }
  }

  // ── Mutations ────────────────────────────────────────────────

  insert(price: Price): void {
    if (price <= EMPTY_PRICE) throw new InvalidPriceError(price);
    if (this.exists(price)) return;

    let parent = EMPTY_PRICE;
    let probe = this.rootKey;
    while (probe !== EMPTY_PRICE) {
      parent = probe;
      probe = price < probe ? this.at(probe).left : this.at(probe).right;
    }

    this.nodes.set(price, { parent, left: EMPTY_PRICE, right: EMPTY_PRICE, red: true });
    if (parent === EMPTY_PRICE) {
      this.rootKey = price;
    } else if (price < parent) {
      this.at(parent).left = price;
    } else {
      this.at(parent).right = price;
    }
    this.insertFixup(price);
  }

  remove(price: Price): void {
    this.requireExists(price);
    const target = this.at(price);

    // `cursor` is the node physically unlinked: the target itself when it has
    // at most one child, else its in-order successor.
    let cursor: Price;
    if (target.left === EMPTY_PRICE || target.right === EMPTY_PRICE) {
      cursor = price;
    } else {
      cursor = target.right;
      while (this.at(cursor).left !== EMPTY_PRICE) {
        cursor = this.at(cursor).left;
      }
    }

    const cursorNode = this.at(cursor);
    const probe = cursorNode.left !== EMPTY_PRICE ? cursorNode.left : cursorNode.right;
    const cursorParent = cursorNode.parent;
    this.at(probe).parent = cursorParent;
    if (cursorParent === EMPTY_PRICE) {
      this.rootKey = probe;
    } else {
      const parentNode = this.at(cursorParent);
      if (cursor === parentNode.left) {
        parentNode.left = probe;
      } else {
        parentNode.right = probe;
      }
    }

    const doFixup = !cursorNode.red;

    if (cursor !== price) {
      // Move the successor into the target's place.
      this.replaceParent(cursor, price);
      cursorNode.left = target.left;
      this.at(cursorNode.left).parent = cursor;
      cursorNode.right = target.right;
      this.at(cursorNode.right).parent = cursor;
      cursorNode.red = target.red;
    }

    if (doFixup) this.removeFixup(probe);
    this.nodes.delete(price);
    this.nil.parent = EMPTY_PRICE;
    this.nil.red = false;
  }

  // ── Internal ─────────────────────────────────────────────────

  private at(price: Price): TreeNode {
    if (price === EMPTY_PRICE) return this.nil;
    const node = this.nodes.get(price);
    invariant(node, `dangling link to price ${price}`);
    return node;
  }

  private requireExists(price: Price): void {
    if (!this.exists(price)) throw new NodeNotFoundError(price);
  }

  private treeMinimum(price: Price): Price {
    let cursor = price;
    while (this.at(cursor).left !== EMPTY_PRICE) {
      cursor = this.at(cursor).left;
    }
    return cursor;
  }

  private treeMaximum(price: Price): Price {
    let cursor = price;
    while (this.at(cursor).right !== EMPTY_PRICE) {
      cursor = this.at(cursor).right;
    }
    return cursor;
  }

  /** Point the parent of `target` (or the root) at `replacement`. */
  private replaceParent(replacement: Price, target: Price): void {
    const targetParent = this.at(target).parent;
    this.at(replacement).parent = targetParent;
    if (targetParent === EMPTY_PRICE) {
      this.rootKey = replacement;
      return;
    }
    const parentNode = this.at(targetParent);
    if (target === parentNode.left) {
      parentNode.left = replacement;
    } else {
      invariant(target === parentNode.right, `price ${target} is not a child of its parent ${targetParent}`);
      parentNode.right = replacement;
    }
  }

  private rotateLeft(price: Price): void {
    const node = this.at(price);
    const pivot = node.right;
    invariant(pivot !== EMPTY_PRICE, `rotateLeft at ${price} without a right child`);
    const pivotNode = this.at(pivot);

    node.right = pivotNode.left;
    if (pivotNode.left !== EMPTY_PRICE) this.at(pivotNode.left).parent = price;
    this.replaceParent(pivot, price);
    pivotNode.left = price;
    node.parent = pivot;
  }

  private rotateRight(price: Price): void {
    const node = this.at(price);
    const pivot = node.left;
    invariant(pivot !== EMPTY_PRICE, `rotateRight at ${price} without a left child`);
    const pivotNode = this.at(pivot);

    node.left = pivotNode.right;
    if (pivotNode.right !== EMPTY_PRICE) this.at(pivotNode.right).parent = price;
    this.replaceParent(pivot, price);
    pivotNode.right = price;
    node.parent = pivot;
  }

  private insertFixup(price: Price): void {
    let cursor = price;
    while (cursor !== this.rootKey && this.at(this.at(cursor).parent).red) {
      const parent = this.at(cursor).parent;
      const grandparent = this.at(parent).parent;
      if (parent === this.at(grandparent).left) {
        const uncle = this.at(grandparent).right;
        if (this.at(uncle).red) {
          this.at(parent).red = false;
          this.at(uncle).red = false;
          this.at(grandparent).red = true;
          cursor = grandparent;
        } else {
          if (cursor === this.at(parent).right) {
            cursor = parent;
            this.rotateLeft(cursor);
          }
          const p = this.at(cursor).parent;
          const g = this.at(p).parent;
          this.at(p).red = false;
          this.at(g).red = true;
          this.rotateRight(g);
        }
      } else {
        const uncle = this.at(grandparent).left;
        if (this.at(uncle).red) {
          this.at(parent).red = false;
          this.at(uncle).red = false;
          this.at(grandparent).red = true;
          cursor = grandparent;
        } else {
          if (cursor === this.at(parent).left) {
            cursor = parent;
            this.rotateRight(cursor);
          }
          const p = this.at(cursor).parent;
          const g = this.at(p).parent;
          this.at(p).red = false;
          this.at(g).red = true;
          this.rotateLeft(g);
        }
      }
    }
    this.at(this.rootKey).red = false;
  }

  private removeFixup(price: Price): void {
    let cursor = price;
    while (cursor !== this.rootKey && !this.at(cursor).red) {
      const parent = this.at(cursor).parent;
      if (cursor === this.at(parent).left) {
        let sibling = this.at(parent).right;
        if (this.at(sibling).red) {
          this.at(sibling).red = false;
          this.at(parent).red = true;
          this.rotateLeft(parent);
          sibling = this.at(parent).right;
        }
        if (!this.at(this.at(sibling).left).red && !this.at(this.at(sibling).right).red) {
          this.at(sibling).red = true;
          cursor = parent;
        } else {
          if (!this.at(this.at(sibling).right).red) {
            this.at(this.at(sibling).left).red = false;
            this.at(sibling).red = true;
            this.rotateRight(sibling);
            sibling = this.at(parent).right;
          }
          this.at(sibling).red = this.at(parent).red;
          this.at(parent).red = false;
          this.at(this.at(sibling).right).red = false;
          this.rotateLeft(parent);
          cursor = this.rootKey;
        }
      } else {
        let sibling = this.at(parent).left;
        if (this.at(sibling).red) {
          this.at(sibling).red = false;
          this.at(parent).red = true;
          this.rotateRight(parent);
          sibling = this.at(parent).left;
        }
        if (!this.at(this.at(sibling).right).red && !this.at(this.at(sibling).left).red) {
          this.at(sibling).red = true;
          cursor = parent;
        } else {
          if (!this.at(this.at(sibling).left).red) {
            this.at(this.at(sibling).right).red = false;
            this.at(sibling).red = true;
            this.rotateLeft(sibling);
            sibling = this.at(parent).left;
          }
          this.at(sibling).red = this.at(parent).red;
          this.at(parent).red = false;
          this.at(this.at(sibling).left).red = false;
          this.rotateRight(parent);
          cursor = this.rootKey;
        }
      }
    }
    this.at(cursor).red = false;
  }
}
