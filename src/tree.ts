/**
 * Node Table
 * ==========
 *
 * A single table per root owns every cached store node by id. Parent and
 * child links are plain ids; detaching a node is an explicit removal of its
 * entry and of every entry below it. Stores that are not cached (closure
 * scopes, stores below a store that cannot cache) get an id for effect
 * attribution but no entry. Uncached stores whose state can disappear are
 * watched instead while actions sent through them may still have effects in
 * flight, so that pruning reaches them too.
 */

import { Logger } from './logger'
import type { ScopeID } from './paths'
import type { EffectRegistry } from './registry'

export type NodeId = number

/**
 * What the table needs to know about a store.
 */
export interface TreeNode {
  readonly nodeId: NodeId
  isInvalid(): boolean
  /** Degrade to an invalid store reading the last projected value. */
  invalidate(): void
  toString(): string
}

interface NodeEntry {
  readonly node: TreeNode
  readonly parent: NodeId | undefined
  readonly scopeId: ScopeID | undefined
  readonly children: Map<ScopeID, NodeId>
}

export class NodeTable {
  private readonly entries = new Map<NodeId, NodeEntry>()
  private readonly watched = new Map<NodeId, TreeNode>()
  private nextId = 1
  private rootId: NodeId | undefined

  constructor(private readonly registry: EffectRegistry) {}

  allocate(): NodeId {
    return this.nextId++
  }

  /**
   * Adds a node. A node without a parent becomes the root; a node with a
   * parent is cached under `scopeId`.
   */
  insert(node: TreeNode, parent?: NodeId, scopeId?: ScopeID): void {
    if (parent === undefined) {
      this.rootId = node.nodeId
    } else if (scopeId !== undefined) {
      this.entries.get(parent)?.children.set(scopeId, node.nodeId)
    }
    this.entries.set(node.nodeId, { node, parent, scopeId, children: new Map() })
  }

  has(id: NodeId): boolean {
    return this.entries.has(id)
  }

  get size(): number {
    return this.entries.size
  }

  /** The cached child of `parent` under `scopeId`, if any. */
  child(parent: NodeId, scopeId: ScopeID): TreeNode | undefined {
    const childId = this.entries.get(parent)?.children.get(scopeId)
    return childId === undefined ? undefined : this.entries.get(childId)?.node
  }

  childCount(parent: NodeId): number {
    return this.entries.get(parent)?.children.size ?? 0
  }

  parentOf(id: NodeId): NodeId | undefined {
    return this.entries.get(id)?.parent
  }

  /**
   * Checks an uncached node on every prune until {@link release} finds no
   * running effect dispatched through it.
   */
  watch(node: TreeNode): void {
    if (this.entries.has(node.nodeId) || node.isInvalid()) return
    this.watched.set(node.nodeId, node)
  }

  isWatched(id: NodeId): boolean {
    return this.watched.has(id)
  }

  /** Forgets watched nodes without running effects. */
  release(): void {
    for (const id of [...this.watched.keys()]) {
      if (this.registry.idsForNode(id).length === 0) this.watched.delete(id)
    }
  }

  /**
   * Detaches every cached subtree whose node reports invalid state. Runs after
   * each commit, before the change notification of the same pass.
   * @returns Ids of the removed nodes.
   */
  prune(): NodeId[] {
    const removed: NodeId[] = []
    const visit = (id: NodeId) => {
      const entry = this.entries.get(id)
      if (!entry) return
      for (const childId of [...entry.children.values()]) {
        const child = this.entries.get(childId)
        if (!child) continue
        if (child.node.isInvalid()) {
          removed.push(...this.detach(childId))
        } else {
          visit(childId)
        }
      }
    }
    if (this.rootId !== undefined) visit(this.rootId)
    for (const node of [...this.watched.values()]) {
      if (node.isInvalid()) removed.push(...this.unwatch(node))
    }
    return removed
  }

  /**
   * Removes a node and its descendants from the table, invalidates them and
   * cancels the effects dispatched through them.
   * @returns Ids of the removed nodes, the detached node first.
   */
  detach(id: NodeId): NodeId[] {
    const entry = this.entries.get(id)
    if (!entry) {
      const watched = this.watched.get(id)
      return watched ? this.unwatch(watched) : []
    }
    if (entry.parent !== undefined && entry.scopeId !== undefined) {
      this.entries.get(entry.parent)?.children.delete(entry.scopeId)
    }

    const removed: NodeEntry[] = []
    const collect = (current: NodeEntry) => {
      removed.push(current)
      for (const childId of current.children.values()) {
        const child = this.entries.get(childId)
        if (child) collect(child)
      }
    }
    collect(entry)

    for (const { node } of removed) {
      this.entries.delete(node.nodeId)
      node.invalidate()
      Logger.shared.log(`${node}.detach`)
    }
    for (const { node } of removed) this.registry.cancelNode(node.nodeId)
    if (id === this.rootId) this.rootId = undefined

    return removed.map(({ node }) => node.nodeId)
  }

  /** Detaches everything below the root, watched nodes included. */
  detachChildren(): NodeId[] {
    const root = this.rootId === undefined ? undefined : this.entries.get(this.rootId)
    const cached = root ? [...root.children.values()].flatMap((childId) => this.detach(childId)) : []
    const watched = [...this.watched.values()].flatMap((node) => this.unwatch(node))
    return [...cached, ...watched]
  }

  private unwatch(node: TreeNode): NodeId[] {
    this.watched.delete(node.nodeId)
    node.invalidate()
    Logger.shared.log(`${node}.detach`)
    this.registry.cancelNode(node.nodeId)
    return [node.nodeId]
  }
}
