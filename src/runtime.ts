import { ChangeChannel } from './change'
import { EffectRegistry } from './registry'
import { NodeTable } from './tree'

/**
 * Everything a tree shares: the effect registry, the node table and the
 * change channel. Created once per root and handed to every store in it.
 */
export class StoreRuntime {
  readonly registry = new EffectRegistry()
  readonly tree = new NodeTable(this.registry)
  readonly changes = new ChangeChannel()
}
