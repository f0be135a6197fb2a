import { NotFoundError } from '../errors.js'
import type { ContentKindModule, KindShape, SlotStores } from '../content/types.js'
import type { ContentRepository } from '../repositories/types.js'
import { storeCall } from '../repositories/store-call.js'

export interface DetailAssembler<K extends KindShape> {
  /** Loads the parent and the slots its type uses. Never cached. */
  assemble(itemId: string): Promise<K['detail']>
  /**
   * Assembles an already loaded parent. Pass a write scope's `slots` to read
   * inside that transaction.
   */
  assembleItem(item: K['item'], slots?: SlotStores<K>): Promise<K['detail']>
}

export function createDetailAssembler<K extends KindShape>(
  module: ContentKindModule<K>,
  repository: ContentRepository<K>,
): DetailAssembler<K> {
  const assembleItem = (item: K['item'], slots: SlotStores<K> = repository.slots) =>
    storeCall(`assemble ${module.kind} ${item.id}`, () => module.assemble(item, slots))

  return {
    async assemble(itemId) {
      const item = await storeCall(`load ${module.kind} ${itemId}`, () => repository.findById(itemId))
      if (!item) {
        throw new NotFoundError(`${module.kind} question`, itemId)
      }
      return assembleItem(item)
    },
    assembleItem,
  }
}
