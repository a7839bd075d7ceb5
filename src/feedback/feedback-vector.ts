// Feedback slot allocation for property access and store sites

import { InternalCompilerError } from '../errors';

export type FeedbackSlotKind = 'loadIC' | 'keyedLoadIC' | 'storeIC' | 'keyedStoreIC';

export interface FeedbackSlot {
  readonly id: number;
  readonly kind: FeedbackSlotKind;
}

/**
 * Shape of a function's feedback vector. Slots are handed out in AST
 * numbering order; the index of a slot is its position in the vector.
 */
export class FeedbackVectorLayout {
  private readonly kinds: FeedbackSlotKind[] = [];

  addSlot(kind: FeedbackSlotKind): FeedbackSlot {
    const slot: FeedbackSlot = { id: this.kinds.length, kind };
    this.kinds.push(kind);
    return slot;
  }

  addLoadICSlot(): FeedbackSlot {
    return this.addSlot('loadIC');
  }

  addKeyedLoadICSlot(): FeedbackSlot {
    return this.addSlot('keyedLoadIC');
  }

  addStoreICSlot(): FeedbackSlot {
    return this.addSlot('storeIC');
  }

  addKeyedStoreICSlot(): FeedbackSlot {
    return this.addSlot('keyedStoreIC');
  }

  get slotCount(): number {
    return this.kinds.length;
  }

  getKind(index: number): FeedbackSlotKind | undefined {
    return this.kinds[index];
  }

  /**
   * Resolve a slot to its concrete vector index.
   */
  getIndex(slot: FeedbackSlot): number {
    const kind = this.kinds[slot.id];
    if (kind === undefined) {
      throw new InternalCompilerError(`Feedback slot ${slot.id} was not allocated by this vector (size ${this.kinds.length})`);
    }
    if (kind !== slot.kind) {
      throw new InternalCompilerError(`Feedback slot ${slot.id} is a ${kind} slot, not ${slot.kind}`);
    }
    return slot.id;
  }
}
