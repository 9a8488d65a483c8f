/**
 * Slot arena addressed by generation-checked handles
 *
 * A handle stays valid until its entry is removed. Once a slot is reused the
 * old handle's generation no longer matches and lookups through it miss.
 */

export interface Handle<K extends string> {
  readonly kind: K;
  readonly index: number;
  readonly generation: number;
}

interface Slot<T> {
  generation: number;
  value: T | undefined;
}

export function sameHandle<K extends string>(a: Handle<K> | null, b: Handle<K> | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.kind === b.kind && a.index === b.index && a.generation === b.generation;
}

export class Arena<K extends string, T> {
  private slots: Slot<T>[] = [];
  private freeList: number[] = [];
  private count = 0;

  constructor(readonly kind: K) {}

  get size(): number {
    return this.count;
  }

  insert(value: T): Handle<K> {
    const index = this.freeList.pop();
    if (index !== undefined) {
      const slot = this.slots[index];
      slot.value = value;
      this.count++;
      return { kind: this.kind, index, generation: slot.generation };
    }

    this.slots.push({ generation: 0, value });
    this.count++;
    return { kind: this.kind, index: this.slots.length - 1, generation: 0 };
  }

  get(handle: Handle<K>): T | undefined {
    const slot = this.slotFor(handle);
    return slot?.value;
  }

  has(handle: Handle<K>): boolean {
    return this.slotFor(handle) !== undefined;
  }

  remove(handle: Handle<K>): T | undefined {
    const slot = this.slotFor(handle);
    if (!slot) {
      return undefined;
    }

    const value = slot.value;
    slot.value = undefined;
    slot.generation++;
    this.freeList.push(handle.index);
    this.count--;
    return value;
  }

  private slotFor(handle: Handle<K>): Slot<T> | undefined {
    if (handle.kind !== this.kind) {
      return undefined;
    }
    const slot = this.slots[handle.index];
    if (!slot || slot.generation !== handle.generation || slot.value === undefined) {
      return undefined;
    }
    return slot;
  }
}
