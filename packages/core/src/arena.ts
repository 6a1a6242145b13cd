import { DisposedError } from "./errors";

/**
 * A generational index: `slot` locates the item, `generation` tells whether
 * the item that was allocated there is still the one in the slot. Ids are
 * plain immutable values, so they can be copied and compared freely.
 */
export interface NodeId {
  readonly slot: number;
  readonly generation: number;
}

interface Slot<Item> {
  generation: number;
  /**
   * Absent when the slot is vacant.
   */
  item?: Item;
}

export interface Arena<Item extends object> {
  readonly slots: Slot<Item>[];
  /**
   * Indices of vacant slots. The most recently vacated slot is reused first.
   */
  readonly vacant: number[];
}

export const createArena = <Item extends object>(): Arena<Item> => ({
  slots: [],
  vacant: [],
});

/**
 * Stores the item returned by `create` and returns its id. The item gets its
 * own id as an argument because nodes keep a reference to their id.
 */
export const allocate = <Item extends object>(
  arena: Arena<Item>,
  create: (id: NodeId) => Item
): NodeId => {
  const vacantSlot = arena.vacant.pop();
  if (vacantSlot === undefined) {
    const id: NodeId = { slot: arena.slots.length, generation: 0 };
    arena.slots.push({ generation: 0, item: create(id) });
    return id;
  }
  const slot = arena.slots[vacantSlot]!;
  const id: NodeId = { slot: vacantSlot, generation: slot.generation };
  slot.item = create(id);
  return id;
};

export const lookup = <Item extends object>(
  arena: Arena<Item>,
  id: NodeId
): Item | undefined => {
  const slot = arena.slots[id.slot];
  if (slot && slot.generation === id.generation) {
    return slot.item;
  }
};

export const getItem = <Item extends object>(
  arena: Arena<Item>,
  id: NodeId
): Item => {
  const item = lookup(arena, id);
  if (!item) {
    throw new DisposedError(id);
  }
  return item;
};

/**
 * Empties the slot and bumps its generation, which invalidates every
 * outstanding copy of `id`. Returns the released item, or `undefined` if the
 * id was already stale.
 */
export const release = <Item extends object>(
  arena: Arena<Item>,
  id: NodeId
): Item | undefined => {
  const slot = arena.slots[id.slot];
  if (!slot || slot.generation !== id.generation || !slot.item) {
    return;
  }
  const { item } = slot;
  delete slot.item;
  slot.generation++;
  arena.vacant.push(id.slot);
  return item;
};

export const countItems = <Item extends object>(arena: Arena<Item>): number =>
  arena.slots.length - arena.vacant.length;

