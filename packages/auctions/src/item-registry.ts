/**
 * In-memory item ownership, and the checks both auction engines run
 * against any ItemRegistry.
 */

import { AuthorizationError, NotFoundError, StateError, ValidationError } from "@ledgerline/ledger";
import type { Principal } from "@ledgerline/types";
import type { ItemRegistry } from "./types.js";

export class InMemoryItemRegistry implements ItemRegistry {
  private readonly owners: Map<string, Principal> = new Map();
  private readonly holders: Map<string, string> = new Map();

  /** Record an item as owned by `owner`. Re-registering overwrites unless an auction holds it. */
  register(itemRef: string, owner: Principal): void {
    if (itemRef.length === 0 || owner.length === 0) {
      throw new ValidationError("INVALID_PARTIES", "Item reference and owner must be non-empty");
    }
    assertNotHeld(this, itemRef);
    this.owners.set(itemRef, owner);
  }

  ownerOf(itemRef: string): Principal | undefined {
    return this.owners.get(itemRef);
  }

  holderOf(itemRef: string): string | undefined {
    return this.holders.get(itemRef);
  }

  hold(itemRef: string, owner: Principal, holder: string): void {
    assertNotHeld(this, itemRef);
    const current = this.owners.get(itemRef);
    if (current !== undefined && current !== owner) {
      throw new AuthorizationError(`"${owner}" does not own item '${itemRef}'`, { itemRef, owner: current });
    }
    this.owners.set(itemRef, owner);
    this.holders.set(itemRef, holder);
  }

  release(itemRef: string, holder: string): void {
    if (this.holders.get(itemRef) === holder) {
      this.holders.delete(itemRef);
    }
  }

  transfer(itemRef: string, from: Principal, to: Principal): void {
    assertNotHeld(this, itemRef);
    const owner = this.owners.get(itemRef);
    if (owner === undefined) {
      throw new NotFoundError(`Item '${itemRef}' not found`, { itemRef });
    }
    if (owner !== from) {
      throw new AuthorizationError(`"${from}" does not own item '${itemRef}'`, { itemRef, owner, from });
    }
    this.owners.set(itemRef, to);
  }

  itemsOf(owner: Principal): readonly string[] {
    return [...this.owners].filter(([, o]) => o === owner).map(([ref]) => ref);
  }
}

function assertNotHeld(items: ItemRegistry, itemRef: string): void {
  const holder = items.holderOf(itemRef);
  if (holder !== undefined) {
    throw new StateError("ITEM_LOCKED", `Item '${itemRef}' is held by auction '${holder}'`, { itemRef, holder });
  }
}

/**
 * Fail unless the seller may put the item up: someone else owning it or
 * another auction holding it both reject. Untracked items pass.
 */
export function assertItemAvailable(items: ItemRegistry | undefined, itemRef: string, seller: Principal): void {
  if (typeof itemRef !== "string" || itemRef.length === 0) {
    throw new ValidationError("INVALID_PARTIES", "An auction needs an item reference");
  }
  if (items === undefined) {
    return;
  }
  const owner = items.ownerOf(itemRef);
  if (owner !== undefined && owner !== seller) {
    throw new AuthorizationError(`"${seller}" does not own item '${itemRef}'`, { itemRef, owner, seller });
  }
  assertNotHeld(items, itemRef);
}

/** Whether settlement can hand the item over from the seller. */
export function canDeliver(items: ItemRegistry | undefined, itemRef: string, seller: Principal): boolean {
  const owner = items?.ownerOf(itemRef);
  return owner === undefined || owner === seller;
}

/** Release the auction's hold and hand a tracked item to the winner. */
export function deliverItem(
  items: ItemRegistry | undefined,
  itemRef: string,
  holder: string,
  seller: Principal,
  winner: Principal,
): void {
  if (items === undefined) {
    return;
  }
  items.release(itemRef, holder);
  if (items.ownerOf(itemRef) !== undefined) {
    items.transfer(itemRef, seller, winner);
  }
}
