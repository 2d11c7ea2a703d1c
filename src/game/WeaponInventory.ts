import { SIM } from "../config/game.constants.js";
import { WEAPON_CONFIGS, WEAPON_HIERARCHY, type WeaponType } from "../types/weapons.js";

export interface WeaponSlot {
  readonly type: WeaponType;
  /** Rounds left in the magazine. */
  ammo: number;
  reloadTicksRemaining: number;
}

/** Position of the weapon in WEAPON_HIERARCHY; higher is stronger. */
export function weaponTier(type: WeaponType): number {
  return WEAPON_HIERARCHY.indexOf(type);
}

/**
 * A player's weapon slots. New weapons go to the first empty slot and are
 * switched to when they outrank the weapon in hand.
 */
export class WeaponInventory {
  readonly maxSlots: number;
  private readonly slots: Array<WeaponSlot | null>;
  private currentSlot = 0;

  constructor(maxSlots: number = SIM.WEAPONS.MAX_SLOTS, starting: readonly WeaponType[] = ["pistol"]) {
    this.maxSlots = maxSlots;
    this.slots = new Array<WeaponSlot | null>(maxSlots).fill(null);
    for (const type of starting) {
      this.add(type);
    }
  }

  get slotIndex(): number {
    return this.currentSlot;
  }

  get current(): WeaponSlot | null {
    return this.slots[this.currentSlot] ?? null;
  }

  /** Weapon type per slot, null for empty slots. */
  get weapons(): Array<WeaponType | null> {
    return this.slots.map((slot) => slot?.type ?? null);
  }

  /** Slot holding the weapon, or -1. */
  find(type: WeaponType): number {
    return this.slots.findIndex((slot) => slot?.type === type);
  }

  slotFor(type: WeaponType): WeaponSlot | null {
    return this.slots.find((slot) => slot?.type === type) ?? null;
  }

  add(type: WeaponType, autoSwitch = true): boolean {
    const free = this.slots.indexOf(null);
    if (free < 0) return false;
    this.slots[free] = { type, ammo: WEAPON_CONFIGS[type].magazineSize, reloadTicksRemaining: 0 };

    const held = this.current;
    if (autoSwitch && (!held || weaponTier(type) > weaponTier(held.type))) {
      this.currentSlot = free;
    }
    return true;
  }

  switchTo(slot: number): boolean {
    if (!this.slots[slot]) return false;
    this.currentSlot = slot;
    return true;
  }

  /** Moves to the next occupied slot in the given direction, wrapping around. */
  cycle(direction: 1 | -1): boolean {
    for (let i = 1; i < this.maxSlots; i++) {
      const slot = (this.currentSlot + i * direction + this.maxSlots) % this.maxSlots;
      if (this.slots[slot]) {
        this.currentSlot = slot;
        return true;
      }
    }
    return false;
  }
}
