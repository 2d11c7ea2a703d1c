import { SIM } from "../config/game.constants.js";
import type { EntityId, PlayerEntity, ProjectileEntity } from "../types/entity.js";
import { WEAPON_CONFIGS, type WeaponType } from "../types/weapons.js";
import type { EffectSystem } from "./EffectSystem.js";
import type { EntityStore } from "./EntityStore.js";
import { WeaponInventory, type WeaponSlot } from "./WeaponInventory.js";

/**
 * Turns trigger pulls into projectile entities. Each player carries a
 * WeaponInventory; shots spend magazine rounds and an emptied magazine
 * reloads on its own. Cooldowns and reloads are counted in ticks and run
 * down in tick(), once per simulation step.
 */
export class WeaponSystem {
  private readonly entities: EntityStore;
  private readonly effects: EffectSystem;
  private readonly tickRate: number;
  private readonly cooldowns = new Map<EntityId, number>();
  private readonly inventories = new Map<EntityId, WeaponInventory>();

  constructor(entities: EntityStore, effects: EffectSystem, tickRate: number = SIM.TICK_RATE) {
    this.entities = entities;
    this.effects = effects;
    this.tickRate = tickRate;
  }

  tick(): void {
    for (const [id, ticks] of this.cooldowns) {
      if (ticks <= 1) {
        this.cooldowns.delete(id);
      } else {
        this.cooldowns.set(id, ticks - 1);
      }
    }
    // only the weapon in hand makes reload progress
    for (const inventory of this.inventories.values()) {
      const slot = inventory.current;
      if (!slot || slot.reloadTicksRemaining <= 0) continue;
      slot.reloadTicksRemaining--;
      if (slot.reloadTicksRemaining === 0) slot.ammo = WEAPON_CONFIGS[slot.type].magazineSize;
    }
  }

  cooldownTicks(ownerId: EntityId): number {
    return this.cooldowns.get(ownerId) ?? 0;
  }

  /** The live player's inventory, created with a pistol on first use. */
  inventoryOf(ownerId: EntityId): WeaponInventory | null {
    const owner = this.livePlayer(ownerId);
    if (!owner) return null;
    let inventory = this.inventories.get(ownerId);
    if (!inventory) {
      inventory = new WeaponInventory(SIM.WEAPONS.MAX_SLOTS, [owner.weapon]);
      this.inventories.set(ownerId, inventory);
    }
    return inventory;
  }

  /**
   * Fires the weapon in hand towards `angle` radians, or first switches to
   * `weapon` when given (nothing fires if it is not carried). Pellets fan out
   * evenly across the weapon's spread. Returns the spawned projectiles; empty
   * when the owner is gone, cooling down, reloading or out of rounds.
   */
  fire(ownerId: EntityId, angle: number, weapon?: WeaponType): ProjectileEntity[] {
    const owner = this.livePlayer(ownerId);
    const inventory = this.inventoryOf(ownerId);
    if (!owner || !inventory) return [];
    if (weapon !== undefined && weapon !== inventory.current?.type) {
      if (!inventory.switchTo(inventory.find(weapon))) return [];
      this.equip(owner, inventory);
    }
    if (this.cooldownTicks(ownerId) > 0) return [];

    const slot = inventory.current;
    if (!slot || slot.reloadTicksRemaining > 0) return [];
    const infinite = this.effects.hasInfiniteAmmo(ownerId);
    if (slot.ammo <= 0 && !infinite) return [];

    const config = WEAPON_CONFIGS[slot.type];
    const perTick = config.projectileSpeed / this.tickRate;
    const ticks = Math.ceil(config.range / perTick);
    const damage = config.damage * this.effects.damageMultiplier(ownerId);
    const projectiles: ProjectileEntity[] = [];

    for (let i = 0; i < config.pellets; i++) {
      const offset = config.pellets > 1 ? config.spread * (i / (config.pellets - 1) - 0.5) : 0;
      const a = angle + offset;
      projectiles.push(
        this.entities.spawnProjectile(
          ownerId,
          { x: owner.x, y: owner.y },
          { x: Math.cos(a) * config.projectileSpeed, y: Math.sin(a) * config.projectileSpeed },
          { damage, radius: config.projectileRadius, ticks, explosionRadius: config.explosionRadius },
        ),
      );
    }

    if (!infinite) {
      slot.ammo--;
      if (slot.ammo === 0) this.startReload(slot);
    }
    const cooldown = (config.cooldown * this.tickRate) / this.effects.fireRateMultiplier(ownerId);
    this.cooldowns.set(ownerId, Math.max(1, Math.round(cooldown)));
    return projectiles;
  }

  /** Starts reloading the weapon in hand unless it is full or already reloading. */
  reload(ownerId: EntityId): boolean {
    const slot = this.inventoryOf(ownerId)?.current;
    if (!slot || slot.reloadTicksRemaining > 0 || slot.ammo >= WEAPON_CONFIGS[slot.type].magazineSize) return false;
    this.startReload(slot);
    return true;
  }

  switchWeapon(ownerId: EntityId, slot: number): boolean {
    const owner = this.livePlayer(ownerId);
    const inventory = this.inventoryOf(ownerId);
    if (!owner || !inventory || !inventory.switchTo(slot)) return false;
    this.equip(owner, inventory);
    return true;
  }

  cycleWeapon(ownerId: EntityId, direction: 1 | -1): boolean {
    const owner = this.livePlayer(ownerId);
    const inventory = this.inventoryOf(ownerId);
    if (!owner || !inventory || !inventory.cycle(direction)) return false;
    this.equip(owner, inventory);
    return true;
  }

  /**
   * Adds a picked-up weapon. A weapon already carried gets a full magazine
   * instead. Returns false when the inventory has no free slot.
   */
  grantWeapon(ownerId: EntityId, type: WeaponType): boolean {
    const owner = this.livePlayer(ownerId);
    const inventory = this.inventoryOf(ownerId);
    if (!owner || !inventory) return false;

    const carried = inventory.slotFor(type);
    if (carried) {
      this.fill(carried);
      return true;
    }
    if (!inventory.add(type)) return false;
    this.equip(owner, inventory);
    return true;
  }

  /** Fills the magazine of the weapon in hand and cancels its reload. */
  refillCurrent(ownerId: EntityId): void {
    const slot = this.inventoryOf(ownerId)?.current;
    if (slot) this.fill(slot);
  }

  forget(ids: Iterable<EntityId>): void {
    for (const id of ids) {
      this.cooldowns.delete(id);
      this.inventories.delete(id);
    }
  }

  private fill(slot: WeaponSlot): void {
    slot.ammo = WEAPON_CONFIGS[slot.type].magazineSize;
    slot.reloadTicksRemaining = 0;
  }

  private startReload(slot: WeaponSlot): void {
    slot.reloadTicksRemaining = Math.max(1, Math.round(WEAPON_CONFIGS[slot.type].reloadTime * this.tickRate));
  }

  private equip(owner: PlayerEntity, inventory: WeaponInventory): void {
    const slot = inventory.current;
    if (slot) owner.weapon = slot.type;
  }

  private livePlayer(id: EntityId): PlayerEntity | null {
    const entity = this.entities.get(id);
    return entity && entity.alive && entity.kind === "player" ? entity : null;
  }
}
