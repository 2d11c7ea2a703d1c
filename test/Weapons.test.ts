import assert from "assert";

import { EffectSystem } from "../src/game/EffectSystem.js";
import { EntityStore } from "../src/game/EntityStore.js";
import { WeaponInventory, weaponTier } from "../src/game/WeaponInventory.js";
import { WeaponSystem } from "../src/game/WeaponSystem.js";

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${expected}, got ${actual}`);
}

function setup(): { store: EntityStore; effects: EffectSystem; weapons: WeaponSystem } {
  const store = new EntityStore();
  const effects = new EffectSystem();
  return { store, effects, weapons: new WeaponSystem(store, effects) };
}

function ticks(weapons: WeaponSystem, n: number): void {
  for (let i = 0; i < n; i++) weapons.tick();
}

// ─── Unit Tests: WeaponInventory ───

describe("WeaponInventory", () => {
  it("should start with a pistol in the first of five slots", () => {
    const inventory = new WeaponInventory();
    assert.deepStrictEqual(inventory.weapons, ["pistol", null, null, null, null]);
    assert.strictEqual(inventory.slotIndex, 0);
    assert.deepStrictEqual(inventory.current, { type: "pistol", ammo: 12, reloadTicksRemaining: 0 });
  });

  it("should switch to a new weapon only when it outranks the one in hand", () => {
    const inventory = new WeaponInventory();
    assert.ok(weaponTier("bazooka") > weaponTier("assault_rifle"));

    inventory.add("sniper_rifle");
    assert.strictEqual(inventory.current?.type, "sniper_rifle");
    inventory.add("shotgun");
    assert.strictEqual(inventory.current?.type, "sniper_rifle");
    inventory.add("bazooka");
    assert.strictEqual(inventory.slotIndex, 3);
    inventory.add("assault_rifle");
    assert.strictEqual(inventory.current?.type, "bazooka");
    assert.deepStrictEqual(inventory.weapons, ["pistol", "sniper_rifle", "shotgun", "bazooka", "assault_rifle"]);
  });

  it("should refuse a weapon once every slot is taken", () => {
    const inventory = new WeaponInventory(2);
    assert.strictEqual(inventory.add("shotgun"), true);
    assert.strictEqual(inventory.add("sniper_rifle"), false);
    assert.deepStrictEqual(inventory.weapons, ["pistol", "shotgun"]);
  });

  it("should cycle through occupied slots and wrap around", () => {
    const inventory = new WeaponInventory(5, ["pistol", "shotgun", "bazooka"]);
    assert.strictEqual(inventory.slotIndex, 2);
    assert.strictEqual(inventory.cycle(1), true);
    assert.strictEqual(inventory.slotIndex, 0);
    assert.strictEqual(inventory.cycle(-1), true);
    assert.strictEqual(inventory.slotIndex, 2);
    assert.strictEqual(inventory.switchTo(4), false);
    assert.strictEqual(inventory.switchTo(1), true);
    assert.strictEqual(inventory.current?.type, "shotgun");

    assert.strictEqual(new WeaponInventory().cycle(1), false);
  });
});

// ─── Unit Tests: WeaponSystem ───

describe("WeaponSystem", () => {
  it("should fire one pistol round and then cool down for 18 ticks", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 10, y: 20 });

    const [round, ...rest] = weapons.fire(player.id, 0);
    assert.strictEqual(rest.length, 0);
    assert.ok(round);
    assert.deepStrictEqual([round.x, round.y, round.vx, round.vy], [10, 20, 900, 0]);
    assert.strictEqual(round.ticksRemaining, 60);
    assert.strictEqual(round.damage, 15);
    assert.strictEqual(round.explosionRadius, 0);
    assert.strictEqual(round.ownerId, player.id);
    assert.strictEqual(weapons.cooldownTicks(player.id), 18);

    ticks(weapons, 17);
    assert.strictEqual(weapons.cooldownTicks(player.id), 1);
    assert.deepStrictEqual(weapons.fire(player.id, 0), []);
    weapons.tick();
    assert.strictEqual(weapons.cooldownTicks(player.id), 0);
    assert.strictEqual(weapons.fire(player.id, 0).length, 1);
  });

  it("should fan shotgun pellets across the spread", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    assert.strictEqual(weapons.grantWeapon(player.id, "shotgun"), true);
    assert.strictEqual(player.weapon, "shotgun");

    const pellets = weapons.fire(player.id, 0, "shotgun");
    assert.strictEqual(pellets.length, 5);
    assert.strictEqual(pellets[2].vy, 0);
    assert.ok(pellets[0].vy < 0);
    assert.ok(pellets[4].vy > 0);
    near(pellets[0].vy, -pellets[4].vy);
    for (const p of pellets) {
      assert.strictEqual(p.ticksRemaining, 34);
      near(Math.hypot(p.vx, p.vy), 800, 1e-6);
    }
    assert.strictEqual(weapons.cooldownTicks(player.id), 54);
    assert.strictEqual(weapons.inventoryOf(player.id)?.current?.ammo, 5);
  });

  it("should refuse dead or non-player owners", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    const zombie = store.spawnZombie("weak", { x: 40, y: 0 });

    assert.deepStrictEqual(weapons.fire(zombie.id, 0), []);
    assert.deepStrictEqual(weapons.fire(999, 0), []);
    player.alive = false;
    assert.deepStrictEqual(weapons.fire(player.id, 0), []);
    assert.strictEqual(weapons.inventoryOf(player.id), null);
  });

  it("should not fire a weapon the player does not carry", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    assert.deepStrictEqual(weapons.fire(player.id, 0, "bazooka"), []);
    assert.strictEqual(player.weapon, "pistol");
    assert.strictEqual(weapons.cooldownTicks(player.id), 0);
  });

  it("should empty the magazine, reload on its own and refuse to fire meanwhile", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });

    for (let shot = 0; shot < 12; shot++) {
      if (shot > 0) ticks(weapons, 18);
      assert.strictEqual(weapons.fire(player.id, 0).length, 1, `shot ${shot + 1}`);
    }
    const slot = weapons.inventoryOf(player.id)?.current;
    assert.ok(slot);
    assert.strictEqual(slot.ammo, 0);
    assert.strictEqual(slot.reloadTicksRemaining, 72);

    ticks(weapons, 71);
    assert.deepStrictEqual(weapons.fire(player.id, 0), []);
    assert.strictEqual(slot.reloadTicksRemaining, 1);
    weapons.tick();
    assert.strictEqual(slot.ammo, 12);
    assert.strictEqual(weapons.fire(player.id, 0).length, 1);
  });

  it("should reload on request unless full or already reloading", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    assert.strictEqual(weapons.reload(player.id), false);

    weapons.fire(player.id, 0);
    assert.strictEqual(weapons.reload(player.id), true);
    assert.strictEqual(weapons.reload(player.id), false);
    assert.strictEqual(weapons.inventoryOf(player.id)?.current?.reloadTicksRemaining, 72);
  });

  it("should only advance the reload of the weapon in hand", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    weapons.fire(player.id, 0);
    weapons.reload(player.id);
    weapons.grantWeapon(player.id, "shotgun");

    ticks(weapons, 100);
    const pistol = weapons.inventoryOf(player.id)?.slotFor("pistol");
    assert.ok(pistol);
    assert.deepStrictEqual([pistol.ammo, pistol.reloadTicksRemaining], [11, 72]);

    assert.strictEqual(weapons.switchWeapon(player.id, 0), true);
    assert.strictEqual(player.weapon, "pistol");
    ticks(weapons, 72);
    assert.deepStrictEqual([pistol.ammo, pistol.reloadTicksRemaining], [12, 0]);
  });

  it("should refill a weapon picked up twice instead of taking another slot", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    weapons.grantWeapon(player.id, "shotgun");
    weapons.fire(player.id, 0);

    assert.strictEqual(weapons.grantWeapon(player.id, "shotgun"), true);
    const inventory = weapons.inventoryOf(player.id);
    assert.deepStrictEqual(inventory?.weapons, ["pistol", "shotgun", null, null, null]);
    assert.strictEqual(inventory?.current?.ammo, 6);
  });

  it("should keep the stronger weapon in hand when a weaker one is picked up", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    weapons.grantWeapon(player.id, "bazooka");
    weapons.grantWeapon(player.id, "shotgun");
    assert.strictEqual(player.weapon, "bazooka");

    assert.strictEqual(weapons.cycleWeapon(player.id, 1), true);
    assert.strictEqual(player.weapon, "shotgun");
    assert.strictEqual(weapons.cycleWeapon(player.id, 1), true);
    assert.strictEqual(player.weapon, "pistol");
  });

  it("should fire an explosive rocket and reload after the single round", () => {
    const { store, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    weapons.grantWeapon(player.id, "bazooka");

    const [rocket] = weapons.fire(player.id, 0);
    assert.ok(rocket);
    assert.strictEqual(rocket.explosionRadius, 80);
    assert.strictEqual(rocket.damage, 50);
    assert.strictEqual(rocket.radius, 8);
    assert.strictEqual(weapons.cooldownTicks(player.id), 90);
    assert.strictEqual(weapons.inventoryOf(player.id)?.current?.reloadTicksRemaining, 180);
  });

  it("should apply damage, fire-rate and ammo effects at the moment of firing", () => {
    const { store, effects, weapons } = setup();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    effects.apply(player.id, "damage_boost");
    effects.apply(player.id, "rapid_fire");
    effects.apply(player.id, "infinite_ammo");

    const [round] = weapons.fire(player.id, 0);
    assert.ok(round);
    assert.strictEqual(round.damage, 30);
    assert.strictEqual(weapons.cooldownTicks(player.id), 6);
    assert.strictEqual(weapons.inventoryOf(player.id)?.current?.ammo, 12);
  });
});
