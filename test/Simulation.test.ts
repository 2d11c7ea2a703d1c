import assert from "assert";

import { applyCombat, resolvePickup, resolveProjectileHit, resolveZombieAttack } from "../src/game/CombatResolver.js";
import type { SimulationContext } from "../src/game/context.js";
import { EffectSystem } from "../src/game/EffectSystem.js";
import { EntityStore } from "../src/game/EntityStore.js";
import { circleOverlapsBox, type Box } from "../src/game/geometry.js";
import { generateObstacles, getPlayerStart } from "../src/game/MapGenerator.js";
import { ObstacleIndex, obstacleBounds } from "../src/game/ObstacleIndex.js";
import { Rng } from "../src/game/Rng.js";
import { ScoreSystem } from "../src/game/ScoreSystem.js";
import { Simulation, type TickResult } from "../src/game/Simulation.js";
import { SimulationClock } from "../src/game/SimulationClock.js";
import { WeaponSystem } from "../src/game/WeaponSystem.js";

const MAP = { width: 3200, height: 3200 };

function near(actual: number, expected: number, tolerance = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${expected}, got ${actual}`);
}

function combatContext(store: EntityStore, score: ScoreSystem): SimulationContext {
  return {
    entities: store,
    obstacles: new ObstacleIndex([]),
    rng: new Rng(1),
    clock: { tick: 1, dt: 1 / 60 },
    score,
  };
}

function gearFor(store: EntityStore): { weapons: WeaponSystem; effects: EffectSystem } {
  const effects = new EffectSystem();
  return { weapons: new WeaponSystem(store, effects), effects };
}

// ─── Unit Tests: ScoreSystem ───

describe("ScoreSystem", () => {
  it("should award survival points once per whole second", () => {
    const score = new ScoreSystem();
    score.advance(0.5);
    assert.strictEqual(score.score, 0);
    score.advance(0.5);
    assert.strictEqual(score.score, 1);
    score.advance(0.5);
    assert.strictEqual(score.score, 1);
    assert.strictEqual(score.elapsed, 1.5);
  });

  it("should add kill points by zombie type", () => {
    const score = new ScoreSystem();
    score.addKill("fast");
    score.addKill("tough");
    const snap = score.snapshot();
    assert.strictEqual(snap.score, 50);
    assert.strictEqual(snap.kills, 2);
    assert.deepStrictEqual(snap.killsByType, { weak: 0, fast: 1, tough: 1 });

    snap.killsByType.weak = 99;
    assert.strictEqual(score.snapshot().killsByType.weak, 0);
  });
});

// ─── Unit Tests: CombatResolver ───

describe("CombatResolver", () => {
  it("should heal up to max health, spend the pickup and leave it at full health", () => {
    const store = new EntityStore();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    player.health = 60;

    const gear = gearFor(store);

    const first = store.spawnPickup("medkit", { x: 0, y: 0 });
    assert.deepStrictEqual(resolvePickup(player, first, gear), { pickupType: "medkit", healed: 25, weapon: null });
    assert.strictEqual(player.health, 85);
    assert.strictEqual(first.alive, false);
    assert.strictEqual(resolvePickup(player, first, gear), null);

    const second = store.spawnPickup("medkit", { x: 0, y: 0 });
    assert.strictEqual(resolvePickup(player, second, gear)?.healed, 15);
    assert.strictEqual(player.health, 100);

    const third = store.spawnPickup("medkit", { x: 0, y: 0 });
    assert.strictEqual(resolvePickup(player, third, gear), null);
    assert.strictEqual(third.alive, true);
  });

  it("should kill the player when an attack exceeds remaining health", () => {
    const store = new EntityStore();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    const zombie = store.spawnZombie("weak", { x: 20, y: 0 });
    player.health = 5;

    const result = resolveZombieAttack({ zombieId: zombie.id, targetId: player.id, damage: 10 }, player);
    assert.deepStrictEqual(result, { hit: true, damage: 5, killed: true });
    assert.strictEqual(player.health, 0);
    assert.strictEqual(player.alive, false);
  });

  it("should ignore hits on dead targets", () => {
    const store = new EntityStore();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    const zombie = store.spawnZombie("weak", { x: 50, y: 0 });
    const bullet = store.spawnProjectile(player.id, { x: 0, y: 0 }, { x: 1, y: 0 }, { damage: 15, radius: 3, ticks: 10 });
    zombie.alive = false;
    assert.deepStrictEqual(resolveProjectileHit(bullet, zombie), { hit: false, damage: 0, killed: false });
    assert.strictEqual(zombie.health, 30);
  });

  it("should score the kill, drop a medkit and cancel the victim's attack", () => {
    const store = new EntityStore();
    const score = new ScoreSystem();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    const zombie = store.spawnZombie("weak", { x: 40, y: 0 });
    zombie.health = 10;
    const bullet = store.spawnProjectile(player.id, { x: 0, y: 0 }, { x: 900, y: 0 }, { damage: 15, radius: 3, ticks: 10 });

    const outcome = applyCombat(
      combatContext(store, score),
      [{ kind: "projectile-hit", entityA: bullet.id, entityB: zombie.id, penetration: { x: 0, y: 0 } }],
      [{ zombieId: zombie.id, targetId: player.id, damage: 10 }],
      score,
      gearFor(store),
      { dropChance: 1 },
    );

    assert.deepStrictEqual(outcome.kills, [{ victimId: zombie.id, killerId: player.id, zombieType: "weak" }]);
    assert.strictEqual(outcome.playerDamage, 0);
    assert.strictEqual(player.health, 100);
    assert.strictEqual(score.score, 10);
    assert.strictEqual(outcome.drops.length, 1);
    const drop = store.get(outcome.drops[0]);
    assert.ok(drop && drop.kind === "pickup");
    assert.deepStrictEqual([drop.x, drop.y], [40, 0]);
  });

  it("should consume pickups reported by the sensor pass", () => {
    const store = new EntityStore();
    const score = new ScoreSystem();
    const player = store.spawnPlayer({ x: 0, y: 0 });
    player.health = 90;
    const medkit = store.spawnPickup("medkit", { x: 4, y: 0 });

    const outcome = applyCombat(
      combatContext(store, score),
      [{ kind: "entity-entity", entityA: player.id, entityB: medkit.id, penetration: { x: 22, y: 0 } }],
      [],
      score,
      gearFor(store),
    );
    assert.strictEqual(outcome.healed, 10);
    assert.deepStrictEqual(outcome.pickups, [{ pickupId: medkit.id, pickupType: "medkit", healed: 10, weapon: null }]);
  });
});

// ─── Unit Tests: SimulationClock ───

describe("SimulationClock", () => {
  it("should run whole ticks out of wall-clock time", () => {
    const clock = new SimulationClock();
    let runs = 0;
    assert.strictEqual(clock.advance(40, () => runs++), 2);
    assert.strictEqual(runs, 2);
    // 6.67ms carried over
    assert.strictEqual(clock.advance(11, () => runs++), 1);
    assert.strictEqual(clock.advance(0, () => runs++), 0);
    assert.strictEqual(clock.advance(Number.NaN, () => runs++), 0);
  });

  it("should not run while paused", () => {
    const clock = new SimulationClock();
    clock.pause();
    assert.strictEqual(clock.isPaused, true);
    assert.strictEqual(clock.advance(500, () => undefined), 0);
    clock.resume();
    assert.strictEqual(clock.advance(20, () => undefined), 1);
  });

  it("should drop whole ticks beyond the per-advance step limit but keep the remainder", () => {
    const clock = new SimulationClock({ tickRate: 50 });
    assert.strictEqual(clock.advance(1010, () => undefined), 5);
    // 10ms left over
    assert.strictEqual(clock.advance(9, () => undefined), 0);
    assert.strictEqual(clock.advance(1, () => undefined), 1);
  });

  it("should count ticks only when marked", () => {
    const clock = new SimulationClock({ tickRate: 30 });
    clock.advance(100, () => undefined);
    assert.strictEqual(clock.tick, 0);
    clock.markTick();
    clock.markTick();
    assert.strictEqual(clock.tick, 2);
    assert.strictEqual(clock.dt, 1 / 30);
  });
});

// ─── Integration Tests: Simulation ───

describe("Simulation", () => {
  function quiet(overrides: { dropChance?: number } = {}): Simulation {
    return new Simulation({ seed: 1, obstacles: [], bounds: null, director: { maxCap: 0 }, ...overrides });
  }

  it("should replay identically from the same seed", () => {
    function run(): Array<[number, string, number, number]> {
      const start = getPlayerStart();
      const sim = new Simulation({ seed: 7, obstacles: generateObstacles(7), bounds: MAP });
      sim.spawnPlayer(start);
      sim.setPlayerInput(0.5, -0.3);
      for (let t = 0; t < 600; t++) {
        if (t % 20 === 0) sim.fire(t / 100);
        sim.step();
      }
      return sim.entities.all().map((e): [number, string, number, number] => [e.id, e.kind, e.x, e.y]);
    }
    const a = run();
    const b = run();
    assert.ok(a.length > 1);
    assert.deepStrictEqual(a, b);
  });

  it("should advance in fixed steps and stop while paused", () => {
    const sim = quiet();
    const first: TickResult[] = sim.advance(40);
    assert.deepStrictEqual(first.map((r) => r.tick), [1, 2]);

    sim.pause();
    assert.deepStrictEqual(sim.advance(100), []);
    sim.resume();
    assert.deepStrictEqual(sim.advance(20).map((r) => r.tick), [3]);
  });

  it("should clamp diagonal input to unit length", () => {
    const sim = quiet();
    const player = sim.spawnPlayer({ x: 0, y: 0 });
    sim.setPlayerInput(3, 4);
    sim.step();
    near(player.vx, 120);
    near(player.vy, 160);
    near(player.x, 2);
    near(player.y, 160 / 60);
  });

  it("should shoot a zombie dead, score it and despawn it", () => {
    const sim = quiet({ dropChance: 0 });
    const player = sim.spawnPlayer({ x: 0, y: 0 });
    const zombie = sim.entities.spawnZombie("weak", { x: 100, y: 0 }, { speed: 0 });

    let killTick: TickResult | null = null;
    for (let t = 0; t < 60 && !killTick; t++) {
      sim.fire(0);
      const result = sim.step();
      if (result.combat.kills.length > 0) killTick = result;
    }

    assert.ok(killTick, "zombie survived");
    // two pistol rounds, the second after an 18-tick cooldown
    assert.strictEqual(killTick.tick, 24);
    assert.deepStrictEqual(killTick.combat.kills, [{ victimId: zombie.id, killerId: player.id, zombieType: "weak" }]);
    assert.ok(killTick.removed.includes(zombie.id));
    assert.strictEqual(sim.entities.get(zombie.id), undefined);
    assert.strictEqual(sim.navigation.getState(zombie.id), undefined);
    assert.strictEqual(sim.score.score, 10);
    assert.strictEqual(sim.score.kills, 1);
    assert.strictEqual(sim.entities.countAlive("pickup"), 0);
  });

  it("should end the game when the player dies", () => {
    const sim = quiet();
    sim.spawnPlayer({ x: 0, y: 0 }, { health: 5 });
    sim.entities.spawnZombie("weak", { x: 30, y: 0 });
    assert.strictEqual(sim.isOver, false);

    const result = sim.step();
    assert.strictEqual(result.combat.playerKilled, true);
    assert.strictEqual(result.combat.playerDamage, 5);
    assert.strictEqual(sim.player, null);
    assert.strictEqual(sim.isOver, true);

    sim.step();
    assert.strictEqual(sim.score.elapsed, 0);
  });

  it("should heal the player who walks over a medkit", () => {
    const sim = quiet();
    const player = sim.spawnPlayer({ x: 0, y: 0 });
    player.health = 50;
    const medkit = sim.entities.spawnPickup("medkit", { x: 5, y: 0 });

    const result = sim.step();
    assert.strictEqual(result.combat.healed, 25);
    assert.strictEqual(player.health, 75);
    assert.deepStrictEqual(result.removed, [medkit.id]);
  });

  it("should expire an untouched medkit after its lifetime", () => {
    const sim = quiet();
    const medkit = sim.entities.spawnPickup("medkit", { x: 1000, y: 1000 });
    for (let t = 0; t < 899; t++) sim.step();
    assert.ok(sim.entities.get(medkit.id));

    const result = sim.step();
    assert.deepStrictEqual(result.removed, [medkit.id]);
    assert.strictEqual(sim.entities.get(medkit.id), undefined);
  });

  it("should expose navigation modes only for zombies", () => {
    const sim = quiet();
    const player = sim.spawnPlayer({ x: 0, y: 0 });
    const zombie = sim.entities.spawnZombie("weak", { x: 300, y: 0 });
    assert.strictEqual(sim.behaviorHint(zombie.id), "seeking");
    assert.strictEqual(sim.behaviorHint(player.id), null);
    assert.strictEqual(sim.behaviorHint(12345), null);
  });

  it("should not fire before a player joins", () => {
    assert.deepStrictEqual(quiet().fire(0), []);
  });

  it("should let the director bring in the first zombie after its delay", () => {
    const sim = new Simulation({ seed: 3, obstacles: [], bounds: MAP });
    const player = sim.spawnPlayer(getPlayerStart());
    const spawnTicks: number[] = [];
    for (let t = 0; t < 150; t++) {
      const result = sim.step();
      for (const id of result.spawned) {
        spawnTicks.push(result.tick);
        const zombie = sim.entities.get(id);
        assert.ok(zombie && zombie.kind === "zombie");
        assert.strictEqual(zombie.zombieType, "weak");
        // spawned at least 450 away, then one tick of movement
        assert.ok(Math.hypot(zombie.x - player.x, zombie.y - player.y) >= 445);
      }
    }
    assert.strictEqual(spawnTicks.length, 1);
    assert.ok(spawnTicks[0] >= 120 && spawnTicks[0] <= 121, `spawned at tick ${spawnTicks[0]}`);
    assert.strictEqual(sim.directive.targetCount, 4);
  });
});

// ─── Unit Tests: MapGenerator ───

describe("MapGenerator", () => {
  const GAP = 48;

  function apart(later: Box, earlier: Box): boolean {
    return (
      later.minX - GAP >= earlier.maxX || earlier.minX >= later.maxX + GAP ||
      later.minY - GAP >= earlier.maxY || earlier.minY >= later.maxY + GAP
    );
  }

  it("should build the same map from the same seed", () => {
    assert.deepStrictEqual(generateObstacles(11), generateObstacles(11));
    assert.notDeepStrictEqual(generateObstacles(11), generateObstacles(12));
  });

  it("should keep obstacles apart, on the map and out of the start zone", () => {
    const obstacles = generateObstacles(42);
    const start = getPlayerStart();
    assert.ok(obstacles.length > 0 && obstacles.length <= 70);
    assert.deepStrictEqual(obstacles.map((o) => o.id), obstacles.map((_, i) => i + 1));

    const boxes = obstacles.map(obstacleBounds);
    boxes.forEach((box, j) => {
      assert.ok(!circleOverlapsBox(start.x, start.y, 240, box), `obstacle ${j + 1} in the start zone`);
      assert.ok(box.minX >= 0 && box.minY >= 0 && box.maxX <= MAP.width && box.maxY <= MAP.height);
      for (let i = 0; i < j; i++) {
        assert.ok(apart(box, boxes[i]), `obstacles ${i + 1} and ${j + 1} too close`);
      }
    });
  });

  it("should return nothing when asked for no obstacles", () => {
    assert.deepStrictEqual(generateObstacles(1, { count: 0 }), []);
    assert.deepStrictEqual(getPlayerStart(800, 600), { x: 400, y: 300 });
  });
});
