import assert from "assert";

import { EntityStore } from "../src/game/EntityStore.js";
import { SimulationInputError } from "../src/game/errors.js";
import { ObstacleIndex } from "../src/game/ObstacleIndex.js";
import { Simulation } from "../src/game/Simulation.js";
import { createZombieAIState, ZombieBrain, type ZombieMode } from "../src/game/ZombieBrain.js";

const DT = 1 / 60;

// ─── Unit Tests: ZombieBrain state machine ───

describe("ZombieBrain", () => {
  it("should reject a zero stuck threshold", () => {
    assert.throws(() => new ZombieBrain(new ObstacleIndex([]), { stuckTicks: 0 }), SimulationInputError);
  });

  it("should head straight for the player while seeking", () => {
    const store = new EntityStore();
    const brain = new ZombieBrain(new ObstacleIndex([]));
    const player = store.spawnPlayer({ x: 300, y: 400 });
    const zombie = store.spawnZombie("weak", { x: 0, y: 0 }, { speed: 50 });
    const ai = createZombieAIState(zombie);

    const attack = brain.decide(zombie, ai, player, DT);

    assert.strictEqual(attack, null);
    assert.strictEqual(ai.mode, "seeking");
    assert.strictEqual(zombie.vx, 30);
    assert.strictEqual(zombie.vy, 40);
  });

  it("should hold still without a live player", () => {
    const store = new EntityStore();
    const brain = new ZombieBrain(new ObstacleIndex([]));
    const zombie = store.spawnZombie("weak", { x: 0, y: 0 });
    zombie.vx = 10;
    const ai = createZombieAIState(zombie);

    assert.strictEqual(brain.decide(zombie, ai, null, DT), null);
    assert.strictEqual(zombie.vx, 0);
    assert.strictEqual(zombie.vy, 0);
  });

  it("should attack in reach, then wait out the cooldown", () => {
    const store = new EntityStore();
    const brain = new ZombieBrain(new ObstacleIndex([]));
    const player = store.spawnPlayer({ x: 25, y: 0 });
    const zombie = store.spawnZombie("weak", { x: 0, y: 0 }, { radius: 4 });
    const ai = createZombieAIState(zombie);

    const first = brain.decide(zombie, ai, player, DT);
    assert.deepStrictEqual(first, { zombieId: zombie.id, targetId: player.id, damage: 10 });
    assert.strictEqual(ai.mode, "attacking");
    assert.strictEqual(zombie.vx, 0);

    assert.strictEqual(brain.decide(zombie, ai, player, DT), null);
    assert.strictEqual(ai.mode, "seeking");

    let calls = 1;
    while (brain.decide(zombie, ai, player, DT) === null && calls < 200) {
      calls++;
    }
    // weak zombies swing once per second
    assert.ok(calls >= 58 && calls <= 61, `next attack after ${calls} ticks`);
  });

  it("should enter probing after K still ticks and hold when every heading is blocked", () => {
    const store = new EntityStore();
    // a pocket too small for any detour point to fit
    const obstacles = new ObstacleIndex([], { bounds: { width: 20, height: 20 } });
    const brain = new ZombieBrain(obstacles, { stuckTicks: 10, detourTimeoutTicks: 45 });
    const player = store.spawnPlayer({ x: 100, y: 10 });
    const zombie = store.spawnZombie("weak", { x: 10, y: 10 }, { radius: 4 });
    const ai = createZombieAIState(zombie);

    for (let t = 1; t <= 9; t++) brain.decide(zombie, ai, player, DT);
    assert.strictEqual(ai.mode, "seeking");
    assert.strictEqual(ai.stuckTicks, 9);

    brain.decide(zombie, ai, player, DT);
    assert.strictEqual(ai.mode, "probing");
    assert.strictEqual(ai.detourHeading, null);
    assert.strictEqual(zombie.vx, 0);
    assert.strictEqual(zombie.vy, 0);

    for (let t = 11; t <= 54; t++) brain.decide(zombie, ai, player, DT);
    assert.strictEqual(ai.mode, "probing");
    assert.strictEqual(ai.detourTicksRemaining, 1);

    brain.decide(zombie, ai, player, DT);
    assert.strictEqual(ai.mode, "seeking");
    assert.ok(zombie.vx > 0);
  });

  it("should pick the first clear detour angle", () => {
    const store = new EntityStore();
    const obstacles = new ObstacleIndex([{ kind: "circle", id: 1, x: 20, y: 0, radius: 16 }]);
    const brain = new ZombieBrain(obstacles);
    const zombie = store.spawnZombie("weak", { x: 0, y: 0 }, { radius: 4 });

    assert.strictEqual(brain.isHeadingClear(zombie, { x: 1, y: 0 }), false);
    const heading = brain.chooseDetourHeading(zombie, { x: 1, y: 0 });
    assert.ok(heading);
    // 0, +45 and -45 all clip the obstacle; +90 is the first clear one
    assert.ok(Math.abs(heading.x) < 1e-9);
    assert.ok(Math.abs(heading.y - 1) < 1e-9);
  });

  it("should drop state for forgotten zombies", () => {
    const sim = new Simulation({ seed: 1, obstacles: [], bounds: null, director: { maxCap: 0 } });
    sim.spawnPlayer({ x: 0, y: 0 });
    const zombie = sim.entities.spawnZombie("weak", { x: 200, y: 0 });
    sim.step();
    assert.strictEqual(sim.navigation.getState(zombie.id)?.mode, "seeking");

    sim.navigation.forget([zombie.id]);
    assert.strictEqual(sim.navigation.getState(zombie.id), undefined);
  });
});

// ─── Scenario: stuck against an obstacle ───

describe("ZombieBrain stuck recovery", () => {
  function scenario() {
    const sim = new Simulation({
      seed: 5,
      obstacles: [{ kind: "circle", id: 1, x: 20, y: 0, radius: 16 }],
      bounds: null,
      director: { maxCap: 0 },
      navigation: { stuckTicks: 10, detourTimeoutTicks: 45 },
    });
    sim.spawnPlayer({ x: 100, y: 0 });
    const zombie = sim.entities.spawnZombie("weak", { x: 0, y: 0 }, { radius: 4, speed: 60 });
    return { sim, zombie };
  }

  it("should go Seeking → Probing by tick K and back to Seeking within the detour timeout", () => {
    const { sim, zombie } = scenario();
    const modes: ZombieMode[] = [];
    for (let t = 1; t <= 80; t++) {
      sim.step();
      const mode = sim.behaviorHint(zombie.id);
      assert.ok(mode);
      modes.push(mode);
    }

    assert.strictEqual(modes[8], "seeking"); // tick 9
    assert.strictEqual(modes[9], "probing"); // tick 10

    const recovered = modes.indexOf("seeking", 10);
    assert.ok(recovered > 10, "zombie never left probing");
    assert.ok(recovered + 1 <= 10 + 45, `recovered at tick ${recovered + 1}`);
  });

  it("should get past the obstacle and reach the player", () => {
    const { sim, zombie } = scenario();
    for (let t = 0; t < 300; t++) sim.step();

    assert.ok(zombie.x > 40, `zombie stalled at (${zombie.x}, ${zombie.y})`);
    assert.notStrictEqual(sim.behaviorHint(zombie.id), "probing");
    const player = sim.player;
    assert.ok(player);
    assert.ok(player.health < player.maxHealth, "zombie never reached the player");
  });

  it("should replay identically from the same seed", () => {
    const a = scenario();
    const b = scenario();
    for (let t = 0; t < 120; t++) {
      a.sim.step();
      b.sim.step();
    }
    assert.deepStrictEqual([a.zombie.x, a.zombie.y], [b.zombie.x, b.zombie.y]);
  });
});
