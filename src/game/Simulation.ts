import { SIM } from "../config/game.constants.js";
import type { CollisionEvent, EntityId, Obstacle, PlayerEntity, Vec2 } from "../types/entity.js";
import type { WeaponType } from "../types/weapons.js";
import { CollisionWorld, type CollisionConfig } from "./CollisionWorld.js";
import { applyCombat, type CombatOutcome } from "./CombatResolver.js";
import type { SimulationContext } from "./context.js";
import { EffectSystem } from "./EffectSystem.js";
import { EntityStore, type PlayerSpawnOptions } from "./EntityStore.js";
import { length } from "./geometry.js";
import { ItemSpawner, type ItemSpawnerConfig } from "./ItemSpawner.js";
import { ObstacleIndex, type WorldBounds } from "./ObstacleIndex.js";
import { Rng } from "./Rng.js";
import { ScoreSystem } from "./ScoreSystem.js";
import { SimulationClock, type ClockConfig } from "./SimulationClock.js";
import { WeaponSystem } from "./WeaponSystem.js";
import { ZombieBrain, type NavigationConfig, type ZombieAttack, type ZombieMode } from "./ZombieBrain.js";
import { ZombieManager, type DirectorConfig, type SpawnDirective } from "./ZombieManager.js";

export interface SimulationOptions {
  seed: number;
  obstacles: readonly Obstacle[];
  /** Map size; null for an unbounded plane. */
  bounds: WorldBounds | null;
  director?: Partial<DirectorConfig>;
  navigation?: Partial<NavigationConfig>;
  collision?: Partial<CollisionConfig>;
  clock?: Partial<ClockConfig>;
  items?: Partial<ItemSpawnerConfig>;
  dropChance?: number;
}

export interface TickResult {
  tick: number;
  directive: SpawnDirective;
  spawned: EntityId[];
  itemsSpawned: EntityId[];
  attacks: ZombieAttack[];
  events: readonly CollisionEvent[];
  combat: CombatOutcome;
  removed: EntityId[];
}

/**
 * One game's simulation core. Every component gets the same explicit context
 * and runs once per tick in a fixed order:
 *
 *   effects → director → spawns → items → navigation → integration → collision
 *     → combat → despawn → regen → score
 *
 * Entities only leave the store in the despawn stage, so every stage of a
 * tick sees the same entity set.
 */
export class Simulation {
  readonly entities: EntityStore;
  readonly obstacles: ObstacleIndex;
  readonly rng: Rng;
  readonly clock: SimulationClock;
  readonly score: ScoreSystem;
  readonly director: ZombieManager;
  readonly navigation: ZombieBrain;
  readonly collision: CollisionWorld;
  readonly effects: EffectSystem;
  readonly weapons: WeaponSystem;
  readonly items: ItemSpawner;
  readonly context: SimulationContext;

  private readonly dropChance: number | undefined;
  private playerId: EntityId | null = null;
  private input: Vec2 = { x: 0, y: 0 };
  private lastDirective: SpawnDirective;

  constructor(options: SimulationOptions) {
    this.rng = new Rng(options.seed);
    this.obstacles = new ObstacleIndex(options.obstacles, {
      cellSize: options.collision?.cellSize,
      bounds: options.bounds,
    });
    this.entities = new EntityStore({
      maxRadius: options.collision?.cellSize !== undefined ? options.collision.cellSize / 2 : undefined,
      rng: this.rng,
    });
    this.clock = new SimulationClock(options.clock);
    this.score = new ScoreSystem();
    this.director = new ZombieManager(this.obstacles, options.director);
    this.navigation = new ZombieBrain(this.obstacles, options.navigation);
    this.collision = new CollisionWorld(this.obstacles, options.collision);
    const tickRate = options.clock?.tickRate ?? SIM.TICK_RATE;
    this.effects = new EffectSystem(tickRate);
    this.weapons = new WeaponSystem(this.entities, this.effects, tickRate);
    this.items = new ItemSpawner(this.obstacles, options.items);
    this.dropChance = options.dropChance;
    this.context = {
      entities: this.entities,
      obstacles: this.obstacles,
      rng: this.rng,
      clock: this.clock,
      score: this.score,
    };
    this.lastDirective = {
      weights: this.director.compositionWeights(0),
      targetCount: this.director.targetCount(0, 0),
      spawnInterval: this.director.spawnInterval(0),
      spawnTimerRemaining: this.director.spawnTimerRemaining,
    };
  }

  spawnPlayer(position: Vec2, opts: PlayerSpawnOptions = {}): PlayerEntity {
    const player = this.entities.spawnPlayer(position, opts);
    this.playerId = player.id;
    return player;
  }

  get player(): PlayerEntity | null {
    if (this.playerId === null) return null;
    const entity = this.entities.get(this.playerId);
    return entity && entity.kind === "player" && entity.alive ? entity : null;
  }

  /** True once a player has joined and died. */
  get isOver(): boolean {
    return this.playerId !== null && this.player === null;
  }

  get directive(): SpawnDirective {
    return this.lastDirective;
  }

  /** Movement intent; components are clamped so the diagonal is no faster. */
  setPlayerInput(dx: number, dy: number): void {
    const len = length(dx, dy);
    this.input = len > 1 ? { x: dx / len, y: dy / len } : { x: dx, y: dy };
  }

  fire(angle: number, weapon?: WeaponType): EntityId[] {
    if (this.playerId === null) return [];
    return this.weapons.fire(this.playerId, angle, weapon).map((p) => p.id);
  }

  switchWeapon(slot: number): boolean {
    return this.playerId !== null && this.weapons.switchWeapon(this.playerId, slot);
  }

  cycleWeapon(direction: 1 | -1): boolean {
    return this.playerId !== null && this.weapons.cycleWeapon(this.playerId, direction);
  }

  reload(): boolean {
    return this.playerId !== null && this.weapons.reload(this.playerId);
  }

  /** Navigation mode for zombies, for animation; null for every other entity. */
  behaviorHint(id: EntityId): ZombieMode | null {
    const entity = this.entities.get(id);
    if (!entity || entity.kind !== "zombie") return null;
    return this.navigation.getState(id)?.mode ?? "seeking";
  }

  /** Feeds wall-clock time to the fixed-step clock and returns the ticks it ran. */
  advance(elapsedMs: number): TickResult[] {
    const results: TickResult[] = [];
    this.clock.advance(elapsedMs, () => {
      results.push(this.step());
    });
    return results;
  }

  pause(): void {
    this.clock.pause();
  }

  resume(): void {
    this.clock.resume();
  }

  step(): TickResult {
    const ctx = this.context;
    this.clock.markTick();
    this.effects.tick();
    this.weapons.tick();

    const { directive, requests } = this.director.update(ctx);
    this.lastDirective = directive;
    const spawned = requests.map((r) => this.entities.spawn(r.type, { x: r.x, y: r.y }));
    const itemsSpawned = this.items
      .update(ctx)
      .map((r) => this.entities.spawnPickup(r.type, { x: r.x, y: r.y }, { weapon: r.weapon ?? undefined, ticks: null }).id);

    const attacks = this.navigation.update(ctx);

    this.integrate();

    const events = this.collision.step(this.entities.all());
    const gear = { weapons: this.weapons, effects: this.effects };
    const combat = applyCombat(ctx, events, attacks, this.score, gear, { dropChance: this.dropChance });
    if (combat.playerKilled) {
      console.log(`[Simulation] Player died at tick ${this.clock.tick} with score ${this.score.score}`);
    }

    const removed = this.entities.flushRemovals();
    this.navigation.forget(removed);
    this.weapons.forget(removed);
    this.effects.forget(removed);

    const player = this.player;
    if (player) {
      this.effects.regenerate(player, this.clock.dt);
      this.score.advance(this.clock.dt);
    }

    return { tick: this.clock.tick, directive, spawned, itemsSpawned, attacks, events, combat, removed };
  }

  private integrate(): void {
    const dt = this.clock.dt;
    const player = this.player;
    if (player) {
      const speed = player.speed * this.effects.speedMultiplier(player.id);
      player.vx = this.input.x * speed;
      player.vy = this.input.y * speed;
    }

    for (const e of this.entities.all()) {
      if (!e.alive) continue;
      switch (e.kind) {
        case "projectile":
          if (e.ticksRemaining <= 0 || !this.obstacles.insideBounds(e.x, e.y, 0)) {
            e.alive = false;
            break;
          }
          e.prevX = e.x;
          e.prevY = e.y;
          e.x += e.vx * dt;
          e.y += e.vy * dt;
          e.ticksRemaining--;
          break;
        case "pickup":
          if (e.ticksRemaining === null) break;
          e.ticksRemaining = e.ticksRemaining - 1;
          if (e.ticksRemaining <= 0) e.alive = false;
          break;
        case "player":
        case "zombie":
          e.x += e.vx * dt;
          e.y += e.vy * dt;
          break;
      }
    }
  }
}
