import type { Entity, Obstacle } from "../types/entity.js";
import type { Simulation } from "../game/Simulation.js";
import { WEAPON_CONFIGS } from "../types/weapons.js";
import { EntityView, ObstacleView, type SurvivalState } from "./schema/SurvivalState.js";

function subtypeOf(entity: Entity): string {
  switch (entity.kind) {
    case "player":
      return entity.weapon;
    case "zombie":
      return entity.zombieType;
    case "pickup":
      return entity.pickupType;
    case "projectile":
      return "";
  }
}

/** Static geometry is sent once, when the room is created. */
export function syncObstacles(state: SurvivalState, obstacles: readonly Obstacle[]): void {
  state.obstacles.clear();
  for (const o of obstacles) {
    const view = new ObstacleView();
    view.id = o.id;
    view.shape = o.kind;
    if (o.kind === "circle") {
      view.x = o.x;
      view.y = o.y;
      view.radius = o.radius;
    } else {
      view.x = o.minX;
      view.y = o.minY;
      view.width = o.maxX - o.minX;
      view.height = o.maxY - o.minY;
    }
    state.obstacles.push(view);
  }
}

/**
 * Mirrors the simulation into the room state after a batch of ticks: one
 * view per entity still in the store, plus the score and director readouts.
 */
export function syncState(state: SurvivalState, sim: Simulation): void {
  const seen = new Set<string>();

  for (const entity of sim.entities.all()) {
    const key = String(entity.id);
    seen.add(key);
    let view = state.entities.get(key);
    if (!view) {
      view = new EntityView();
      view.id = entity.id;
      view.kind = entity.kind;
      state.entities.set(key, view);
    }
    view.subtype = subtypeOf(entity);
    view.x = entity.x;
    view.y = entity.y;
    view.radius = entity.radius;
    if (entity.kind === "player" || entity.kind === "zombie") {
      view.health = entity.health;
      view.maxHealth = entity.maxHealth;
    }
    view.mode = sim.behaviorHint(entity.id) ?? "";
  }

  const stale: string[] = [];
  state.entities.forEach((_view, key) => {
    if (!seen.has(key)) stale.push(key);
  });
  for (const key of stale) {
    state.entities.delete(key);
  }

  const score = sim.score.snapshot();
  state.tick = sim.clock.tick;
  state.elapsed = score.elapsed;
  state.score = score.score;
  state.kills = score.kills;
  state.targetCount = sim.directive.targetCount;
  state.waveIntensity = sim.director.getWaveIntensity(score.elapsed);

  syncLoadout(state, sim);
}

function syncLoadout(state: SurvivalState, sim: Simulation): void {
  const player = sim.player;
  const inventory = player ? sim.weapons.inventoryOf(player.id) : null;
  const slot = inventory?.current ?? null;
  state.weapon = slot?.type ?? "";
  state.ammo = slot?.ammo ?? 0;
  state.magazineSize = slot ? WEAPON_CONFIGS[slot.type].magazineSize : 0;
  state.reloading = (slot?.reloadTicksRemaining ?? 0) > 0;

  const slots = (inventory?.weapons ?? []).map((type) => type ?? "");
  if (slots.join(",") !== state.weapons.toArray().join(",")) {
    state.weapons.clear();
    state.weapons.push(...slots);
  }

  const active = player ? sim.effects.active(player.id) : [];
  const live = new Set<string>();
  for (const effect of active) {
    live.add(effect.type);
    state.effects.set(effect.type, effect.ticksRemaining * sim.clock.dt);
  }
  const expired: string[] = [];
  state.effects.forEach((_seconds, type) => {
    if (!live.has(type)) expired.push(type);
  });
  for (const type of expired) {
    state.effects.delete(type);
  }
}
