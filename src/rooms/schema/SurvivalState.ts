import { Schema, type, ArraySchema, MapSchema } from "@colyseus/schema";

export class EntityView extends Schema {
  @type("number") id: number = 0;
  @type("string") kind: string = ""; // "player" | "zombie" | "projectile" | "pickup"
  @type("string") subtype: string = ""; // zombie type, pickup type or weapon
  @type("number") x: number = 0;
  @type("number") y: number = 0;
  @type("number") radius: number = 0;
  @type("number") health: number = 0;
  @type("number") maxHealth: number = 0;
  @type("string") mode: string = ""; // "seeking" | "probing" | "attacking" for zombies
}

export class ObstacleView extends Schema {
  @type("number") id: number = 0;
  @type("string") shape: string = "circle"; // "circle" | "box"
  // circle: centre; box: min corner
  @type("number") x: number = 0;
  @type("number") y: number = 0;
  @type("number") radius: number = 0;
  @type("number") width: number = 0;
  @type("number") height: number = 0;
}

export class SurvivalState extends Schema {
  @type({ map: EntityView }) entities = new MapSchema<EntityView>();
  @type([ObstacleView]) obstacles = new ArraySchema<ObstacleView>();
  @type("number") tick: number = 0;
  @type("number") mapWidth: number = 0;
  @type("number") mapHeight: number = 0;
  @type("string") phase: string = "waiting"; // "waiting" | "active" | "paused" | "ended"
  @type("number") elapsed: number = 0;
  @type("number") score: number = 0;
  @type("number") kills: number = 0;
  @type("number") targetCount: number = 0;
  @type("number") waveIntensity: number = 0;
  // player loadout
  @type("string") weapon: string = "";
  @type("number") ammo: number = 0;
  @type("number") magazineSize: number = 0;
  @type("boolean") reloading: boolean = false;
  @type(["string"]) weapons = new ArraySchema<string>(); // "" for an empty slot
  @type({ map: "number" }) effects = new MapSchema<number>(); // seconds remaining per active effect
}
