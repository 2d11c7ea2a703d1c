import { Room, Client, CloseCode } from "colyseus";
import { SurvivalState } from "./schema/SurvivalState.js";
import { SIM } from "../config/game.constants.js";
import { getEnv } from "../config/env.js";
import {
  PlayerMoveSchema,
  PlayerFireSchema,
  SurvivalRoomOptionsSchema,
  SwitchWeaponSchema,
} from "../types/messages.js";
import type { GameOverEvent, ItemPickedUpEvent, KillEvent, PlayerHitEvent } from "../types/messages.js";
import { generateObstacles, getPlayerStart } from "../game/MapGenerator.js";
import { Simulation, type TickResult } from "../game/Simulation.js";
import { syncObstacles, syncState } from "./syncState.js";

export class SurvivalRoom extends Room<{ state: SurvivalState }> {
  maxClients: number = 1;
  state = new SurvivalState();

  private sim: Simulation | null = null;
  private playerHealth: number | undefined;

  messages = {
    PLAYER_MOVE: (client: Client, message: unknown) => {
      const parsed = PlayerMoveSchema.safeParse(message);
      if (!parsed.success || !this.sim || this.state.phase !== "active") return;
      this.sim.setPlayerInput(parsed.data.dx, parsed.data.dy);
    },

    PLAYER_FIRE: (client: Client, message: unknown) => {
      const parsed = PlayerFireSchema.safeParse(message);
      if (!parsed.success || !this.sim || this.state.phase !== "active") return;
      this.sim.fire(parsed.data.angle, parsed.data.weapon);
    },

    SWITCH_WEAPON: (client: Client, message: unknown) => {
      const parsed = SwitchWeaponSchema.safeParse(message);
      if (!parsed.success || !this.sim || this.state.phase !== "active") return;
      if ("slot" in parsed.data) {
        this.sim.switchWeapon(parsed.data.slot);
      } else {
        this.sim.cycleWeapon(parsed.data.direction);
      }
    },

    RELOAD: (client: Client) => {
      if (!this.sim || this.state.phase !== "active") return;
      this.sim.reload();
    },

    PAUSE: (client: Client) => {
      if (!this.sim || this.state.phase !== "active") return;
      this.sim.pause();
      this.state.phase = "paused";
      console.log(`[SurvivalRoom] ${client.sessionId} paused at tick ${this.state.tick}`);
    },

    RESUME: (client: Client) => {
      if (!this.sim || this.state.phase !== "paused") return;
      this.sim.resume();
      this.state.phase = "active";
      console.log(`[SurvivalRoom] ${client.sessionId} resumed at tick ${this.state.tick}`);
    },
  };

  onCreate(options?: Record<string, unknown>) {
    const parsed = SurvivalRoomOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
      console.error(`[SurvivalRoom] Rejected room options: ${parsed.error.message}`);
      throw new Error("Invalid room options");
    }
    const opts = parsed.data;
    const seed = opts.seed ?? getEnv().SIM_SEED ?? Math.floor(Math.random() * 0x7fffffff);

    const width = SIM.MAP_WIDTH;
    const height = SIM.MAP_HEIGHT;
    const obstacles = opts.obstacles ?? generateObstacles(seed, {
      width,
      height,
      start: getPlayerStart(width, height),
      count: opts.obstacleCount ?? SIM.OBSTACLES.COUNT,
    });

    this.sim = new Simulation({
      seed,
      obstacles,
      bounds: { width, height },
      director: opts.director,
      navigation: opts.navigation,
      items: opts.items,
      dropChance: opts.dropChance,
    });
    this.playerHealth = opts.playerHealth;

    this.state.mapWidth = width;
    this.state.mapHeight = height;
    syncObstacles(this.state, this.sim.obstacles.obstacles);

    this.setSimulationInterval((deltaTime) => this.update(deltaTime), SIM.TICK_MS);
    console.log(`[SurvivalRoom] Room ${this.roomId} created (seed ${seed}, ${obstacles.length} obstacles)`);
  }

  onJoin(client: Client) {
    if (!this.sim) return;
    const player = this.sim.spawnPlayer(getPlayerStart(this.state.mapWidth, this.state.mapHeight), {
      health: this.playerHealth,
    });
    this.state.phase = "active";
    syncState(this.state, this.sim);
    console.log(`[SurvivalRoom] ${client.sessionId} joined as entity ${player.id}`);
  }

  private update(deltaTime: number) {
    const sim = this.sim;
    if (!sim || this.state.phase !== "active") return;

    for (const result of sim.advance(deltaTime)) {
      this.broadcastTick(result);
    }
    syncState(this.state, sim);

    if (sim.isOver) {
      this.endGame();
    }
  }

  private broadcastTick(result: TickResult) {
    const sim = this.sim;
    if (!sim) return;

    for (const kill of result.combat.kills) {
      const evt: KillEvent = {
        tick: result.tick,
        victimId: kill.victimId,
        zombieType: kill.zombieType,
        scoreAfter: sim.score.score,
      };
      this.broadcast("ZOMBIE_KILLED", evt);
    }

    for (const pickup of result.combat.pickups) {
      const evt: ItemPickedUpEvent = {
        tick: result.tick,
        pickupType: pickup.pickupType,
        weapon: pickup.weapon,
        healed: pickup.healed,
      };
      this.broadcast("ITEM_PICKED_UP", evt);
    }

    if (result.combat.playerDamage > 0) {
      const evt: PlayerHitEvent = {
        tick: result.tick,
        damage: result.combat.playerDamage,
        healthAfter: sim.player?.health ?? 0,
      };
      this.broadcast("PLAYER_HIT", evt);
    }
  }

  private endGame() {
    const sim = this.sim;
    if (!sim || this.state.phase === "ended") return;
    this.state.phase = "ended";

    const score = sim.score.snapshot();
    const evt: GameOverEvent = {
      tick: sim.clock.tick,
      elapsed: score.elapsed,
      score: score.score,
      kills: score.kills,
    };
    this.broadcast("GAME_OVER", evt);
    console.log(
      `[SurvivalRoom] Game over in ${this.roomId}: survived ${score.elapsed.toFixed(1)}s, score ${score.score}, kills ${score.kills}`,
    );
  }

  onLeave(client: Client, code: CloseCode) {
    // one player per room: leaving ends the run
    this.endGame();
    console.log(`[SurvivalRoom] ${client.sessionId} left (code: ${code})`);
  }

  onDispose() {
    console.log(`[SurvivalRoom] Room ${this.roomId} disposing...`);
  }
}
