import {
    defineServer,
    defineRoom,
    monitor,
    playground,
    createRouter,
    createEndpoint,
} from "colyseus";

/**
 * Import your Room files
 */
import { SurvivalRoom } from "./rooms/SurvivalRoom.js";
import { SIM } from "./config/game.constants.js";
import { getEnv } from "./config/env.js";
import { ZOMBIE_CONFIGS } from "./types/zombie.js";
import { WEAPON_CONFIGS } from "./types/weapons.js";
import { EFFECTS } from "./types/items.js";

const env = getEnv();

const server = defineServer({
    rooms: {
        survival: defineRoom(SurvivalRoom),
    },

    /**
     * Usage from SDK:
     *   client.http.get("/api/sim-config").then((response) => {})
     */
    routes: createRouter({
        api_sim_config: createEndpoint("/api/sim-config", { method: "GET" }, async () => {
            return {
                map: {
                    width: SIM.MAP_WIDTH,
                    height: SIM.MAP_HEIGHT,
                },
                rules: {
                    tickRate: SIM.TICK_RATE,
                    tickMs: SIM.TICK_MS,
                    player: SIM.PLAYER,
                },
                director: SIM.DIRECTOR,
                navigation: SIM.NAVIGATION,
                zombies: ZOMBIE_CONFIGS,
                weapons: WEAPON_CONFIGS,
                items: SIM.ITEMS,
                effects: EFFECTS,
            };
        }),
    }),

    express: (app) => {
        /**
         * It is recommended to protect this route with a password
         */
        app.use("/monitor", monitor());

        // not for production
        if (env.NODE_ENV !== "production" || env.DEV_MODE) {
            app.use("/", playground());
        }
    }

});

export default server;
