import type { SimulationConfig, SimulationSnapshot } from "../state/types.js";

export const PROTOCOL_VERSION = 1 as const;

export type ClientToServer =
  | {
      t: "sim/configure";
      massLarge: number;
      velocityLarge: number;
    }
  | {
      t: "sim/stop";
    }
  | {
      t: "ping";
      clientTimeMs: number;
    };

export type ServerToClient =
  | {
      t: "hello";
      protocol: typeof PROTOCOL_VERSION;
      sid: string;
    }
  | {
      t: "sim/configured";
      config: SimulationConfig;
      theoreticalCount: number;
      // Suggested on-screen side length of the large block.
      displaySizeLarge: number;
    }
  | {
      t: "sim/snapshot";
      tick: number;
      serverTimeMs: number;
      state: SimulationSnapshot;
    }
  | {
      t: "sim/finished";
      tick: number;
      collisionCount: number;
      theoreticalCount: number;
    }
  | {
      t: "pong";
      clientTimeMs: number;
      serverTimeMs: number;
    }
  | {
      t: "error";
      code: string;
      message: string;
    };
