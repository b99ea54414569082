import { DEFAULT_FRAME_DT, DEFAULT_MAX_STEPS } from "@piblocks/shared";

export type ServerConfig = {
  port: number;
  host: string;
  logLevel: string;
  // Wall-clock cadence of the session tick.
  tickEveryMs: number;
  // Simulated seconds advanced per tick.
  simDt: number;
  simulateMaxSteps: number;
  // Largest accepted massLarge. One run resolves about pi * sqrt(m) collisions.
  maxMass: number;
};

export const DEFAULT_MAX_MASS = 1e12;

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${key} must be a positive number, got "${raw}"`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const simulateMaxSteps = readNumber(env, "SIMULATE_MAX_STEPS", DEFAULT_MAX_STEPS);
  if (!Number.isInteger(simulateMaxSteps)) {
    throw new Error(`SIMULATE_MAX_STEPS must be an integer, got "${env.SIMULATE_MAX_STEPS}"`);
  }

  return {
    port: readNumber(env, "PORT", 3001),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    tickEveryMs: readNumber(env, "TICK_EVERY_MS", 16),
    simDt: readNumber(env, "SIM_DT", DEFAULT_FRAME_DT),
    simulateMaxSteps,
    maxMass: readNumber(env, "SIMULATE_MAX_MASS", DEFAULT_MAX_MASS)
  };
}
