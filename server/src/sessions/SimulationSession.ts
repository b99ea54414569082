import type { FastifyBaseLogger } from "fastify";
import {
  InvalidConfigurationError,
  createEngine,
  displaySizeForMass,
  isSimulationError,
  theoreticalCollisionCount,
  type ClientToServer,
  type CollisionEngine,
  type ServerToClient,
  type SimulationConfig,
  type SimulationSnapshot
} from "@piblocks/shared";

export type SessionOptions = {
  // Simulated seconds per tick.
  dt: number;
  tickEveryMs: number;
  maxMass: number;
};

/**
 * Hosts at most one engine for one client. Reconfiguring builds a new engine
 * and drops the old one; the engine itself knows nothing about its host.
 */
export class SimulationSession {
  readonly id: string;
  private readonly emit: (msg: ServerToClient) => void;
  private readonly log: FastifyBaseLogger;
  private readonly dt: number;
  private readonly tickEveryMs: number;
  private readonly maxMass: number;

  private engine: CollisionEngine | null = null;
  private config: SimulationConfig | null = null;
  private tick = 0;
  private interval: NodeJS.Timeout | null = null;

  constructor(
    id: string,
    emit: (msg: ServerToClient) => void,
    log: FastifyBaseLogger,
    opts: SessionOptions
  ) {
    this.id = id;
    this.emit = emit;
    this.log = log;
    this.dt = opts.dt;
    this.tickEveryMs = opts.tickEveryMs;
    this.maxMass = opts.maxMass;
  }

  handleCommand(msg: ClientToServer) {
    try {
      if (msg.t === "sim/configure") {
        this.configure({ massLarge: msg.massLarge, velocityLarge: msg.velocityLarge });
        return;
      }
      if (msg.t === "sim/stop") {
        this.stop();
        return;
      }
    } catch (err) {
      if (!isSimulationError(err)) throw err;
      this.log.warn({ sid: this.id, code: err.code }, err.message);
      this.emit({ t: "error", code: err.code, message: err.message });
    }
  }

  configure(config: SimulationConfig) {
    // Throws before anything is replaced.
    if (config.massLarge > this.maxMass) {
      throw new InvalidConfigurationError(`massLarge must not exceed ${this.maxMass}, got ${config.massLarge}`);
    }
    const engine = createEngine(config.massLarge, config.velocityLarge);

    this.stopTicking();
    this.engine = engine;
    this.config = { ...config };
    this.tick = 0;

    const theoreticalCount = theoreticalCollisionCount(config.massLarge);
    this.log.info({ sid: this.id, ...config, theoreticalCount }, "simulation configured");

    this.emit({
      t: "sim/configured",
      config: this.config,
      theoreticalCount,
      displaySizeLarge: displaySizeForMass(config.massLarge)
    });
    this.emitSnapshot(engine);
    this.startTicking();
  }

  stop() {
    if (!this.engine) return;
    this.stopTicking();
    this.engine = null;
    this.config = null;
    this.log.info({ sid: this.id }, "simulation stopped");
  }

  dispose() {
    this.stopTicking();
    this.engine = null;
    this.config = null;
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  currentConfig(): SimulationConfig | null {
    return this.config;
  }

  snapshot(): SimulationSnapshot | null {
    return this.engine?.snapshot() ?? null;
  }

  private startTicking() {
    if (this.interval) return;
    this.interval = setInterval(() => this.step(), this.tickEveryMs);
  }

  private stopTicking() {
    if (this.interval) clearInterval(this.interval);
    this.interval = null;
  }

  private step() {
    const engine = this.engine;
    if (!engine) {
      this.stopTicking();
      return;
    }

    const res = engine.advance(this.dt);
    this.tick++;
    this.emitSnapshot(engine);

    if (res.finished) {
      this.stopTicking();
      const collisionCount = engine.collisionCount();
      const theoreticalCount = theoreticalCollisionCount(engine.massLarge());
      this.log.info({ sid: this.id, tick: this.tick, collisionCount, theoreticalCount }, "simulation finished");
      this.emit({ t: "sim/finished", tick: this.tick, collisionCount, theoreticalCount });
    }
  }

  private emitSnapshot(engine: CollisionEngine) {
    this.emit({
      t: "sim/snapshot",
      tick: this.tick,
      serverTimeMs: Date.now(),
      state: engine.snapshot()
    });
  }
}
