import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { isSimulationError, runToCompletion, theoreticalCollisionCount } from "@piblocks/shared";
import type { ServerConfig } from "./config.js";

type TheoryRoute = {
  Querystring: { mass: number };
};

type SimulateRoute = {
  Body: {
    massLarge: number;
    velocityLarge: number;
    dt?: number;
    maxSteps?: number;
  };
};

export async function buildApp(
  config: ServerConfig,
  logger: FastifyServerOptions["logger"] = { level: config.logLevel }
) {
  const app = Fastify({ logger });

  await app.register(cors, {
    origin: true
  });

  app.get("/health", async () => ({ ok: true }));

  app.get<TheoryRoute>(
    "/theory",
    {
      schema: {
        querystring: {
          type: "object",
          required: ["mass"],
          properties: { mass: { type: "number" } }
        }
      }
    },
    async (req, reply) => {
      const mass = req.query.mass;
      if (!Number.isFinite(mass) || mass <= 0) {
        return reply.code(400).send({ code: "invalid_configuration", message: "mass must be positive" });
      }
      return { mass, theoreticalCount: theoreticalCollisionCount(mass) };
    }
  );

  app.post<SimulateRoute>(
    "/simulate",
    {
      schema: {
        body: {
          type: "object",
          required: ["massLarge", "velocityLarge"],
          properties: {
            massLarge: { type: "number", exclusiveMinimum: 0, maximum: config.maxMass },
            velocityLarge: { type: "number" },
            dt: { type: "number" },
            maxSteps: { type: "integer", minimum: 1, maximum: config.simulateMaxSteps }
          }
        }
      }
    },
    async (req, reply) => {
      const { massLarge, velocityLarge, dt, maxSteps } = req.body;
      try {
        const report = runToCompletion(
          { massLarge, velocityLarge },
          { dt: dt ?? config.simDt, maxSteps: maxSteps ?? config.simulateMaxSteps }
        );
        req.log.info({ massLarge, velocityLarge, collisionCount: report.collisionCount }, "headless run");
        return report;
      } catch (err) {
        if (!isSimulationError(err)) throw err;
        return reply.code(400).send({ code: err.code, message: err.message });
      }
    }
  );

  return app;
}
