import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { attachRealtime } from "./realtime.js";

async function main() {
  const config = loadConfig();
  const app = await buildApp(config);
  attachRealtime(app, config);

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err, "failed to start");
    process.exit(1);
  }
}

// Only reached when config or app construction fails, before a logger exists.
main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
