import "dotenv/config";
import { loadConfig } from "./config";
import { buildRuntime } from "./runtime";
import { buildServer } from "./server";

async function main() {
  const config = loadConfig();
  const runtime = buildRuntime(config);
  const app = buildServer(runtime, { logger: true });

  await app.listen({ host: config.server.host, port: config.server.port });
  console.log(
    `[server] listening on ${config.server.host}:${config.server.port} (reply generation ${
      runtime.generator ? `enabled, model ${runtime.generator.model}` : "disabled"
    })`
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
