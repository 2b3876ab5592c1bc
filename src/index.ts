import { buildApp } from "./api/index.js";
import { config } from "./config.js";
import { OrderManagement } from "./engine/index.js";

async function main() {
  const engine = new OrderManagement();
  const app = await buildApp({ engine });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "shutting down");
    await app.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error(err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
