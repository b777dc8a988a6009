// cairn server process.
//
// Reads its settings from CAIRN_* environment variables and serves until
// SIGINT or SIGTERM.

import { loadServerConfig } from "./config.ts";
import { Server } from "./server.ts";

async function main() {
  const config = loadServerConfig(process.env);
  const server = new Server(config);
  const address = await server.listen();
  console.error(`cairn listening on ${address.address}:${address.port}`);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.error(`${signal} received, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
