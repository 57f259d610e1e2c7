import {
  closeAppContext,
  createAppContext,
  ensureSchema,
} from "../app-context.js";
import { buildServer } from "./app.js";

const context = createAppContext();
const { port, host } = context.config.server;

await ensureSchema(context);

const app = await buildServer({
  db: context.database.db,
  orchestrator: context.orchestrator,
});

app.addHook("onClose", async () => {
  await closeAppContext(context);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().catch((error: unknown) => {
      app.log.error(error, "Error during shutdown");
      process.exitCode = 1;
    });
  });
}

// Start server
try {
  await app.listen({ port, host });
  app.log.info({ host, port }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
