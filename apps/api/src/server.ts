import { config } from "./config.js";
import { createApp } from "./app.js";

function bootstrap(): void {
  const app = createApp();

  const server = app.listen(config.apiPort, () => {
    console.log(`API running at http://localhost:${config.apiPort}`);
  });

  const shutdown = () => {
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  bootstrap();
} catch (error) {
  console.error("Failed to bootstrap API", error);
  process.exit(1);
}
