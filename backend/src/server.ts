import { env } from "./config/env";
import { createApp } from "./app";

function bootstrap(): void {
  const app = createApp();
  app.listen(env.PORT, () => {
    console.log(`Backend listening on http://localhost:${env.PORT}`);
  });
}

try {
  bootstrap();
} catch (error) {
  console.error("Failed to start backend:", error);
  process.exit(1);
}
