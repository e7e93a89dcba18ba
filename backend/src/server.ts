import { env } from "./config/env";
import { createApp } from "./app";
import { getDefaultTemplate } from "./services/template/defaultTemplate";

function bootstrap() {
  // Throws if templates/default-template.txt is missing.
  getDefaultTemplate();
  const app = createApp();
  app.listen(env.PORT, () => {
    console.log(`Prompt batch builder listening on http://localhost:${env.PORT}`);
  });
}

try {
  bootstrap();
} catch (error) {
  console.error("Failed to start server:", error);
  process.exit(1);
}
