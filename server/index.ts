import { createApp } from "./app";
import { createClassifier } from "./classification";
import { loadEnvironment } from "./config/environment";
import { createTextGenerator } from "./llm/textGenerator";
import { loadTenantDirectory } from "./registry";
import { logError } from "./utils/errorHandler";

function main(): void {
  const env = loadEnvironment();

  // Registries are built once here and shared read-only by every request.
  const tenants = loadTenantDirectory(env.ORGS_DIR);

  const classifier = createClassifier({
    tenants,
    generator: createTextGenerator({ model: env.CLASSIFICATION_MODEL, timeoutMs: env.LLM_TIMEOUT_MS }),
  });
  const chatGenerator = createTextGenerator({ model: env.CHAT_MODEL, timeoutMs: env.CHAT_STREAM_TIMEOUT_MS });

  const app = createApp({ tenants, classifier, chatGenerator }, { corsOrigin: env.CORS_ORIGIN });

  app.listen(env.PORT, () => {
    console.log(`[Server] Program router listening on port ${env.PORT} (${env.NODE_ENV})`);
  });
}

try {
  main();
} catch (error) {
  logError("Server", error);
  process.exit(1);
}
