import express, { type Express } from "express";
import path from "path";
import { fileURLToPath } from "url";
import { SessionStore } from "../session/store.js";
import { loadConfig, type AppConfig } from "../shared/config.js";
import { TemplateBinder } from "../templates/binder.js";
import { TemplateRegistry } from "../templates/registry.js";
import { errorHandler, requestLogger } from "./middleware.js";
import { createRouter } from "./routes.js";

export interface AppOptions {
  config?: AppConfig;
  registry?: TemplateRegistry;
  /** Log one line per request (off in tests). */
  logRequests?: boolean;
}

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? loadConfig();
  const registry = options.registry ?? new TemplateRegistry({ templatesDir: config.templatesDir });
  const store = new SessionStore(new TemplateBinder(registry), {
    maxItemsPerType: config.maxItemsPerType,
  });

  const app = express();
  if (options.logRequests) app.use(requestLogger());
  app.use(express.json({ limit: "1mb" }));

  app.use(
    createRouter({
      store,
      registry,
      mapDoctype: config.mapDoctype,
      zipLevel: config.zipLevel,
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "NOT_FOUND", message: "Route not found" });
  });
  app.use(errorHandler);

  return app;
}

// ── Start server ────────────────────────────────────────────────

export function startServer(config: AppConfig = loadConfig()) {
  const app = createApp({ config, logRequests: true });
  return app.listen(config.port, () => {
    console.log(`dita-scaffold API running on port ${config.port}`);
    if (config.templatesDir) {
      console.log(`  Custom templates: ${config.templatesDir}`);
    }
  });
}

// Start if run directly
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  startServer();
}
