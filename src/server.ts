import express from "express";
import next from "next";
import { createArtifactCache } from "./artifacts";
import { loadServerConfig } from "./config";
import { SessionRegistry } from "./history";
import { createApiRouter } from "./routes";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const app = next({ dev: config.dev });
  const handle = app.getRequestHandler();

  // Load once at start; a failure only disables prediction.
  const artifacts = createArtifactCache(config.artifacts);
  const state = artifacts.get();
  if (state.status === "ready") {
    const { modelPath, scalerPath } = config.artifacts;
    console.log(`Loaded model ${modelPath} and scaler ${scalerPath}.`);
  } else {
    console.warn(`Prediction disabled: ${state.error.message}`);
  }

  const sessions = new SessionRegistry(config.sessionTtlMs);

  await app.prepare();

  const server = express();
  server.use(createApiRouter({ artifacts, sessions }));

  // Let Next handle everything else
  server.all("*", (req, res, fail) => {
    handle(req, res).catch(fail);
  });

  server.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (dev=${config.dev})`
    );
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
