import http from "http";
import https from "https";
import fs from "fs";
import storage from "node-persist";
import * as hap from "hap-nodejs";
import { z } from "zod";

import express from "express";
import type { Express } from "express";

//express middleware
import morgan from "morgan";
import compression from "compression";
import errorHandler from "errorhandler";
import bodyParser from "body-parser";

import * as config from "./config.ts";
import { createLogger } from "./logger.ts";
import { configureApiRoutes } from "./api.ts";
import coverBridge from "./cover-accessory.ts";
import { CalibrationStore } from "./calibration-store.ts";
import { CalibrationService } from "./calibration-service.ts";
import { CoverRegistry } from "./cover-registry.ts";
import { SnapshotPoller } from "./snapshot-poller.ts";
import {
  SimulatedCoverBackend,
  type SimulatedCoverDefinition,
} from "./simulated-backend.ts";

const coverDefinitions = z.array(
  z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    openTime: z.number().positive(),
    closeTime: z.number().positive(),
    initialPosition: z.number().min(0).max(100).optional(),
  })
);

// Configure express and its middleware
const app: Express = express();
const port = process.env.PORT || config.APP_SERVER_PORT;

app.enable("trust proxy");
app.set("port", port);
app.use(compression());

// configure logging
app.locals.logger = createLogger(config.LOG_LEVEL);
app.use(
  morgan("combined", {
    stream: {
      write: (message: string) => {
        app.locals.logger?.verbose(message.trim());
      },
    },
  })
);

app.use(bodyParser.json());
configureApiRoutes(app);
if (process.env.NODE_ENV !== "production") {
  app.use(errorHandler());
}

(async () => {
  // setup storage engine
  await storage.init({
    dir: config.PERSIST_DIR,
    forgiveParseErrors: true,
  });

  const logger = app.locals.logger;
  const calibrationStore = new CalibrationStore(storage, logger);
  const backend = new SimulatedCoverBackend(loadCoverDefinitions(), logger);
  const poller = new SnapshotPoller({
    backend,
    logger,
    onSnapshots: (snapshots) => registry.applySnapshots(snapshots),
    onError: () => registry.markUnavailable(),
  });
  const registry = new CoverRegistry({
    backend,
    store: calibrationStore,
    logger,
    requestRefresh: () => poller.requestRefresh(),
  });
  await registry.load();
  app.locals.calibrationStore = calibrationStore;
  app.locals.coverRegistry = registry;
  app.locals.calibration = new CalibrationService({
    store: calibrationStore,
    logger,
    resolveTarget: (coverId) => registry.get(coverId),
  });

  await poller.poll();
  poller.start();

  const bridge = startHomekitServer(app, registry);
  const server = await startServer(app);

  const cleanup = async () => {
    server.close();
    poller.stop();
    await app.locals.calibration.dispose();
    registry.dispose();
    backend.dispose();
    await bridge.unpublish();
    process.exit();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      cleanup().catch((err: unknown) => {
        logger.error(err instanceof Error ? err.stack : String(err));
        process.exit(1);
      });
    });
  }
})().catch((err: unknown) => {
  app.locals.logger?.error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});

function loadCoverDefinitions(): SimulatedCoverDefinition[] {
  return coverDefinitions.parse(
    JSON.parse(fs.readFileSync(config.COVERS_FILE, "utf8"))
  );
}

function startHomekitServer(app: Express, registry: CoverRegistry): hap.Bridge {
  const bridge = coverBridge(registry.list(), app.locals.logger);
  bridge
    .publish({
      port: config.HOMEKIT_PORT,
      username: config.HOMEKIT_USERNAME,
      pincode: config.HOMEKIT_PINCODE,
      category: hap.Categories.BRIDGE,
    })
    .then(() => {
      app.locals.logger?.info("Published HomeKit bridge");
    })
    .catch((err: unknown) => {
      app.locals.logger?.error(
        `Failed to publish HomeKit bridge: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
    });
  return bridge;
}

function startServer(app: Express): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = config.APP_HTTPS
      ? https.createServer(sslOptions(), app)
      : http.createServer(app);
    let listening = false;
    server
      .listen(port, () => {
        listening = true;
        app.locals.logger?.info(
          `Listening for ${config.APP_HTTPS ? "https" : "http"} on port ${port}`
        );
        resolve(server);
      })
      .on("error", (err: NodeJS.ErrnoException) => {
        if (listening) {
          app.locals.logger?.error(err.stack);
          process.exit(1);
        }
        switch (err.code) {
          case "EACCES":
            app.locals.logger?.error(
              `No permission to bind port ${port}, set PORT to an unprivileged port`
            );
            break;
          case "EADDRINUSE":
            app.locals.logger?.error(
              `Port ${port} is already in use, is another instance running?`
            );
            break;
        }
        reject(err);
      });
  });
}

function sslOptions(): https.ServerOptions {
  const cert = readOptionalFile(config.SSL_CERT);
  const key = readOptionalFile(config.SSL_KEY);
  return {
    ...(cert ? { cert } : {}),
    ...(key ? { key } : {}),
  };
}

function readOptionalFile(path: string): string | null {
  if (!fs.existsSync(path)) {
    return null;
  }
  return fs.readFileSync(path, "utf8");
}
