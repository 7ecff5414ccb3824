/**
 * Local HTTP file server acting as a resource provider
 *
 * Serves registered files from an express app bound to a loopback address,
 * with CORS and byte-range support so the renderer can read indexed files in
 * pieces. The server starts when the layer is built and stops when its scope
 * closes.
 *
 * @module resources/local-server
 */

import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import { basename } from "node:path";
import { type } from "arktype";
import cors from "cors";
import { Effect, Layer } from "effect";
import express from "express";
import { ConfigurationError, ResourceProviderError } from "../errors";
import { ResourceProvider, type ResourceProviderShape } from "./service";

/**
 * File server settings
 */
export interface ServerOptions {
  /** Interface to bind (default: "127.0.0.1") */
  host?: string;
  /** Port to bind, 0 for an ephemeral port (default: 0) */
  port?: number;
  /** First path segment of every file URL (default: "files") */
  routePrefix?: string;
}

export const DEFAULT_SERVER_OPTIONS: Required<ServerOptions> = {
  host: "127.0.0.1",
  port: 0,
  routePrefix: "files",
};

const ServerOptionsSchema = type({
  "host?": "string > 0",
  "port?": "0 <= number.integer <= 65535",
  "routePrefix?": "/^[A-Za-z0-9_-]+$/",
});

const EXPOSED_HEADERS = ["Accept-Ranges", "Content-Length", "Content-Range"];

/**
 * Validate options and fill in defaults
 *
 * @throws {ConfigurationError} If an option is out of range
 */
export function resolveServerOptions(options: ServerOptions = {}): Required<ServerOptions> {
  const validated = ServerOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ConfigurationError(`Invalid file server options: ${validated.summary}`, "ServerOptions");
  }
  return {
    host: validated.host ?? DEFAULT_SERVER_OPTIONS.host,
    port: validated.port ?? DEFAULT_SERVER_OPTIONS.port,
    routePrefix: validated.routePrefix ?? DEFAULT_SERVER_OPTIONS.routePrefix,
  };
}

/**
 * Read file server options from `TRACKSMITH_HOST`, `TRACKSMITH_PORT` and
 * `TRACKSMITH_ROUTE_PREFIX`
 *
 * @throws {ConfigurationError} If `TRACKSMITH_PORT` is not an integer
 */
export function loadServerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ServerOptions {
  const options: ServerOptions = {};

  if (env.TRACKSMITH_HOST) {
    options.host = env.TRACKSMITH_HOST;
  }
  if (env.TRACKSMITH_PORT) {
    const port = Number(env.TRACKSMITH_PORT);
    if (!Number.isInteger(port)) {
      throw new ConfigurationError(
        `TRACKSMITH_PORT must be an integer, got "${env.TRACKSMITH_PORT}"`,
        "port"
      );
    }
    options.port = port;
  }
  if (env.TRACKSMITH_ROUTE_PREFIX) {
    options.routePrefix = env.TRACKSMITH_ROUTE_PREFIX;
  }

  return options;
}

interface RunningServer {
  readonly server: Server;
  readonly origin: string;
}

function startServer(
  settings: Required<ServerOptions>,
  files: ReadonlyMap<string, string>
): Effect.Effect<RunningServer, ResourceProviderError> {
  const app = express();
  app.disable("x-powered-by");
  app.use(cors({ exposedHeaders: EXPOSED_HEADERS }));

  app.get(`/${settings.routePrefix}/:token/:name`, (req, res) => {
    const token = req.params.token;
    const filePath = token === undefined ? undefined : files.get(token);
    if (filePath === undefined) {
      res.sendStatus(404);
      return;
    }
    res.sendFile(filePath, { dotfiles: "allow" }, (error) => {
      if (!error) return;
      console.error(`Failed to serve ${filePath}`, error);
      if (!res.headersSent) {
        res.sendStatus(500);
      }
    });
  });

  return Effect.async<RunningServer, ResourceProviderError>((resume) => {
    const server = app.listen(settings.port, settings.host);

    const onStartupError = (error: Error) => {
      resume(
        Effect.fail(
          new ResourceProviderError(
            `Could not start file server on ${settings.host}:${settings.port}: ${error.message}`,
            undefined,
            error
          )
        )
      );
    };

    server.once("error", onStartupError);
    server.once("listening", () => {
      server.off("error", onStartupError);
      logServerErrors(server);

      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : settings.port;
      const host = settings.host.includes(":") ? `[${settings.host}]` : settings.host;
      resume(Effect.succeed({ server, origin: `http://${host}:${port}` }));
    });
  });
}

/**
 * Log errors a running server emits instead of letting them crash the process
 */
export function logServerErrors(server: Server): void {
  server.on("error", (error) => {
    console.error("File server error", error);
  });
}

function stopServer(running: RunningServer): Effect.Effect<void> {
  return Effect.async<void>((resume) => {
    running.server.closeAllConnections();
    running.server.close(() => resume(Effect.void));
  });
}

function createProvider(
  origin: string,
  routePrefix: string,
  files: Map<string, string>
): ResourceProviderShape {
  const tokensByPath = new Map<string, string>();

  return {
    create: (absolutePath) =>
      Effect.try({
        try: () => {
          // throws URIError for paths holding lone surrogates
          const name = encodeURIComponent(basename(absolutePath));
          let token = tokensByPath.get(absolutePath);
          if (token === undefined) {
            token = randomUUID();
            tokensByPath.set(absolutePath, token);
            files.set(token, absolutePath);
          }
          return { url: `${origin}/${routePrefix}/${token}/${name}`, path: absolutePath };
        },
        catch: (error) => ResourceProviderError.fromSystemError(absolutePath, error),
      }),
  };
}

/**
 * Resource provider backed by a local express server
 *
 * @example
 * ```typescript
 * const served = await servable(config, Layer.merge(
 *   ResourceRegistry.layer,
 *   LocalFileServer.layer({ port: 8089 })
 * ));
 * ```
 */
export const LocalFileServer = {
  layer(
    options: ServerOptions = {}
  ): Layer.Layer<ResourceProvider, ResourceProviderError | ConfigurationError> {
    return Layer.scoped(
      ResourceProvider,
      Effect.gen(function* () {
        const settings = yield* Effect.try({
          try: () => resolveServerOptions(options),
          catch: (error) =>
            error instanceof ConfigurationError
              ? error
              : new ConfigurationError(String(error), "ServerOptions"),
        });
        const files = new Map<string, string>();
        const running = yield* Effect.acquireRelease(startServer(settings, files), stopServer);
        return createProvider(running.origin, settings.routePrefix, files);
      })
    );
  },
} as const;
