/**
 * Scripting session: defaults for new browsers and the resources they serve
 *
 * @example
 * ```typescript
 * const session = new Session({ genome: "hg38" });
 * session.setLocus("chr8:127,736,588-127,739,371");
 *
 * const config = session.browse(
 *   ["data/HG00103.cram", "data/HG00103.cram.crai"],
 *   "https://example.org/genes.gff3.gz"
 * );
 * const served = await session.servable(config);
 * // hand `stringifyConfiguration(served)` to the renderer
 * await session.dispose();
 * ```
 *
 * @module session
 */

import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { Effect, Layer, ManagedRuntime } from "effect";
import {
  type BuildOptions,
  buildTrack,
  parseConfiguration,
} from "./config/builder";
import { servableEffect } from "./config/servable";
import { deepFreeze } from "./config/wire";
import { ConfigurationError, FileNotFoundError, type TracksmithError } from "./errors";
import { runOnRuntime } from "./io/runtime";
import { LocalFileServer, loadServerOptionsFromEnv } from "./resources/local-server";
import { isHref } from "./resources/resolver";
import {
  type Resource,
  type ResourceProvider,
  ResourceRegistry,
} from "./resources/service";
import type { Configuration, Track } from "./tracks/types";

/**
 * A path or URL, a `[url, indexURL]` pair, or an already built track
 */
export type TrackArgument = string | readonly [string, string] | Track;

export type Locus = string | readonly string[];

export interface SessionOptions {
  /** Reference genome for browsers created by this session */
  genome?: string;
  /** Initial locus for browsers created by this session */
  locus?: Locus;
  /**
   * Resource provider (default: a {@link LocalFileServer} configured from
   * the environment)
   */
  provider?: Layer.Layer<ResourceProvider, TracksmithError>;
  /** Options for every track and configuration this session builds */
  build?: BuildOptions;
}

function isLocationPair(value: TrackArgument): value is readonly [string, string] {
  return Array.isArray(value);
}

function copyLocus(locus: Locus | undefined): Locus | undefined {
  return locus === undefined || typeof locus === "string" ? locus : [...locus];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class Session {
  private genome: string | undefined;
  private locus: Locus | undefined;
  private readonly buildOptions: BuildOptions;
  private readonly runtime: ManagedRuntime.ManagedRuntime<
    ResourceProvider | ResourceRegistry,
    TracksmithError
  >;

  /** Configuration most recently created or loaded */
  current: Configuration | undefined;

  constructor(options: SessionOptions = {}) {
    this.genome = options.genome;
    this.locus = copyLocus(options.locus);
    this.buildOptions = options.build ?? {};
    const provider = options.provider ?? LocalFileServer.layer(loadServerOptionsFromEnv());
    this.runtime = ManagedRuntime.make(Layer.merge(ResourceRegistry.layer, provider));
  }

  /** Set the reference genome for subsequent browsers */
  setGenome(genome: string): void {
    this.genome = genome;
  }

  /** Set the initial locus for subsequent browsers */
  setLocus(locus: Locus): void {
    this.locus = copyLocus(locus);
  }

  /**
   * Build a track from a location and optional extra fields
   *
   * The display name defaults to the URL for remote locations and to the
   * file name for local ones. Without a location the fields must describe
   * the track on their own, as a merged track does.
   *
   * @throws {ConfigurationError} If fields are given with an already built track
   */
  track(location?: TrackArgument, fields: Readonly<Record<string, unknown>> = {}): Track {
    const data: Record<string, unknown> = { ...fields };
    if (typeof location === "string") {
      data.url = location;
    } else if (location !== undefined) {
      if (!isLocationPair(location)) {
        if (Object.keys(fields).length > 0) {
          throw new ConfigurationError(
            "fields cannot be applied to an already built track",
            "fields"
          );
        }
        return location;
      }
      data.url = location[0];
      data.indexURL = location[1];
    }

    const url = data.url;
    if (data.name === undefined && typeof url === "string") {
      data.name = isHref(url) ? url : basename(url);
    }

    return buildTrack(data, this.buildOptions);
  }

  /**
   * Create a configuration with this session's genome and locus
   */
  browse(...tracks: TrackArgument[]): Configuration {
    const config: Configuration = deepFreeze({
      ...(this.genome !== undefined ? { genome: this.genome } : {}),
      ...(this.locus !== undefined ? { locus: this.locus } : {}),
      tracks: tracks.map((track) => this.track(track)),
    });
    this.current = config;
    return config;
  }

  /**
   * Load a JSON-encoded configuration
   */
  loads(json: string): Configuration {
    this.current = parseConfiguration(json, this.buildOptions);
    return this.current;
  }

  /**
   * Load a configuration from a JSON file
   *
   * @throws {FileNotFoundError} If the file does not exist
   */
  async load(path: string): Promise<Configuration> {
    let json: string;
    try {
      json = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw FileNotFoundError.fromSystemError(resolve(path), error);
      }
      throw error;
    }
    return this.loads(json);
  }

  /**
   * Rewrite local track locations to URLs served for the session's lifetime
   */
  servable(config: Configuration): Promise<Configuration> {
    return runOnRuntime(this.runtime, servableEffect(config));
  }

  /**
   * Resources issued so far
   */
  resources(): Promise<ReadonlyArray<Resource>> {
    return runOnRuntime(
      this.runtime,
      Effect.gen(function* () {
        const registry = yield* ResourceRegistry;
        return yield* registry.list;
      })
    );
  }

  /**
   * Release the provider (stopping the file server) and the registry
   */
  dispose(): Promise<void> {
    return this.runtime.dispose();
  }
}
