/**
 * Effect services for turning local files into servable URLs
 *
 * Two services cooperate during `servable`:
 *
 * - {@link ResourceProvider} issues a URL for an absolute file path. It is an
 *   external capability; {@link LocalFileServer} is the bundled one.
 * - {@link ResourceRegistry} remembers every issued resource for the lifetime
 *   of a session so callers can inspect or release them.
 *
 * Both are resolved from the Effect context, so each session (or test) gets
 * its own registry and can swap providers without module-level state.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const provider = yield* ResourceProvider;
 *   return yield* provider.create("/data/reads.bam");
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(LocalFileServer.layer()))
 * );
 * ```
 *
 * @module resources/service
 */

import { Context, Effect, Layer } from "effect";
import type { ResourceProviderError } from "../errors";

/**
 * Handle for a file exposed by a resource provider
 */
export interface Resource {
  /** URL the renderer fetches */
  readonly url: string;
  /** Absolute path of the served file */
  readonly path: string;
}

// =============================================================================
// RESOURCE PROVIDER
// =============================================================================

export interface ResourceProviderShape {
  /**
   * Issue a servable URL for an existing regular file
   *
   * @param absolutePath - Resolved path of the file
   */
  readonly create: (absolutePath: string) => Effect.Effect<Resource, ResourceProviderError>;
}

export class ResourceProvider extends Context.Tag("@tracksmith/ResourceProvider")<
  ResourceProvider,
  ResourceProviderShape
>() {}

// =============================================================================
// RESOURCE REGISTRY
// =============================================================================

export interface ResourceRegistryShape {
  /** Record an issued resource */
  readonly register: (resource: Resource) => Effect.Effect<void>;
  /** Resources issued so far, in issue order */
  readonly list: Effect.Effect<ReadonlyArray<Resource>>;
}

export class ResourceRegistry extends Context.Tag("@tracksmith/ResourceRegistry")<
  ResourceRegistry,
  ResourceRegistryShape
>() {
  /**
   * Fresh, empty registry for each build of the layer
   */
  static readonly layer: Layer.Layer<ResourceRegistry> = Layer.sync(ResourceRegistry, () =>
    createRegistry()
  );
}

/**
 * In-memory registry keyed by URL
 *
 * Registering a URL twice keeps the first handle.
 */
export function createRegistry(): ResourceRegistryShape {
  const resources = new Map<string, Resource>();

  return {
    register: (resource) =>
      Effect.sync(() => {
        if (!resources.has(resource.url)) {
          resources.set(resource.url, resource);
        }
      }),
    list: Effect.sync(() => Array.from(resources.values())),
  };
}
