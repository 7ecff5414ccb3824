/**
 * Rewriting local track locations into servable URLs
 *
 * @module config/servable
 */

import { Effect, type Layer } from "effect";
import type { FileNotFoundError, ResourceProviderError } from "../errors";
import { runWithLayer } from "../io/runtime";
import { resolveFileOrUrl } from "../resources/resolver";
import type { ResourceProvider, ResourceRegistry } from "../resources/service";
import type { Configuration, Track, UrlTrack } from "../tracks/types";
import { deepFreeze } from "./wire";

type ServableError = FileNotFoundError | ResourceProviderError;
type ServableContext = ResourceProvider | ResourceRegistry;

function servableUrlTrack<T extends UrlTrack>(
  track: T
): Effect.Effect<T, ServableError, ServableContext> {
  return Effect.gen(function* () {
    const url = yield* resolveFileOrUrl(track.url);
    if (typeof track.indexURL !== "string") {
      return { ...track, url };
    }
    const indexURL = yield* resolveFileOrUrl(track.indexURL);
    return { ...track, url, indexURL };
  });
}

function servableTrack(track: Track): Effect.Effect<Track, ServableError, ServableContext> {
  if (track.type === "merged") {
    const children = Effect.forEach(track.tracks, (child) => servableUrlTrack(child));
    return Effect.map(children, (tracks) => ({ ...track, tracks }));
  }
  return servableUrlTrack(track);
}

/**
 * Copy of `config` whose local `url` and `indexURL` values, including those
 * of merged children, are replaced by provider-issued URLs
 *
 * Remote values and all other fields are kept as they are. Since issued URLs
 * are remote, running the result through again changes nothing.
 */
export function servableEffect(
  config: Configuration
): Effect.Effect<Configuration, ServableError, ServableContext> {
  return Effect.gen(function* () {
    if (config.tracks === undefined) {
      return deepFreeze({ ...config });
    }
    const tracks = yield* Effect.forEach(config.tracks, servableTrack);
    return deepFreeze({ ...config, tracks });
  });
}

/**
 * Promise form of {@link servableEffect}
 *
 * @param layer - Provides the resource provider and registry; scoped
 * resources such as a file server are released when the call settles, so
 * pass a session's runtime instead when the URLs must stay reachable
 * @throws {FileNotFoundError} If a local path is not an existing regular file
 * @throws {ResourceProviderError} If the provider fails
 */
export function servable<LE>(
  config: Configuration,
  layer: Layer.Layer<ServableContext, LE>
): Promise<Configuration> {
  return runWithLayer(servableEffect(config), layer);
}
