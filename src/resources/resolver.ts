/**
 * Resolution of track locations into servable URLs
 *
 * @module resources/resolver
 */

import { statSync } from "node:fs";
import { resolve } from "node:path";
import { Effect } from "effect";
import { FileNotFoundError, type ResourceProviderError } from "../errors";
import { ResourceProvider, ResourceRegistry } from "./service";

/**
 * Whether a location is already a remote reference
 *
 * This is a plain prefix test on "http" (which also covers "https"), so a
 * relative path such as `httpdocs/a.bam` counts as remote.
 */
export function isHref(value: string): boolean {
  return value.startsWith("http");
}

/**
 * Resolve a file path or URL to a URL the renderer can fetch
 *
 * Remote references are returned unchanged. Local paths are made absolute,
 * checked to be regular files, handed to the {@link ResourceProvider}, and
 * the issued resource is recorded in the {@link ResourceRegistry}.
 *
 * @param value - Track `url` or `indexURL`
 */
export function resolveFileOrUrl(
  value: string
): Effect.Effect<string, FileNotFoundError | ResourceProviderError, ResourceProvider | ResourceRegistry> {
  return Effect.gen(function* () {
    if (isHref(value)) {
      return value;
    }

    const absolutePath = resolve(value);
    const isFile = yield* Effect.try({
      try: () => statSync(absolutePath, { throwIfNoEntry: false })?.isFile() ?? false,
      catch: (error) => FileNotFoundError.fromSystemError(absolutePath, error),
    });
    if (!isFile) {
      return yield* Effect.fail(new FileNotFoundError(absolutePath));
    }

    const provider = yield* ResourceProvider;
    const resource = yield* provider.create(absolutePath);

    const registry = yield* ResourceRegistry;
    yield* registry.register(resource);

    return resource.url;
  });
}
