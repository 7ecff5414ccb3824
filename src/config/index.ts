/**
 * Building, serializing and serving configurations
 */

export {
  type BuildOptions,
  buildConfiguration,
  buildTrack,
  DEFAULT_BUILD_OPTIONS,
  parseConfiguration,
  serializeConfiguration,
  stringifyConfiguration,
} from "./builder";
export { servable, servableEffect } from "./servable";
export type { JsonObject, JsonValue } from "./wire";
