/**
 * Configuration builder
 *
 * Turns untyped configuration data (parsed JSON, hand-written objects) into a
 * frozen {@link Configuration}. Each track goes through two phases: its
 * variant is resolved from the `type` hint and the declared or guessed format,
 * then the remaining keys are decoded strictly against that variant's schema.
 * The first invalid track aborts the whole build.
 *
 * @example
 * ```typescript
 * const config = buildConfiguration({
 *   genome: "hg38",
 *   tracks: [{ name: "reads", url: "https://example.org/a.cram", format: "cram" }],
 * });
 * config.tracks?.[0]?.type; // "alignment"
 * ```
 *
 * @module config/builder
 */

import { type } from "arktype";
import type { ArkErrors } from "arktype";
import { ConfigurationError, SchemaViolationError } from "../errors";
import { guessFormat, isAssociatedFormat, type TrackType } from "../tracks/formats";
import { resolveTrackType } from "../tracks/resolver";
import {
  AlignmentTrackSchema,
  AnnotationTrackSchema,
  ArcTrackSchema,
  CnvPytorTrackSchema,
  ConfigurationFieldsSchema,
  GwasTrackSchema,
  InteractTrackSchema,
  MergedTrackFieldsSchema,
  MutationTrackSchema,
  QtlTrackSchema,
  SegmentedCopyNumberTrackSchema,
  SpliceJunctionTrackSchema,
  VariantTrackSchema,
  WigTrackSchema,
} from "../tracks/schemas";
import type { Configuration, MergedTrack, Track, WigTrack } from "../tracks/types";
import { cloneInput, deepFreeze, isRecord, toJsonObject, type JsonObject } from "./wire";

/**
 * Builder options
 */
export interface BuildOptions {
  /**
   * Report an explicit `format` that is not associated with the resolved
   * variant (default: true)
   */
  checkFormats?: boolean;
  /** Receives non-fatal diagnostics (default: console.warn) */
  onWarning?: (message: string) => void;
}

export const DEFAULT_BUILD_OPTIONS: Required<BuildOptions> = {
  checkFormats: true,
  onWarning: (message) => console.warn(message),
};

const BuildOptionsSchema = type({
  "checkFormats?": "boolean",
  "onWarning?": "unknown",
});

function resolveBuildOptions(options: BuildOptions = {}): Required<BuildOptions> {
  const validated = BuildOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ConfigurationError(`Invalid build options: ${validated.summary}`, "BuildOptions");
  }
  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    throw new ConfigurationError("onWarning must be a function", "onWarning");
  }
  return {
    checkFormats: options.checkFormats ?? DEFAULT_BUILD_OPTIONS.checkFormats,
    onWarning: options.onWarning ?? DEFAULT_BUILD_OPTIONS.onWarning,
  };
}

// =============================================================================
// TRACKS
// =============================================================================

function check<T>(result: T | ArkErrors, path: string, trackType: TrackType): T {
  if (result instanceof type.errors) {
    throw new SchemaViolationError(result.summary, path, trackType);
  }
  return result;
}

function decodeTrack(
  trackType: TrackType,
  fields: Record<string, unknown>,
  path: string,
  options: Required<BuildOptions>
): Track {
  switch (trackType) {
    case "annotation":
      return { type: "annotation", ...check(AnnotationTrackSchema(fields), path, trackType) };
    case "wig":
      return { type: "wig", ...check(WigTrackSchema(fields), path, trackType) };
    case "alignment":
      return { type: "alignment", ...check(AlignmentTrackSchema(fields), path, trackType) };
    case "variant":
      return { type: "variant", ...check(VariantTrackSchema(fields), path, trackType) };
    case "mut":
      return { type: "mut", ...check(MutationTrackSchema(fields), path, trackType) };
    case "seg":
      return { type: "seg", ...check(SegmentedCopyNumberTrackSchema(fields), path, trackType) };
    case "gwas":
      return { type: "gwas", ...check(GwasTrackSchema(fields), path, trackType) };
    case "interact":
      return { type: "interact", ...check(InteractTrackSchema(fields), path, trackType) };
    case "qtl":
      return { type: "qtl", ...check(QtlTrackSchema(fields), path, trackType) };
    case "junction":
      return { type: "junction", ...check(SpliceJunctionTrackSchema(fields), path, trackType) };
    case "cnvpytor":
      return { type: "cnvpytor", ...check(CnvPytorTrackSchema(fields), path, trackType) };
    case "arc":
      return { type: "arc", ...check(ArcTrackSchema(fields), path, trackType) };
    case "merged":
      return decodeMerged(fields, path, options);
  }
}

function decodeMerged(
  fields: Record<string, unknown>,
  path: string,
  options: Required<BuildOptions>
): MergedTrack {
  const { tracks, ...own } = fields;
  if (!Array.isArray(tracks)) {
    throw new SchemaViolationError("tracks must be an array of wig tracks", path, "merged");
  }
  const merged = check(MergedTrackFieldsSchema(own), path, "merged");

  const children = tracks.map((child: unknown, index): WigTrack => {
    const childPath = `${path}.tracks[${index}]`;
    const built = buildTrackAt(child, childPath, options);
    if (built.type !== "wig") {
      throw new SchemaViolationError(
        `merged tracks may only contain wig tracks, got ${built.type}`,
        childPath,
        built.type
      );
    }
    return built;
  });

  return { type: "merged", ...merged, tracks: children };
}

function buildTrackAt(raw: unknown, path: string, options: Required<BuildOptions>): Track {
  if (!isRecord(raw)) {
    throw new SchemaViolationError("track must be an object", path);
  }

  const { type: declared, ...fields } = raw;
  if (declared !== undefined && declared !== null && typeof declared !== "string") {
    throw new SchemaViolationError("type must be a string", path);
  }
  const declaredType = typeof declared === "string" ? declared : undefined;
  const declaredFormat =
    typeof fields.format === "string" && fields.format !== "" ? fields.format : undefined;
  const url = typeof fields.url === "string" ? fields.url : undefined;

  const trackType = resolveTrackType(declaredType, declaredFormat ?? guessFormat(url));

  if (
    options.checkFormats &&
    declaredFormat !== undefined &&
    trackType !== "merged" &&
    !isAssociatedFormat(trackType, declaredFormat)
  ) {
    options.onWarning(
      `${path}: format "${declaredFormat}" is not associated with ${trackType} tracks`
    );
  }

  return decodeTrack(trackType, fields, path, options);
}

/**
 * Build a single track
 *
 * @param raw - Track data with an optional `type` hint
 * @throws {UnknownTrackTypeError} If no variant matches the hint or format
 * @throws {SchemaViolationError} If the data does not fit the resolved variant
 */
export function buildTrack(raw: unknown, options?: BuildOptions): Track {
  const resolved = resolveBuildOptions(options);
  return deepFreeze(buildTrackAt(cloneInput(raw, "track"), "track", resolved));
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Build a configuration from untyped data
 *
 * The input is copied first; the caller's object is never modified or frozen.
 *
 * @throws {UnknownTrackTypeError} If a track's variant cannot be resolved
 * @throws {SchemaViolationError} If the configuration or a track is invalid
 */
export function buildConfiguration(raw: unknown, options?: BuildOptions): Configuration {
  const resolved = resolveBuildOptions(options);
  const input = cloneInput(raw, "configuration");

  const fields = ConfigurationFieldsSchema(input);
  if (fields instanceof type.errors) {
    throw new SchemaViolationError(fields.summary, "configuration");
  }

  const { tracks, ...rest } = fields;
  if (tracks === undefined) {
    return deepFreeze(rest);
  }

  return deepFreeze({
    ...rest,
    tracks: tracks.map((track, index) => buildTrackAt(track, `tracks[${index}]`, resolved)),
  });
}

const parseJson = type("string.json.parse");

/**
 * Parse a JSON-encoded configuration
 *
 * @throws {SchemaViolationError} If the text is not valid JSON
 */
export function parseConfiguration(json: string, options?: BuildOptions): Configuration {
  const parsed = parseJson(json);
  if (parsed instanceof type.errors) {
    throw new SchemaViolationError(parsed.summary, "configuration");
  }
  return buildConfiguration(parsed, options);
}

// =============================================================================
// SERIALIZATION
// =============================================================================

/**
 * Wire form of a configuration: JSON data with unset keys left out and each
 * track's `type` included for the renderer
 */
export function serializeConfiguration(config: Configuration): JsonObject {
  return toJsonObject(config, "configuration");
}

export function stringifyConfiguration(
  config: Configuration,
  { pretty = false }: { pretty?: boolean } = {}
): string {
  return JSON.stringify(serializeConfiguration(config), null, pretty ? 2 : undefined);
}
