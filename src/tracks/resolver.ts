/**
 * Track type resolution
 *
 * Maps an explicit `type` hint and a declared or guessed file format to exactly
 * one track variant. Rules are evaluated first-match in {@link TRACK_TYPES}
 * order; a rule matches when the hint names the variant or the format is one
 * of the variant's associated formats. Overlapping formats therefore resolve
 * to the earliest variant: `bed` is always `annotation`, `vcf` is `variant`.
 *
 * @module tracks/resolver
 */

import { UnknownTrackTypeError } from "../errors";
import { isAssociatedFormat, TRACK_TYPES, type TrackType } from "./formats";

/**
 * Resolve the variant for a track
 *
 * @param declaredType - Value of the track's `type` key, if any
 * @param format - Declared `format`, or the one guessed from the URL
 * @throws {UnknownTrackTypeError} When no rule matches
 *
 * @example
 * ```typescript
 * resolveTrackType(undefined, "bed");   // "annotation"
 * resolveTrackType("gwas", "gwas");     // "gwas"
 * resolveTrackType("merged", undefined) // "merged"
 * ```
 */
export function resolveTrackType(
  declaredType: string | undefined,
  format: string | undefined
): TrackType {
  for (const trackType of TRACK_TYPES) {
    if (declaredType === trackType) return trackType;
    if (format !== undefined && isAssociatedFormat(trackType, format)) return trackType;
  }
  throw new UnknownTrackTypeError(declaredType, format);
}
