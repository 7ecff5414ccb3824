/**
 * File formats associated with each track variant, and format guessing
 *
 * The associated-format table is the only place format sets are declared.
 * The resolver walks it in declaration order, so the key order below is
 * significant: formats such as `bed` and `vcf` belong to several variants and
 * the first variant listing them wins.
 *
 * @module tracks/formats
 */

/**
 * Associated file formats per variant, in resolution order
 */
export const TRACK_FORMATS = {
  annotation: ["bed", "gff", "gff3", "gtf", "bedpe"],
  wig: ["bigWig", "bw", "bg", "bedGraph"],
  alignment: ["bam", "cram"],
  variant: ["vcf"],
  mut: ["mut", "maf"],
  seg: ["seg"],
  gwas: ["bed", "gwas"],
  interact: ["bedpe", "interact", "bigInteract"],
  qtl: ["qtl"],
  junction: ["bed"],
  cnvpytor: ["pytor", "vcf"],
  arc: ["bp", "bed"],
  merged: [],
} as const satisfies Record<string, readonly string[]>;

/**
 * Track variant tag
 */
export type TrackType = keyof typeof TRACK_FORMATS;

/**
 * Variant tags that carry a `url`
 */
export type UrlTrackType = Exclude<TrackType, "merged">;

export function isTrackType(value: string): value is TrackType {
  return Object.hasOwn(TRACK_FORMATS, value);
}

/** Variant tags in resolution order */
export const TRACK_TYPES: readonly TrackType[] = Object.keys(TRACK_FORMATS).filter(isTrackType);

/**
 * Whether `format` is one of the variant's associated formats
 *
 * Comparison ignores case, since guessed formats are lower-cased while the
 * table keeps the conventional spelling (`bigWig`, `bedGraph`).
 */
export function isAssociatedFormat(trackType: TrackType, format: string): boolean {
  const needle = format.toLowerCase();
  const formats: readonly string[] = TRACK_FORMATS[trackType];
  return formats.some((candidate) => candidate.toLowerCase() === needle);
}

/**
 * Guess a file format from a file name or URL
 *
 * Takes the last dot-separated segment, lower-cased. A trailing `gz` is
 * skipped in favour of the segment before it.
 *
 * @example
 * ```typescript
 * guessFormat("a.b.GFF3.gz"); // "gff3"
 * guessFormat("reads.cram");  // "cram"
 * guessFormat(undefined);     // undefined
 * ```
 */
export function guessFormat(filename: string | undefined): string | undefined {
  if (filename === undefined) return undefined;

  const parts = filename.split(".");
  let format = parts[parts.length - 1]?.toLowerCase();
  if (format === "gz" && parts.length > 1) {
    format = parts[parts.length - 2]?.toLowerCase();
  }
  return format;
}
