/**
 * Track type definitions
 *
 * Variant types are inferred from their schemas and tagged with the resolved
 * `type`. All values are deeply readonly: a track is built once and replaced,
 * never edited.
 *
 * @module tracks/types
 */

import type {
  AlignmentFilteringSchema,
  AlignmentSortingSchema,
  AlignmentTrackSchema,
  AnnotationTrackSchema,
  ArcTrackSchema,
  CnvPytorTrackSchema,
  ConfigurationFieldsSchema,
  GuideLineSchema,
  GwasColumnsSchema,
  GwasTrackSchema,
  InteractTrackSchema,
  MergedTrackFieldsSchema,
  MutationTrackSchema,
  QtlTrackSchema,
  SegmentedCopyNumberSortingSchema,
  SegmentedCopyNumberTrackSchema,
  SpliceJunctionTrackSchema,
  VariantTrackSchema,
  WigTrackSchema,
} from "./schemas";

/**
 * Recursively readonly view of a plain data type
 */
export type Frozen<T> = T extends readonly (infer U)[]
  ? readonly Frozen<U>[]
  : T extends object
    ? { readonly [K in keyof T]: Frozen<T[K]> }
    : T;

type Tagged<Tag extends string, Fields> = Frozen<{ type: Tag } & Fields>;

export type GuideLine = Frozen<typeof GuideLineSchema.infer>;
export type AlignmentSorting = Frozen<typeof AlignmentSortingSchema.infer>;
export type AlignmentFiltering = Frozen<typeof AlignmentFilteringSchema.infer>;
export type SegmentedCopyNumberSorting = Frozen<typeof SegmentedCopyNumberSortingSchema.infer>;
export type GwasColumns = Frozen<typeof GwasColumnsSchema.infer>;

export type AnnotationTrack = Tagged<"annotation", typeof AnnotationTrackSchema.infer>;
export type WigTrack = Tagged<"wig", typeof WigTrackSchema.infer>;
export type AlignmentTrack = Tagged<"alignment", typeof AlignmentTrackSchema.infer>;
export type VariantTrack = Tagged<"variant", typeof VariantTrackSchema.infer>;
export type MutationTrack = Tagged<"mut", typeof MutationTrackSchema.infer>;
export type SegmentedCopyNumberTrack = Tagged<"seg", typeof SegmentedCopyNumberTrackSchema.infer>;
export type GwasTrack = Tagged<"gwas", typeof GwasTrackSchema.infer>;
export type InteractTrack = Tagged<"interact", typeof InteractTrackSchema.infer>;
export type QtlTrack = Tagged<"qtl", typeof QtlTrackSchema.infer>;
export type SpliceJunctionTrack = Tagged<"junction", typeof SpliceJunctionTrackSchema.infer>;
export type CnvPytorTrack = Tagged<"cnvpytor", typeof CnvPytorTrackSchema.infer>;
export type ArcTrack = Tagged<"arc", typeof ArcTrackSchema.infer>;

/**
 * Overlay of wig tracks drawn in one viewport
 */
export type MergedTrack = Tagged<
  "merged",
  typeof MergedTrackFieldsSchema.infer & { tracks: WigTrack[] }
>;

/**
 * Any track that points at a single data resource
 */
export type UrlTrack =
  | AnnotationTrack
  | WigTrack
  | AlignmentTrack
  | VariantTrack
  | MutationTrack
  | SegmentedCopyNumberTrack
  | GwasTrack
  | InteractTrack
  | QtlTrack
  | SpliceJunctionTrack
  | CnvPytorTrack
  | ArcTrack;

/**
 * Closed set of track variants, discriminated by `type`
 */
export type Track = UrlTrack | MergedTrack;

/**
 * Browser configuration handed to the renderer
 *
 * Keys that were not supplied stay absent; `tracks` order is render order
 * unless a track sets `order`.
 */
export type Configuration = Frozen<
  Omit<typeof ConfigurationFieldsSchema.infer, "tracks"> & { tracks?: Track[] }
>;
