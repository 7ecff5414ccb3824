/**
 * Track variants: schemas, types, format table and type resolution
 */

export {
  guessFormat,
  isAssociatedFormat,
  isTrackType,
  TRACK_FORMATS,
  TRACK_TYPES,
  type TrackType,
  type UrlTrackType,
} from "./formats";
export { resolveTrackType } from "./resolver";
export {
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
export type {
  AlignmentFiltering,
  AlignmentSorting,
  AlignmentTrack,
  AnnotationTrack,
  ArcTrack,
  CnvPytorTrack,
  Configuration,
  Frozen,
  GuideLine,
  GwasColumns,
  GwasTrack,
  InteractTrack,
  MergedTrack,
  MutationTrack,
  QtlTrack,
  SegmentedCopyNumberSorting,
  SegmentedCopyNumberTrack,
  SpliceJunctionTrack,
  Track,
  UrlTrack,
  VariantTrack,
  WigTrack,
} from "./types";
