/**
 * ArkType schemas for track variants and their nested value objects
 *
 * Every object schema rejects undeclared keys. Optional fields accept `null`
 * as an explicit value; an absent key means the field is unset. Keys are the
 * wire names consumed by the renderer.
 *
 * @module tracks/schemas
 */

import { type } from "arktype";

// =============================================================================
// SHARED FIELD TYPES
// =============================================================================

const Text = type("string | null");
const Flag = type("boolean | null");
const Finite = type("number").narrow((n) => Number.isFinite(n));
const Num = Finite.or("null");
const Pixels = type("number.integer >= 0").or("null");
const Count = type("number.integer >= 0").or("null");
const Opacity = type("0 <= number <= 1").or("null");
const TextList = type("string[] | null");
const StringMap = type({ "[string]": "string" }).or("null");
const DisplayMode = type("'COLLAPSED' | 'EXPANDED' | 'SQUISHED' | null");
const Direction = type("'ASC' | 'DESC' | null");
const ArcType = type("'nested' | 'proportional' | 'inView' | 'partialInView' | null");
const ArcOrientation = type("'UP' | 'DOWN' | null");

// =============================================================================
// NESTED VALUE OBJECTS
// =============================================================================

/**
 * Horizontal reference line drawn across a wig track
 */
export const GuideLineSchema = type({
  color: "string",
  "dotted?": Flag,
  y: Finite,
}).onUndeclaredKey("reject");

/**
 * Initial alignment sort at a genomic position
 */
export const AlignmentSortingSchema = type({
  chr: "string",
  position: "number.integer >= 0",
  option: "'BASE' | 'STRAND' | 'INSERT_SIZE' | 'MATE_CHR' | 'MQ' | 'TAG'",
  "tag?": Text,
  "direction?": Direction,
}).onUndeclaredKey("reject");

/**
 * Read filters applied before alignments are drawn
 */
export const AlignmentFilteringSchema = type({
  "vendorFailed?": Flag,
  "duplicates?": Flag,
  "secondary?": Flag,
  "supplementary?": Flag,
  "mq?": Count,
  "readgroups?": TextList,
}).onUndeclaredKey("reject");

/**
 * Initial sample sort for segmented copy number tracks
 */
export const SegmentedCopyNumberSortingSchema = type({
  chr: "string",
  start: "number.integer >= 0",
  end: "number.integer >= 0",
  "direction?": Direction,
}).onUndeclaredKey("reject");

/**
 * 1-based column indices of a GWAS file
 */
export const GwasColumnsSchema = type({
  chromosome: "number.integer >= 1",
  position: "number.integer >= 1",
  value: "number.integer >= 1",
}).onUndeclaredKey("reject");

// =============================================================================
// BASE FIELDS
// =============================================================================

const DISPLAY_FIELDS = {
  name: "string",
  "order?": Num,
  "color?": Text,
  "height?": Pixels,
  "minHeight?": Pixels,
  "maxHeight?": Pixels,
  "removable?": Flag,
  "id?": Text,
} as const;

const URL_FIELDS = {
  ...DISPLAY_FIELDS,
  url: "string",
  "indexURL?": Text,
  "sourceType?": type("'file' | 'htsget' | 'custom' | null"),
  "format?": Text,
  "indexed?": Flag,
  "autoHeight?": Flag,
  "visibilityWindow?": Num,
  "headers?": StringMap,
  "oauthToken?": Text,
} as const;

// =============================================================================
// VARIANTS
// =============================================================================

/**
 * Non-quantitative features such as genes (bed, gff, gtf)
 */
export const AnnotationTrackSchema = type({
  ...URL_FIELDS,
  "displayMode?": DisplayMode,
  "expandedRowHeight?": Pixels,
  "squishedRowHeight?": Pixels,
  "nameField?": Text,
  "maxRows?": Count,
  "searchable?": Flag,
  "searchableFields?": TextList,
  "filterTypes?": TextList,
  "altColor?": Text,
  "colorBy?": Text,
  "colorTable?": StringMap,
}).onUndeclaredKey("reject");

/**
 * Quantitative signal such as coverage (bigWig, bedGraph)
 */
export const WigTrackSchema = type({
  ...URL_FIELDS,
  "autoscale?": Flag,
  "autoscaleGroup?": Text,
  "min?": Num,
  "max?": Num,
  "altColor?": Text,
  "guideLines?": GuideLineSchema.array().or("null"),
  "graphType?": type("'bar' | 'points' | 'line' | null"),
  "flipAxis?": Flag,
  "logScale?": Flag,
  "windowFunction?": type("'mean' | 'min' | 'max' | 'none' | null"),
}).onUndeclaredKey("reject");

/**
 * Read alignments (bam, cram)
 */
export const AlignmentTrackSchema = type({
  ...URL_FIELDS,
  "displayMode?": type("'EXPANDED' | 'SQUISHED' | 'FULL' | null"),
  "showCoverage?": Flag,
  "showAlignments?": Flag,
  "viewAsPairs?": Flag,
  "pairsSupported?": Flag,
  "coverageColor?": Text,
  "deletionColor?": Text,
  "skippedColor?": Text,
  "insertionColor?": Text,
  "negStrandColor?": Text,
  "posStrandColor?": Text,
  "pairConnectorColor?": Text,
  "colorBy?": type(
    "'none' | 'strand' | 'firstOfPairStrand' | 'pairOrientation' | 'tlen' | 'unexpectedPair' | 'tag' | null"
  ),
  "colorByTag?": Text,
  "bamColorTag?": Text,
  "samplingWindowSize?": Count,
  "samplingDepth?": Count,
  "alignmentRowHeight?": Pixels,
  "readgroup?": Text,
  "sort?": AlignmentSortingSchema.or("null"),
  "filter?": AlignmentFilteringSchema.or("null"),
  "showSoftClips?": Flag,
  "showMismatches?": Flag,
  "showInsertionText?": Flag,
  "insertionTextColor?": Text,
  "showDeletionText?": Flag,
  "deletionTextColor?": Text,
  "pairOrientation?": type("'ff' | 'fr' | 'rf' | null"),
  "minTlen?": Count,
  "maxTlen?": Count,
  "minTlenPercentile?": type("0 <= number <= 100").or("null"),
  "maxTlenPercentile?": type("0 <= number <= 100").or("null"),
}).onUndeclaredKey("reject");

/**
 * Variant calls (vcf)
 */
export const VariantTrackSchema = type({
  ...URL_FIELDS,
  "displayMode?": DisplayMode,
  "squishedCallHeight?": Pixels,
  "expandedCallHeight?": Pixels,
  "colorBy?": Text,
  "colorTable?": StringMap,
  "noCallColor?": Text,
  "homvarColor?": Text,
  "hetvarColor?": Text,
  "homrefColor?": Text,
  "showGenotypes?": Flag,
}).onUndeclaredKey("reject");

/**
 * Somatic mutations (mut, maf)
 */
export const MutationTrackSchema = type({
  ...URL_FIELDS,
  "displayMode?": DisplayMode,
  "colorTable?": StringMap,
}).onUndeclaredKey("reject");

/**
 * Segmented copy number (seg)
 */
export const SegmentedCopyNumberTrackSchema = type({
  ...URL_FIELDS,
  "displayMode?": type("'EXPANDED' | 'SQUISHED' | 'FILL' | null"),
  "sort?": SegmentedCopyNumberSortingSchema.or("null"),
  "log?": Flag,
}).onUndeclaredKey("reject");

/**
 * Genome-wide association results (gwas)
 */
export const GwasTrackSchema = type({
  ...URL_FIELDS,
  "min?": Num,
  "max?": Num,
  "posteriorProbability?": Flag,
  "dotSize?": type("number > 0").narrow((n) => Number.isFinite(n)).or("null"),
  "columns?": GwasColumnsSchema.or("null"),
  "colorTable?": StringMap,
}).onUndeclaredKey("reject");

/**
 * Paired-feature interactions (bedpe, interact, bigInteract)
 */
export const InteractTrackSchema = type({
  ...URL_FIELDS,
  "arcType?": ArcType,
  "arcOrientation?": ArcOrientation,
  "thickness?": Num,
  "alpha?": Opacity,
  "logScale?": Flag,
  "showBlocks?": Flag,
  "blockHeight?": Pixels,
  "useScore?": Flag,
  "max?": Num,
}).onUndeclaredKey("reject");

/**
 * Quantitative trait loci (qtl)
 */
export const QtlTrackSchema = type({
  ...URL_FIELDS,
  "min?": Num,
  "max?": Num,
  "autoscalePercentile?": type("0 <= number <= 100").or("null"),
  "phenotype?": Text,
}).onUndeclaredKey("reject");

/**
 * Splice junctions (bed)
 */
export const SpliceJunctionTrackSchema = type({
  ...URL_FIELDS,
  "minSpanningCoverage?": Count,
  "minJunctionCoverage?": Count,
  "maxDepth?": Count,
  "colorBy?": type("'strand' | 'motif' | 'isoform' | null"),
  "thicknessBasedOn?": type("'numUniqueReads' | 'numReads' | 'isoformCount' | null"),
  "bounceHeightBasedOn?": type("'random' | 'distance' | 'thickness' | null"),
}).onUndeclaredKey("reject");

/**
 * CNVpytor read-depth and BAF signal (pytor, vcf)
 */
export const CnvPytorTrackSchema = type({
  ...URL_FIELDS,
  "signalName?": type("'rd_snp' | 'rd' | 'snp' | null"),
  "cnvCaller?": type("'ReadDepth' | '2D' | null"),
  "binSize?": type("number.integer > 0").or("null"),
  "colors?": TextList,
}).onUndeclaredKey("reject");

/**
 * Arc diagrams such as RNA secondary structure (bp, bed)
 */
export const ArcTrackSchema = type({
  ...URL_FIELDS,
  "arcType?": ArcType,
  "arcOrientation?": ArcOrientation,
  "thickness?": Num,
  "alpha?": Opacity,
}).onUndeclaredKey("reject");

/**
 * Own fields of a merged track; its `tracks` are decoded one by one as wig
 * tracks and attached by the builder.
 */
export const MergedTrackFieldsSchema = type({
  ...DISPLAY_FIELDS,
  "alpha?": Opacity,
  "autoscale?": Flag,
  "min?": Num,
  "max?": Num,
}).onUndeclaredKey("reject");

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Top-level configuration keys; `tracks` entries are decoded separately
 */
export const ConfigurationFieldsSchema = type({
  "genome?": Text,
  "locus?": type("string | string[] | null"),
  "showSampleNames?": Flag,
  "tracks?": "unknown[]",
}).onUndeclaredKey("reject");
