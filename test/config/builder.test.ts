import { describe, expect, test, vi } from "vitest";
import {
  buildConfiguration,
  buildTrack,
  parseConfiguration,
  serializeConfiguration,
  stringifyConfiguration,
} from "../../src/config/builder";
import { SchemaViolationError, UnknownTrackTypeError } from "../../src/errors";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return expect.unreachable("Should have thrown");
}

function captureSchemaViolation(run: () => unknown): SchemaViolationError {
  const error = captureError(run);
  if (!(error instanceof SchemaViolationError)) {
    throw new Error(`Expected SchemaViolationError, got ${String(error)}`);
  }
  return error;
}

describe("buildTrack", () => {
  test("resolves the variant from a declared format", () => {
    const track = buildTrack({
      name: "reads",
      url: "https://example.org/a.cram",
      indexURL: "https://example.org/a.cram.crai",
      format: "cram",
    });

    expect(track).toEqual({
      type: "alignment",
      name: "reads",
      url: "https://example.org/a.cram",
      indexURL: "https://example.org/a.cram.crai",
      format: "cram",
    });
  });

  test("guesses the format from the url", () => {
    const track = buildTrack({ name: "genes", url: "https://example.org/genes.gff3.gz" });
    expect(track.type).toBe("annotation");
    expect("format" in track).toBe(false);
  });

  test("accepts an explicit null type", () => {
    const track = buildTrack({ type: null, name: "calls", url: "https://example.org/calls.vcf" });
    expect(track.type).toBe("variant");
  });

  test("keeps explicit nulls and leaves unset fields absent", () => {
    const track = buildTrack({ name: "genes", url: "https://example.org/genes.bed", color: null });
    expect(track.color).toBeNull();
    expect("height" in track).toBe(false);
  });

  test("decodes nested value objects", () => {
    const track = buildTrack({
      name: "reads",
      url: "https://example.org/a.bam",
      sort: { chr: "chr8", position: 127736000, option: "BASE", direction: "ASC" },
    });
    expect(track.type).toBe("alignment");
    if (track.type !== "alignment") return;
    expect(track.sort).toEqual({ chr: "chr8", position: 127736000, option: "BASE", direction: "ASC" });
  });

  test("freezes the result", () => {
    const track = buildTrack({
      name: "coverage",
      url: "https://example.org/a.bw",
      guideLines: [{ color: "grey", y: 10 }],
    });
    expect(Object.isFrozen(track)).toBe(true);
    if (track.type !== "wig") return expect.unreachable("Expected a wig track");
    expect(Object.isFrozen(track.guideLines)).toBe(true);
    expect(Object.isFrozen(track.guideLines?.[0])).toBe(true);
  });

  test("rejects undeclared keys", () => {
    const error = captureSchemaViolation(() =>
      buildTrack({ name: "reads", url: "https://example.org/a.bam", bogus: 1 })
    );
    expect(error.path).toBe("track");
    expect(error.trackType).toBe("alignment");
    expect(error.message).toContain("bogus");
  });

  test("rejects values outside an enumeration", () => {
    const error = captureSchemaViolation(() =>
      buildTrack({ name: "genes", url: "https://example.org/genes.bed", displayMode: "TALL" })
    );
    expect(error.trackType).toBe("annotation");
    expect(error.message).toContain("displayMode");
  });

  test("rejects invalid nested values", () => {
    const error = captureSchemaViolation(() =>
      buildTrack({
        name: "reads",
        url: "https://example.org/a.bam",
        sort: { chr: "chr8", position: 100, option: "COLOR" },
      })
    );
    expect(error.trackType).toBe("alignment");
    expect(error.message).toContain("sort");
  });

  test("requires a name", () => {
    const error = captureSchemaViolation(() => buildTrack({ url: "https://example.org/a.bam" }));
    expect(error.message).toContain("name");
  });

  test("rejects input that is not a track object", () => {
    expect(captureSchemaViolation(() => buildTrack("a.bam")).message).toBe(
      "track: track must be an object"
    );
    expect(captureSchemaViolation(() => buildTrack(null)).message).toBe(
      "track: track must be an object"
    );
  });

  test("rejects a non-string type", () => {
    const error = captureSchemaViolation(() =>
      buildTrack({ type: 3, name: "reads", url: "https://example.org/a.bam" })
    );
    expect(error.message).toBe("track: type must be a string");
  });

  test("rejects input that is not plain data", () => {
    const error = captureSchemaViolation(() =>
      buildTrack({ name: "reads", url: "https://example.org/a.bam", onClick: () => undefined })
    );
    expect(error.message).toBe("track: input must be plain data");
  });

  test("throws when no variant matches", () => {
    const error = captureError(() => buildTrack({ name: "x", url: "https://example.org/x.xyz" }));
    expect(error).toBeInstanceOf(UnknownTrackTypeError);
    if (!(error instanceof UnknownTrackTypeError)) return;
    expect(error.format).toBe("xyz");
  });

  test("guesses a gzipped segmented copy number file", () => {
    const track = buildTrack({ name: "copy number", url: "foo.seg.gz" });
    expect(track).toEqual({ type: "seg", name: "copy number", url: "foo.seg.gz" });
  });

  test("rejects non-finite numbers", () => {
    const order = captureSchemaViolation(() =>
      buildTrack({ name: "signal", url: "https://example.org/a.bw", order: Number.POSITIVE_INFINITY })
    );
    expect(order.trackType).toBe("wig");
    expect(order.message).toContain("order");

    const min = captureSchemaViolation(() =>
      buildTrack({ name: "signal", url: "https://example.org/a.bw", min: Number.NEGATIVE_INFINITY })
    );
    expect(min.message).toContain("min");

    const guideLine = captureSchemaViolation(() =>
      buildTrack({
        name: "signal",
        url: "https://example.org/a.bw",
        guideLines: [{ color: "grey", y: Number.POSITIVE_INFINITY }],
      })
    );
    expect(guideLine.message).toContain("guideLines");

    const dotSize = captureSchemaViolation(() =>
      buildTrack({ name: "study", url: "https://example.org/a.gwas", dotSize: Number.POSITIVE_INFINITY })
    );
    expect(dotSize.trackType).toBe("gwas");
  });

  test("an empty format falls back to the url", () => {
    const track = buildTrack({ name: "calls", url: "https://example.org/calls.vcf.gz", format: "" });
    expect(track.type).toBe("variant");
  });

  describe("format warnings", () => {
    test("reports a declared format the variant does not read", () => {
      const onWarning = vi.fn();
      const track = buildTrack(
        { type: "wig", name: "signal", url: "https://example.org/a.txt", format: "txt" },
        { onWarning }
      );
      expect(track.type).toBe("wig");
      expect(onWarning).toHaveBeenCalledTimes(1);
      expect(onWarning).toHaveBeenCalledWith('track: format "txt" is not associated with wig tracks');
    });

    test("stays quiet for associated formats", () => {
      const onWarning = vi.fn();
      buildTrack({ name: "signal", url: "https://example.org/a.bw", format: "bigwig" }, { onWarning });
      expect(onWarning).not.toHaveBeenCalled();
    });

    test("can be turned off", () => {
      const onWarning = vi.fn();
      buildTrack(
        { type: "wig", name: "signal", url: "https://example.org/a.txt", format: "txt" },
        { onWarning, checkFormats: false }
      );
      expect(onWarning).not.toHaveBeenCalled();
    });

    test("go to console.warn by default", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      try {
        buildTrack({ type: "qtl", name: "eqtl", url: "https://example.org/a.tsv", format: "tsv" });
        expect(warn).toHaveBeenCalledWith('track: format "tsv" is not associated with qtl tracks');
      } finally {
        warn.mockRestore();
      }
    });
  });

  describe("merged tracks", () => {
    test("builds wig children", () => {
      const track = buildTrack({
        type: "merged",
        name: "signals",
        alpha: 0.5,
        tracks: [
          { name: "forward", url: "https://example.org/fwd.bigwig" },
          { name: "reverse", url: "https://example.org/rev.bw", format: "bigwig", color: "red" },
        ],
      });

      expect(track).toEqual({
        type: "merged",
        name: "signals",
        alpha: 0.5,
        tracks: [
          { type: "wig", name: "forward", url: "https://example.org/fwd.bigwig" },
          {
            type: "wig",
            name: "reverse",
            url: "https://example.org/rev.bw",
            format: "bigwig",
            color: "red",
          },
        ],
      });
    });

    test("rejects children that are not wig tracks", () => {
      const error = captureSchemaViolation(() =>
        buildTrack({
          type: "merged",
          name: "signals",
          tracks: [
            { name: "coverage", url: "https://example.org/a.bw" },
            { name: "reads", url: "https://example.org/a.bam" },
          ],
        })
      );
      expect(error.path).toBe("track.tracks[1]");
      expect(error.message).toBe(
        "track.tracks[1]: merged tracks may only contain wig tracks, got alignment"
      );
    });

    test("requires a tracks array", () => {
      const error = captureSchemaViolation(() => buildTrack({ type: "merged", name: "signals" }));
      expect(error.message).toBe("track: tracks must be an array of wig tracks");
      expect(error.trackType).toBe("merged");
    });

    test("rejects url fields on the merged track itself", () => {
      const error = captureSchemaViolation(() =>
        buildTrack({ type: "merged", name: "signals", url: "https://example.org/a.bw", tracks: [] })
      );
      expect(error.trackType).toBe("merged");
      expect(error.message).toContain("url");
    });
  });
});

describe("buildConfiguration", () => {
  const input = {
    genome: "hg38",
    locus: ["chr8:127,736,588-127,739,371", "MYC"],
    showSampleNames: false,
    tracks: [
      { name: "reads", url: "https://example.org/a.cram", indexURL: "https://example.org/a.cram.crai" },
      { name: "genes", url: "https://example.org/genes.bed", displayMode: "EXPANDED" },
    ],
  };

  test("builds every track in order", () => {
    const config = buildConfiguration(input);

    expect(config.genome).toBe("hg38");
    expect(config.locus).toEqual(["chr8:127,736,588-127,739,371", "MYC"]);
    expect(config.showSampleNames).toBe(false);
    expect(config.tracks?.map((track) => track.type)).toEqual(["alignment", "annotation"]);
    expect(Object.isFrozen(config.tracks)).toBe(true);
  });

  test("does not modify or freeze the caller's data", () => {
    const before = structuredClone(input);
    buildConfiguration(input);
    expect(input).toEqual(before);
    expect(Object.isFrozen(input)).toBe(false);
    expect(Object.isFrozen(input.tracks[0])).toBe(false);
  });

  test("leaves tracks absent when not given", () => {
    const config = buildConfiguration({ genome: "mm10" });
    expect(config).toEqual({ genome: "mm10" });
    expect("tracks" in config).toBe(false);
  });

  test("a built configuration always serializes", () => {
    const error = captureSchemaViolation(() =>
      buildConfiguration({
        tracks: [{ name: "a", url: "https://example.org/a.bw", order: Number.POSITIVE_INFINITY }],
      })
    );
    expect(error.path).toBe("tracks[0]");
  });

  test("rejects undeclared top-level keys", () => {
    const error = captureSchemaViolation(() => buildConfiguration({ genome: "hg38", theme: "dark" }));
    expect(error.path).toBe("configuration");
  });

  test("reports the index of the failing track", () => {
    const error = captureSchemaViolation(() =>
      buildConfiguration({
        tracks: [
          { name: "genes", url: "https://example.org/genes.bed" },
          { name: "reads", url: "https://example.org/a.bam", height: -1 },
        ],
      })
    );
    expect(error.path).toBe("tracks[1]");
    expect(error.trackType).toBe("alignment");
  });
});

describe("serialization", () => {
  test("emits each track's type and drops unset keys", () => {
    const config = buildConfiguration({
      genome: "hg19",
      tracks: [{ name: "calls", url: "https://example.org/calls.vcf", color: null }],
    });

    expect(serializeConfiguration(config)).toEqual({
      genome: "hg19",
      tracks: [{ type: "variant", name: "calls", url: "https://example.org/calls.vcf", color: null }],
    });
  });

  test("stringifies compactly or indented", () => {
    const config = buildConfiguration({ genome: "hg38" });
    expect(stringifyConfiguration(config)).toBe('{"genome":"hg38"}');
    expect(stringifyConfiguration(config, { pretty: true })).toBe('{\n  "genome": "hg38"\n}');
  });

  test("round-trips through JSON", () => {
    const config = buildConfiguration({
      genome: "hg38",
      locus: "chr1:1-1000",
      tracks: [
        {
          name: "reads",
          url: "https://example.org/a.bam",
          indexURL: "https://example.org/a.bam.bai",
          filter: { duplicates: false, mq: 20 },
        },
        { type: "seg", name: "copy number", url: "https://example.org/cn.seg", log: true },
        {
          type: "gwas",
          name: "study",
          url: "https://example.org/study.gwas",
          columns: { chromosome: 1, position: 2, value: 5 },
        },
        {
          type: "merged",
          name: "signals",
          tracks: [{ name: "a", url: "https://example.org/a.bw", guideLines: [{ color: "red", y: 0 }] }],
        },
      ],
    });

    expect(parseConfiguration(stringifyConfiguration(config))).toEqual(config);
  });
});

describe("parseConfiguration", () => {
  test("builds from JSON text", () => {
    const config = parseConfiguration(
      '{"genome":"hg38","tracks":[{"name":"reads","url":"https://example.org/a.bam"}]}'
    );
    expect(config.tracks?.[0]?.type).toBe("alignment");
  });

  test("rejects malformed JSON", () => {
    const error = captureSchemaViolation(() => parseConfiguration("{not json"));
    expect(error.path).toBe("configuration");
  });
});
