import { z } from "zod";

/**
 * Kernel-phase format contracts.
 *
 * A file under test is reduced to an ordered list of segments (FITS HDUs),
 * each carrying only its name and row-major shape. The format definition is
 * a versioned, declarative table of which segments must exist and which
 * shape axes encode the same physical count.
 */

export type TSegment = Readonly<{
  name: string;
  shape: readonly number[];
}>;

export type SegmentCatalog = readonly TSegment[];

export const QuantityBinding = z.object({
  segment: z.string().min(1),
  axis: z.number().int().nonnegative(),
});

export type TQuantityBinding = Readonly<z.infer<typeof QuantityBinding>>;

export const QuantityDefinition = z.object({
  name: z.string().min(1),
  bindings: z.array(QuantityBinding),
});

export const FormatDefinition = z.object({
  schema_version: z.literal("kpfits_format/1"),
  name: z.string().min(1),
  description: z.string().optional(),
  minimum_segment_count: z.number().int().positive(),
  mandatory_names: z.array(z.string().min(1)).min(1),
  optional_names: z.array(z.string().min(1)).default([]),
  quantities: z.array(QuantityDefinition),
});

export type TFormatDefinition = z.infer<typeof FormatDefinition>;

export type FindingSeverity = "PASS" | "FAIL" | "WARNING";

export type Verdict = "PASS" | "FAIL";

export type Finding = Readonly<{
  severity: FindingSeverity;
  checkId: string;
  message: string;
}>;

export const CHECK_SEGMENT_COUNT = "segment-count-floor";
export const CHECK_MANDATORY_PRESENT = "mandatory-hdus-present";
export const CHECK_UNKNOWN_SEGMENT = "unknown-segment";
export const CHECK_DUPLICATE_SEGMENT = "duplicate-segment";

export const consistencyCheckId = (quantity: string): string => `consistency:${quantity}`;

export type ValidationReport = Readonly<{
  file: string;
  format: string;
  segments: SegmentCatalog;
  findings: readonly Finding[];
  verdict: Verdict;
}>;
