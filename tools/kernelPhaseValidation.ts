import type { SegmentCatalog, ValidationReport } from "@shared/kernel-phase-format";
import { overallVerdict, runConsistencyChecks } from "./consistencyEngine";
import { readSegmentCatalog } from "./fitsCatalog";
import type { FormatSchema } from "./formatSchema";

export function buildValidationReport(
  file: string,
  segments: SegmentCatalog,
  schema: FormatSchema,
): ValidationReport {
  const findings = runConsistencyChecks(segments, schema);
  return {
    file,
    format: schema.name,
    segments,
    findings,
    verdict: overallVerdict(findings),
  };
}

/**
 * Reads a FITS file and checks it against a format schema. Container errors
 * propagate as ContainerReadError; nothing is reported for that file.
 */
export async function runKernelPhaseValidation(
  filePath: string,
  schema: FormatSchema,
): Promise<ValidationReport> {
  const segments = await readSegmentCatalog(filePath);
  return buildValidationReport(filePath, segments, schema);
}
