import {
  CHECK_DUPLICATE_SEGMENT,
  CHECK_MANDATORY_PRESENT,
  CHECK_SEGMENT_COUNT,
  CHECK_UNKNOWN_SEGMENT,
  consistencyCheckId,
  type Finding,
  type FindingSeverity,
  type SegmentCatalog,
  type TSegment,
  type Verdict,
} from "@shared/kernel-phase-format";
import type { FormatSchema } from "./formatSchema";

export type FindingSummary = Record<FindingSeverity, number>;

type Participant = {
  segment: TSegment;
  axis: number;
};

const finding = (severity: FindingSeverity, checkId: string, message: string): Finding => ({
  severity,
  checkId,
  message,
});

export const displaySegmentName = (name: string): string => (name ? name : "<unnamed>");

export const formatShape = (shape: readonly number[]): string => `[${shape.join(", ")}]`;

function checkSegmentCount(catalog: SegmentCatalog, schema: FormatSchema): Finding {
  const required = schema.minimumSegmentCount();
  if (catalog.length < required) {
    return finding(
      "FAIL",
      CHECK_SEGMENT_COUNT,
      `Found ${catalog.length} segments, at least ${required} required`,
    );
  }
  return finding("PASS", CHECK_SEGMENT_COUNT, `Found ${catalog.length} segments (minimum ${required})`);
}

function checkMandatoryPresent(catalog: SegmentCatalog, schema: FormatSchema): Finding {
  const present = new Set(catalog.map((segment) => segment.name));
  const mandatory = [...schema.mandatoryNames()];
  const missing = mandatory.filter((name) => !present.has(name));
  if (missing.length) {
    return finding("FAIL", CHECK_MANDATORY_PRESENT, `Missing mandatory segments: ${missing.join(", ")}`);
  }
  return finding(
    "PASS",
    CHECK_MANDATORY_PRESENT,
    `All ${mandatory.length} mandatory segments present`,
  );
}

function collectParticipants(
  catalog: SegmentCatalog,
  schema: FormatSchema,
  quantity: string,
): Participant[] {
  const participants: Participant[] = [];
  for (const binding of schema.bindingsFor(quantity)) {
    for (const segment of catalog) {
      if (segment.name === binding.segment) {
        participants.push({ segment, axis: binding.axis });
      }
    }
  }
  return participants;
}

function checkQuantity(catalog: SegmentCatalog, schema: FormatSchema, quantity: string): Finding {
  const checkId = consistencyCheckId(quantity);
  const participants = collectParticipants(catalog, schema, quantity);
  // Vacuity counts segment occurrences; one segment bound on two axes is still one segment.
  const occurrences = new Set(participants.map(({ segment }) => segment));
  if (occurrences.size < 2) {
    return finding("PASS", checkId, `Fewer than two segments carry ${quantity}; nothing to compare`);
  }

  const outOfRange = participants.filter(({ segment, axis }) => axis >= segment.shape.length);
  if (outOfRange.length) {
    const details = outOfRange.map(
      ({ segment, axis }) =>
        `Cannot read ${quantity} from ${displaySegmentName(segment.name)} axis ${axis}: ` +
        `shape ${formatShape(segment.shape)} has ${segment.shape.length} axes`,
    );
    return finding("FAIL", checkId, details.join("; "));
  }

  const distinct: number[] = [];
  for (const { segment, axis } of participants) {
    const value = segment.shape[axis];
    if (!distinct.includes(value)) distinct.push(value);
  }
  if (distinct.length === 1) {
    return finding("PASS", checkId, `Consistent number of ${quantity}: ${distinct[0]}`);
  }
  return finding("FAIL", checkId, `Inconsistent number of ${quantity}: ${formatShape(distinct)}`);
}

function checkUnknownNames(catalog: SegmentCatalog, schema: FormatSchema): Finding[] {
  const reported = new Set<string>();
  const findings: Finding[] = [];
  for (const { name } of catalog) {
    if (schema.isKnownName(name) || reported.has(name)) continue;
    reported.add(name);
    findings.push(
      finding(
        "WARNING",
        CHECK_UNKNOWN_SEGMENT,
        `${displaySegmentName(name)} is not a standard segment name`,
      ),
    );
  }
  return findings;
}

function checkDuplicateNames(catalog: SegmentCatalog): Finding[] {
  const counts = new Map<string, number>();
  for (const { name } of catalog) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  const findings: Finding[] = [];
  for (const [name, count] of counts) {
    if (count < 2) continue;
    findings.push(
      finding("WARNING", CHECK_DUPLICATE_SEGMENT, `${displaySegmentName(name)} appears ${count} times`),
    );
  }
  return findings;
}

/**
 * Runs every structural and cross-segment check against a catalog.
 *
 * All checks always run, so one pass reports every problem in the file.
 * Findings come back in check order: segment count, mandatory presence,
 * one entry per schema quantity, then warnings.
 */
export function runConsistencyChecks(catalog: SegmentCatalog, schema: FormatSchema): Finding[] {
  return [
    checkSegmentCount(catalog, schema),
    checkMandatoryPresent(catalog, schema),
    ...schema.quantities().map((quantity) => checkQuantity(catalog, schema, quantity)),
    ...checkUnknownNames(catalog, schema),
    ...checkDuplicateNames(catalog),
  ];
}

export function overallVerdict(findings: readonly Finding[]): Verdict {
  return findings.some((entry) => entry.severity === "FAIL") ? "FAIL" : "PASS";
}

export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const summary: FindingSummary = { PASS: 0, FAIL: 0, WARNING: 0 };
  for (const entry of findings) {
    summary[entry.severity] += 1;
  }
  return summary;
}
