import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFormatSchema, defaultFormatSchema, loadFormatSchema } from "../formatSchema";
import { FormatSchemaError, UnknownQuantityError } from "../validatorErrors";

const minimalDefinition = () => ({
  schema_version: "kpfits_format/1",
  name: "test-format",
  minimum_segment_count: 2,
  mandatory_names: ["A", "B"],
  optional_names: ["C"],
  quantities: [
    {
      name: "rows",
      bindings: [
        { segment: "A", axis: 0 },
        { segment: "C", axis: 1 },
      ],
    },
    { name: "cols", bindings: [{ segment: "B", axis: 0 }] },
  ],
});

describe("defaultFormatSchema", () => {
  it("exposes the kernel-phase v1 table", () => {
    const schema = defaultFormatSchema();
    expect(schema.name).toBe("kernel-phase/v1");
    expect(schema.minimumSegmentCount()).toBe(7);
    expect([...schema.mandatoryNames()]).toEqual([
      "PRIMARY",
      "APERTURE",
      "UV-PLANE",
      "KER-MAT",
      "BLM-MAT",
      "KP-DATA",
      "CWAVEL",
    ]);
    expect(schema.quantities()).toEqual([
      "kernels",
      "frames",
      "pixels",
      "wavelengths",
      "uv-points",
      "apertures",
    ]);
    expect(schema.bindingsFor("apertures")).toEqual([
      { segment: "APERTURE", axis: 0 },
      { segment: "BLM-MAT", axis: 1 },
    ]);
    expect(schema.bindingsFor("pixels")).toEqual([
      { segment: "PRIMARY", axis: 2 },
      { segment: "PRIMARY", axis: 3 },
    ]);
  });

  it("returns the same frozen instance on every call", () => {
    const schema = defaultFormatSchema();
    expect(defaultFormatSchema()).toBe(schema);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.bindingsFor("kernels"))).toBe(true);
  });

  it("knows optional names without making them mandatory", () => {
    const schema = defaultFormatSchema();
    expect(schema.isKnownName("FULL-COV")).toBe(true);
    expect(schema.mandatoryNames().has("FULL-COV")).toBe(false);
    expect(schema.isKnownName("FOO")).toBe(false);
  });
});

describe("createFormatSchema", () => {
  it("fills optional_names when omitted", () => {
    const { optional_names: _omitted, ...rest } = minimalDefinition();
    const schema = createFormatSchema({ ...rest, quantities: [] });
    expect([...schema.optionalNames()]).toEqual([]);
  });

  it("throws UnknownQuantityError for a quantity the format does not define", () => {
    const schema = createFormatSchema(minimalDefinition());
    expect(() => schema.bindingsFor("kernels")).toThrow(UnknownQuantityError);
    expect(() => schema.bindingsFor("kernels")).toThrow(
      'quantity "kernels" is not defined by format test-format',
    );
  });

  it("reports zod issues with their paths", () => {
    const raw = { ...minimalDefinition(), minimum_segment_count: 0 };
    try {
      createFormatSchema(raw, "inline-test");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatSchemaError);
      if (!(err instanceof FormatSchemaError)) return;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]).toMatch(/^minimum_segment_count: /);
      expect(err.message).toMatch(/^invalid format schema inline-test: /);
    }
  });

  it("rejects bindings to undeclared segments and overlapping name lists", () => {
    const raw = {
      ...minimalDefinition(),
      optional_names: ["A"],
      quantities: [{ name: "rows", bindings: [{ segment: "Z", axis: 0 }] }],
    };
    try {
      createFormatSchema(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatSchemaError);
      if (!(err instanceof FormatSchemaError)) return;
      expect(err.issues).toEqual([
        "optional_names: A is already mandatory",
        "quantities.0.bindings: Z is not a declared segment name",
      ]);
    }
  });

  it("rejects duplicate quantity names", () => {
    const raw = {
      ...minimalDefinition(),
      quantities: [
        { name: "rows", bindings: [] },
        { name: "rows", bindings: [] },
      ],
    };
    expect(() => createFormatSchema(raw)).toThrow("quantities: duplicate quantity rows");
  });
});

describe("loadFormatSchema", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "kpfits-schema-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads a definition from JSON", async () => {
    const file = path.join(dir, "format.json");
    await fs.writeFile(file, JSON.stringify(minimalDefinition()), "utf8");
    const schema = loadFormatSchema(file);
    expect(schema.name).toBe("test-format");
    expect(schema.bindingsFor("rows")).toEqual([
      { segment: "A", axis: 0 },
      { segment: "C", axis: 1 },
    ]);
  });

  it("wraps unreadable and malformed files in FormatSchemaError", async () => {
    const broken = path.join(dir, "broken.json");
    await fs.writeFile(broken, "{ not json", "utf8");
    expect(() => loadFormatSchema(broken)).toThrow(FormatSchemaError);
    expect(() => loadFormatSchema(path.join(dir, "missing.json"))).toThrow(FormatSchemaError);
  });
});
