import fs from "node:fs";
import {
  FormatDefinition,
  type TFormatDefinition,
  type TQuantityBinding,
} from "@shared/kernel-phase-format";
import { FormatSchemaError, UnknownQuantityError } from "./validatorErrors";

const DEFAULT_FORMAT_URL = new URL("../shared/formats/kernel-phase-v1.json", import.meta.url);

/**
 * Read-only view of a kernel-phase format definition.
 *
 * A format revision is an edit to the definition JSON; the consistency engine
 * only ever reads through these accessors.
 */
export class FormatSchema {
  readonly name: string;
  private readonly minimumCount: number;
  private readonly mandatory: ReadonlySet<string>;
  private readonly optional: ReadonlySet<string>;
  private readonly quantityOrder: readonly string[];
  private readonly bindings: ReadonlyMap<string, readonly TQuantityBinding[]>;

  constructor(definition: TFormatDefinition) {
    this.name = definition.name;
    this.minimumCount = definition.minimum_segment_count;
    this.mandatory = new Set(definition.mandatory_names);
    this.optional = new Set(definition.optional_names);
    this.quantityOrder = Object.freeze(definition.quantities.map((quantity) => quantity.name));
    this.bindings = new Map(
      definition.quantities.map((quantity) => [
        quantity.name,
        Object.freeze(quantity.bindings.map((binding) => Object.freeze({ ...binding }))),
      ]),
    );
    Object.freeze(this);
  }

  minimumSegmentCount(): number {
    return this.minimumCount;
  }

  mandatoryNames(): ReadonlySet<string> {
    return this.mandatory;
  }

  optionalNames(): ReadonlySet<string> {
    return this.optional;
  }

  isKnownName(name: string): boolean {
    return this.mandatory.has(name) || this.optional.has(name);
  }

  quantities(): readonly string[] {
    return this.quantityOrder;
  }

  bindingsFor(quantity: string): readonly TQuantityBinding[] {
    const found = this.bindings.get(quantity);
    if (!found) {
      throw new UnknownQuantityError(quantity, this.name);
    }
    return found;
  }
}

const findDuplicates = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
};

const crossFieldIssues = (definition: TFormatDefinition): string[] => {
  const issues: string[] = [];
  for (const name of findDuplicates(definition.mandatory_names)) {
    issues.push(`mandatory_names: duplicate name ${name}`);
  }
  for (const name of findDuplicates(definition.optional_names)) {
    issues.push(`optional_names: duplicate name ${name}`);
  }
  const mandatory = new Set(definition.mandatory_names);
  for (const name of definition.optional_names) {
    if (mandatory.has(name)) {
      issues.push(`optional_names: ${name} is already mandatory`);
    }
  }
  for (const name of findDuplicates(definition.quantities.map((quantity) => quantity.name))) {
    issues.push(`quantities: duplicate quantity ${name}`);
  }
  const known = new Set([...definition.mandatory_names, ...definition.optional_names]);
  definition.quantities.forEach((quantity, index) => {
    for (const binding of quantity.bindings) {
      if (!known.has(binding.segment)) {
        issues.push(`quantities.${index}.bindings: ${binding.segment} is not a declared segment name`);
      }
    }
  });
  return issues;
};

export function createFormatSchema(raw: unknown, source = "<inline>"): FormatSchema {
  const parsed = FormatDefinition.safeParse(raw);
  if (!parsed.success) {
    throw new FormatSchemaError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  const issues = crossFieldIssues(parsed.data);
  if (issues.length) {
    throw new FormatSchemaError(source, issues);
  }
  return new FormatSchema(parsed.data);
}

export function loadFormatSchema(filePath: string | URL): FormatSchema {
  const source = filePath.toString();
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FormatSchemaError(source, [message]);
  }
  return createFormatSchema(raw, source);
}

let defaultSchema: FormatSchema | undefined;

export function defaultFormatSchema(): FormatSchema {
  if (!defaultSchema) {
    defaultSchema = loadFormatSchema(DEFAULT_FORMAT_URL);
  }
  return defaultSchema;
}
