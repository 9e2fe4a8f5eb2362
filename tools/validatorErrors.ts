// Boundary errors. Data-quality problems are Findings, never these.

export class ValidatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidatorError";
  }
}

export class ContainerReadError extends ValidatorError {
  path: string;

  constructor(message: string, path = "<buffer>") {
    super(`${path}: ${message}`);
    this.path = path;
    this.name = "ContainerReadError";
  }
}

export class FormatSchemaError extends ValidatorError {
  issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid format schema ${source}: ${issues.join("; ")}`);
    this.issues = issues;
    this.name = "FormatSchemaError";
  }
}

export class UnknownQuantityError extends ValidatorError {
  quantity: string;

  constructor(quantity: string, format: string) {
    super(`quantity "${quantity}" is not defined by format ${format}`);
    this.quantity = quantity;
    this.name = "UnknownQuantityError";
  }
}

export class ValidatorUsageError extends ValidatorError {
  constructor(message: string) {
    super(message);
    this.name = "ValidatorUsageError";
  }
}
