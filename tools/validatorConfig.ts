import { ValidatorUsageError } from "./validatorErrors";

export type OutputMode = "text" | "json";

export type ValidatorConfig = {
  files: string[];
  formatPath?: string;
  output: OutputMode;
  help: boolean;
};

export const USAGE =
  "Usage: kpfits-validate <file.fits> [file.fits ...] [--format schema.json] [--json]";

const parseOutputMode = (value: string | undefined): OutputMode => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "json") return "json";
  return "text";
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value?.trim() ? value.trim() : undefined;

/**
 * Merges command-line flags over KPFITS_* environment switches.
 * Flags win; bare arguments are file paths, kept in order.
 */
export const resolveValidatorConfig = (
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
): ValidatorConfig => {
  const config: ValidatorConfig = {
    files: [],
    formatPath: nonEmpty(env.KPFITS_FORMAT),
    output: parseOutputMode(env.KPFITS_OUTPUT),
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "-h" || token === "--help") {
      config.help = true;
    } else if (token === "--json") {
      config.output = "json";
    } else if (token === "--format" || token.startsWith("--format=")) {
      const inline = token.startsWith("--format=");
      const value = inline ? token.slice("--format=".length) : argv[i + 1];
      if (!inline) i += 1;
      const formatPath = nonEmpty(value);
      if (!formatPath) {
        throw new ValidatorUsageError("--format requires a path");
      }
      config.formatPath = formatPath;
    } else if (token.startsWith("-") && token !== "-") {
      throw new ValidatorUsageError(`unknown option ${token}`);
    } else {
      config.files.push(token);
    }
  }

  return config;
};
