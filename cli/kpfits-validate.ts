#!/usr/bin/env -S tsx

import { realpathSync } from "node:fs";
import fs from "node:fs/promises";
import { pathToFileURL } from "node:url";
import type { ValidationReport } from "@shared/kernel-phase-format";
import { defaultFormatSchema, loadFormatSchema, type FormatSchema } from "../tools/formatSchema";
import { runKernelPhaseValidation } from "../tools/kernelPhaseValidation";
import { EXIT_PASS, exitStatusFor, renderTranscript, toReportRecord } from "../tools/validationReport";
import { resolveValidatorConfig, USAGE, type ValidatorConfig } from "../tools/validatorConfig";
import { ContainerReadError, ValidatorError } from "../tools/validatorErrors";

export const EXIT_BOUNDARY = 2;

const TAG = "[kpfits-validate]";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

const resolveSchema = (config: ValidatorConfig): FormatSchema =>
  config.formatPath ? loadFormatSchema(config.formatPath) : defaultFormatSchema();

async function validateOne(
  filePath: string,
  schema: FormatSchema,
  config: ValidatorConfig,
  io: CliIo,
): Promise<ValidationReport | null> {
  let failure = `${filePath} does not exist.`;
  if (await fileExists(filePath)) {
    try {
      const report = await runKernelPhaseValidation(filePath, schema);
      if (config.output === "json") {
        io.stdout(`${JSON.stringify(toReportRecord(report))}\n`);
      } else {
        io.stdout(renderTranscript(report));
      }
      return report;
    } catch (err) {
      if (!(err instanceof ContainerReadError)) throw err;
      failure = err.message;
    }
  }
  io.stderr(`${TAG} ${failure}\n`);
  if (config.output === "json") {
    io.stdout(`${JSON.stringify({ file: filePath, error: failure })}\n`);
  }
  return null;
}

/**
 * Validates every file named on the command line, in order.
 * Returns 2 when any file could not be read (or on usage and schema errors),
 * 1 when any file fails validation, 0 otherwise.
 */
export async function runValidatorCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  io: CliIo = processIo,
): Promise<number> {
  let config: ValidatorConfig;
  let schema: FormatSchema;
  try {
    config = resolveValidatorConfig(argv, env);
    if (config.help) {
      io.stdout(`${USAGE}\n`);
      return EXIT_PASS;
    }
    if (!config.files.length) {
      io.stderr(`Error: no files provided.\n${USAGE}\n`);
      return EXIT_BOUNDARY;
    }
    schema = resolveSchema(config);
  } catch (err) {
    if (!(err instanceof ValidatorError)) throw err;
    io.stderr(`${TAG} ${err.message}\n${USAGE}\n`);
    return EXIT_BOUNDARY;
  }

  let unreadable = false;
  let status = EXIT_PASS;
  for (const filePath of config.files) {
    const report = await validateOne(filePath, schema, config, io);
    if (!report) {
      unreadable = true;
    } else {
      status = Math.max(status, exitStatusFor(report.verdict));
    }
  }

  return unreadable ? EXIT_BOUNDARY : status;
}

/**
 * Process-level wrapper: anything that escapes `runValidatorCli` is logged and
 * mapped to the boundary status, never to the validation FAIL status.
 */
export async function runValidatorProcess(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  io: CliIo = processIo,
): Promise<number> {
  try {
    return await runValidatorCli(argv, env, io);
  } catch (err) {
    const detail = err instanceof Error ? (err.stack ?? err.message) : String(err);
    io.stderr(`${TAG} failed: ${detail}\n`);
    return EXIT_BOUNDARY;
  }
}

const invokedAsScript = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
};

if (invokedAsScript()) {
  void runValidatorProcess(process.argv.slice(2), process.env).then((code) => {
    process.exitCode = code;
  });
}
