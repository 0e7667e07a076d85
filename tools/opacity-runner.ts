import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { OpacityRequest, type TNamingConvention, type TOpacityRequest } from "@shared/dust-opacity";
import { findNkFile, inputArgument, resolveInputFile, type ResolvedInputFile } from "./nk-resolver";
import { NAMING_STRATEGIES, formatDecimal, type NamingStrategy, type StagingLayout } from "./opacity-conventions";
import {
  ExpectedOutputMissingError,
  InputFileNotResolvedError,
  OptoolProcessError,
  RequestValidationError,
} from "./optool-errors";
import { log, logError, logWarn } from "./optool-log";
import { optoolService, type OptoolService } from "./optool-service";

const SOURCE = "opacity-runner";

export type RunOpacityOptions = {
  nkDir: string;
  outputDir: string;
  convention?: TNamingConvention;
  optool?: OptoolService;
  keepStaging?: boolean;
};

export type OpacityResult =
  | { ok: true; request: TOpacityRequest; fileName: string; outputPath: string }
  | { ok: false; request: TOpacityRequest; error: Error };

export type SeriesResult = {
  results: OpacityResult[];
  successCount: number;
  total: number;
  ok: boolean;
};

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

export function describeRequest(request: TOpacityRequest): string {
  const at = request.temperature !== undefined ? ` at ${request.temperature}K` : "";
  const mantle = request.mantle
    ? ` with ${request.mantle.material} mantle (${(request.mantle.fraction * 100).toFixed(1)}%)`
    : "";
  return `Running Optool for ${request.material}, grain size ${formatDecimal(request.grainSize)}μm${at}${mantle}...`;
}

function resolveFor(
  role: "core" | "mantle",
  material: string,
  temperature: number | undefined,
  nkDir: string,
  strategy: NamingStrategy,
): ResolvedInputFile {
  if (!strategy.builtinFallback) {
    const found = findNkFile(material, temperature, nkDir);
    if (!found) {
      throw new InputFileNotResolvedError(material, temperature, nkDir);
    }
    return { kind: "file", path: found.path, match: found.match };
  }
  const resolved = resolveInputFile(material, temperature, nkDir);
  if (resolved.kind === "builtin") {
    const forMantle = role === "mantle" ? " for mantle" : "";
    log(`Using built-in optool material${forMantle}: ${material}`, SOURCE);
  }
  return resolved;
}

function reportFailure(error: Error): void {
  if (error instanceof OptoolProcessError) {
    logError(`Optool failed: ${error.message}`, SOURCE);
    log(`Command output: ${error.stdout}`, SOURCE);
    log(`Command error: ${error.stderr}`, SOURCE);
    return;
  }
  logError(error.message, SOURCE);
}

/**
 * Runs Optool once and copies its output to the convention's file name.
 * Never throws: every failure is logged and returned as `{ ok: false }`.
 * The staging directory is removed on every path unless `keepStaging` is set.
 */
export async function runOpacity(input: TOpacityRequest, options: RunOpacityOptions): Promise<OpacityResult> {
  const strategy = NAMING_STRATEGIES[options.convention ?? "plain"];
  const optool = options.optool ?? optoolService;

  const parsed = OpacityRequest.safeParse(input);
  if (!parsed.success) {
    const error = new RequestValidationError(parsed.error.issues.map((issue) => issue.message).join("; "));
    logError(error.message, SOURCE);
    return { ok: false, request: input, error };
  }
  const request = parsed.data;

  let staging: StagingLayout | undefined;
  try {
    if (request.mantle && !strategy.supportsMantle) {
      throw new RequestValidationError(`mantle options are not available with the ${strategy.convention} convention.`);
    }
    await fs.mkdir(options.outputDir, { recursive: true });

    const core = resolveFor("core", request.material, request.temperature, options.nkDir, strategy);
    const mantle = request.mantle
      ? resolveFor("mantle", request.mantle.material, request.temperature, options.nkDir, strategy)
      : undefined;

    staging = strategy.stagingLayout(options.outputDir, request);
    await fs.mkdir(staging.dir, { recursive: true });

    const args = strategy.buildArgs(request, {
      core: inputArgument(core),
      mantle: mantle ? inputArgument(mantle) : undefined,
      stagingDir: staging.dir,
    });
    log(describeRequest(request), SOURCE);
    await optool.run(args);

    const source = path.join(staging.dir, strategy.optoolOutputFile);
    if (!existsSync(source)) {
      throw new ExpectedOutputMissingError(source);
    }
    const fileName = strategy.fileName(request);
    const outputPath = path.join(options.outputDir, fileName);
    await fs.copyFile(source, outputPath);
    log(`Generated: ${fileName}`, SOURCE);
    return { ok: true, request, fileName, outputPath };
  } catch (err) {
    const error = toError(err);
    reportFailure(error);
    return { ok: false, request, error };
  } finally {
    if (staging && !options.keepStaging) {
      const root = staging.root;
      await fs.rm(root, { recursive: true, force: true }).catch((err: unknown) => {
        logWarn(`could not remove staging directory ${root}: ${toError(err).message}`, SOURCE);
      });
    }
  }
}

// One temperature at a time; every run shares the same staging directory.
export async function runTemperatureSeries(
  base: Omit<TOpacityRequest, "temperature">,
  temperatures: readonly number[],
  options: RunOpacityOptions,
): Promise<SeriesResult> {
  const results: OpacityResult[] = [];
  for (const temperature of temperatures) {
    const result = await runOpacity({ ...base, temperature }, options);
    if (!result.ok) {
      logWarn(`Failed to generate opacity file for ${base.material} at ${temperature}K`, SOURCE);
    }
    results.push(result);
  }

  const successCount = results.filter((result) => result.ok).length;
  log(`Successfully generated ${successCount}/${temperatures.length} files`, SOURCE);
  log(`Output directory: ${path.resolve(options.outputDir)}`, SOURCE);
  return { results, successCount, total: temperatures.length, ok: successCount === temperatures.length };
}
