import { DustOpacityOptions, type TDustOpacityOptions, type TOpacityRequest } from "@shared/dust-opacity";
import { LOCAL_MATERIAL_IDS, describeLocalMaterials, isLocalMaterial } from "@shared/material-densities";
import { isDirectory } from "./nk-resolver";
import {
  DEFAULT_GRAIN_SIZE,
  DEFAULT_MATERIAL,
  DEFAULT_TEMPERATURES,
  readDustOpacityEnv,
  type DustOpacityEnv,
} from "./optool-env";
import { OptoolNotFoundError, RequestValidationError } from "./optool-errors";
import { log, logError, logWarn } from "./optool-log";
import { OptoolService } from "./optool-service";
import { runOpacity, runTemperatureSeries, type RunOpacityOptions } from "./opacity-runner";

const SOURCE = "dust-opacity";

export const USAGE = `Usage: dust-opacity [--material <id>] [--grain-size <um>] [--temperatures <K,K,...>]
                    [--nk-dir <dir>] [--output-dir <dir>] [--no-temp-dependent]
                    [--mantle-material <id> --mantle-fraction <f>] [--scattering-matrix]
                    [--optool <path>] [--help]

Generate RADMC-3D dust opacity files with Optool.

Defaults: material=${DEFAULT_MATERIAL}, grain-size=${DEFAULT_GRAIN_SIZE}, temperatures=${DEFAULT_TEMPERATURES.join(",")}
Local materials: ${LOCAL_MATERIAL_IDS.join(", ")} (anything else is passed to Optool as a built-in; see "optool -c")

Examples:
  dust-opacity --material E20R --grain-size 0.5
  dust-opacity --temperatures 50,150,250
  dust-opacity --material E40R --grain-size 0.3 --no-temp-dependent
  dust-opacity --material E40R --mantle-material x035 --mantle-fraction 0.2
  dust-opacity --material pyr --mantle-material h2o --mantle-fraction 0.3
  dust-opacity --material E40R --scattering-matrix --nk-dir nk_optool --output-dir optool_output`;

type ValueKey = "material" | "grainSize" | "temperatures" | "nkDir" | "outputDir" | "mantleMaterial" | "mantleFraction" | "optool";

export type ParsedCliArgs = Partial<Record<ValueKey, string>> & {
  noTempDependent: boolean;
  scatteringMatrix: boolean;
  help: boolean;
};

const VALUE_FLAGS: Record<string, ValueKey | undefined> = {
  "--material": "material",
  "--grain-size": "grainSize",
  "--temperatures": "temperatures",
  "--nk-dir": "nkDir",
  "--output-dir": "outputDir",
  "--mantle-material": "mantleMaterial",
  "--mantle-fraction": "mantleFraction",
  "--optool": "optool",
};

export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const parsed: ParsedCliArgs = { noTempDependent: false, scatteringMatrix: false, help: false };
  const takeValue = (token: string, next?: string): string | undefined => {
    if (token.includes("=")) return token.slice(token.indexOf("=") + 1);
    return next;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const flag = token.includes("=") ? token.slice(0, token.indexOf("=")) : token;
    if (token === "--help" || token === "-h") {
      parsed.help = true;
    } else if (token === "--no-temp-dependent") {
      parsed.noTempDependent = true;
    } else if (token === "--scattering-matrix" || token === "-s") {
      parsed.scatteringMatrix = true;
    } else {
      const key = VALUE_FLAGS[flag];
      if (!key) {
        throw new RequestValidationError(`unrecognized argument: ${token}`);
      }
      const value = takeValue(token, argv[i + 1]);
      if (value === undefined) {
        throw new RequestValidationError(`${flag} expects a value`);
      }
      parsed[key] = value;
      if (!token.includes("=")) i += 1;
    }
  }
  return parsed;
}

const parseNumber = (flag: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new RequestValidationError(`${flag}: invalid number '${raw}'`);
  }
  return value;
};

export function parseTemperatures(raw: string): number[] {
  return raw.split(",").map((part) => {
    const trimmed = part.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new RequestValidationError(`--temperatures: invalid temperature '${part}'`);
    }
    return Number.parseInt(trimmed, 10);
  });
}

export function buildCliOptions(parsed: ParsedCliArgs, env: DustOpacityEnv): TDustOpacityOptions {
  const result = DustOpacityOptions.safeParse({
    material: parsed.material ?? DEFAULT_MATERIAL,
    grainSize: parseNumber("--grain-size", parsed.grainSize) ?? DEFAULT_GRAIN_SIZE,
    temperatures: parsed.temperatures !== undefined ? parseTemperatures(parsed.temperatures) : [...DEFAULT_TEMPERATURES],
    temperatureDependent: !parsed.noTempDependent,
    nkDir: parsed.nkDir ?? env.nkDir,
    outputDir: parsed.outputDir ?? env.outputDir,
    mantleMaterial: parsed.mantleMaterial,
    mantleFraction: parseNumber("--mantle-fraction", parsed.mantleFraction),
    convention: parsed.scatteringMatrix ? "scattering-matrix" : "plain",
    optoolBin: parsed.optool ?? env.optoolBin,
  });
  if (!result.success) {
    const [first] = result.error.issues;
    throw new RequestValidationError(first ? first.message : "invalid arguments");
  }
  return result.data;
}

function noteUnknownMaterial(role: "Material" | "Mantle material", id: string, options: TDustOpacityOptions): void {
  if (isLocalMaterial(id)) return;
  if (options.convention === "scattering-matrix") {
    logWarn(`${role} '${id}' not found in density database. Available materials:`, SOURCE);
    for (const line of describeLocalMaterials()) {
      log(`  - ${line}`, SOURCE);
    }
    log("Continuing with the specified material, but density information may be inaccurate.", SOURCE);
    return;
  }
  log(`Note: ${role} '${id}' not found in local database. Will try as built-in optool material.`, SOURCE);
  log(`Local materials available: ${LOCAL_MATERIAL_IDS.join(", ")}`, SOURCE);
  log("For full list of optool materials, run: optool -c", SOURCE);
}

export type CliDeps = {
  env?: DustOpacityEnv;
  optool?: OptoolService;
};

/** Runs the command and resolves to the process exit code. */
export async function runDustOpacityCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? readDustOpacityEnv();

  let options: TDustOpacityOptions;
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }
    options = buildCliOptions(parsed, env);
  } catch (err) {
    if (err instanceof RequestValidationError) {
      logError(err.message, SOURCE);
      return 1;
    }
    throw err;
  }

  const optool = deps.optool ?? new OptoolService(options.optoolBin);
  try {
    await optool.ensureAvailable();
  } catch (err) {
    if (err instanceof OptoolNotFoundError) {
      logError(err.message, SOURCE);
      log("See: https://github.com/cdominik/optool", SOURCE);
      return 1;
    }
    throw err;
  }

  noteUnknownMaterial("Material", options.material, options);
  if (options.mantleMaterial !== undefined) {
    noteUnknownMaterial("Mantle material", options.mantleMaterial, options);
  }

  if (!isDirectory(options.nkDir)) {
    logError(`Directory '${options.nkDir}' not found.`, SOURCE);
    return 1;
  }

  const runOptions: RunOpacityOptions = {
    nkDir: options.nkDir,
    outputDir: options.outputDir,
    convention: options.convention,
    optool,
    keepStaging: env.keepStaging,
  };
  const base: Omit<TOpacityRequest, "temperature"> = {
    material: options.material,
    grainSize: options.grainSize,
    mantle:
      options.mantleMaterial !== undefined && options.mantleFraction !== undefined
        ? { material: options.mantleMaterial, fraction: options.mantleFraction }
        : undefined,
  };

  if (!options.temperatureDependent) {
    const result = await runOpacity(base, runOptions);
    return result.ok ? 0 : 1;
  }

  log(`Generating opacity files for temperatures: ${options.temperatures.join(", ")}`, SOURCE);
  if (base.mantle) {
    log(`Using mantle: ${base.mantle.material} (${(base.mantle.fraction * 100).toFixed(1)}% of core mass)`, SOURCE);
  }
  const series = await runTemperatureSeries(base, options.temperatures, runOptions);
  return series.ok ? 0 : 1;
}
