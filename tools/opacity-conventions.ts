import path from "node:path";
import type { TNamingConvention, TOpacityRequest } from "@shared/dust-opacity";

const TEMPERATURE_SUFFIX = /_\d+K$/;

// Guards against ids that already carry a temperature, e.g. "E40R_100K".
export const stripTemperatureSuffix = (material: string): string => material.replace(TEMPERATURE_SUFFIX, "");

/**
 * Fixed-point rendering of a mantle mass fraction: 0.2 -> "0.2", 0.15 -> "0.15", 1 -> "1".
 * Never produces exponent notation for fractions in (0, 1].
 */
export function formatMantleFraction(fraction: number): string {
  return fraction.toFixed(10).replace(/0+$/, "").replace(/\.$/, "");
}

// Integral values keep one decimal ("1.0") to match names already on disk.
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export type StagingLayout = {
  // Removed after every invocation.
  root: string;
  // Passed to Optool as `-o`.
  dir: string;
};

export type OptoolInputs = {
  core: string;
  mantle?: string;
  stagingDir: string;
};

export interface NamingStrategy {
  convention: TNamingConvention;
  optoolOutputFile: string;
  supportsMantle: boolean;
  builtinFallback: boolean;
  fileName: (request: TOpacityRequest) => string;
  stagingLayout: (outputDir: string, request: TOpacityRequest) => StagingLayout;
  buildArgs: (request: TOpacityRequest, inputs: OptoolInputs) => string[];
}

const temperaturePart = (request: TOpacityRequest): string =>
  request.temperature !== undefined ? `_${request.temperature}K` : "";

const plainOpacity: NamingStrategy = {
  convention: "plain",
  optoolOutputFile: "dustkappa.inp",
  supportsMantle: true,
  builtinFallback: true,
  fileName: (request) => {
    const base = stripTemperatureSuffix(request.material);
    const mantle = request.mantle
      ? `_m${request.mantle.material}_${formatMantleFraction(request.mantle.fraction)}`
      : "";
    return `dustkappa_${base}${mantle}${temperaturePart(request)}_a${formatDecimal(request.grainSize)}.inp`;
  },
  stagingLayout: (outputDir) => {
    const dir = path.join(outputDir, "temp_optool");
    return { root: dir, dir };
  },
  buildArgs: (request, inputs) => {
    const args = [inputs.core, "-radmc", "-a", formatDecimal(request.grainSize), "-o", inputs.stagingDir];
    if (request.mantle && inputs.mantle !== undefined) {
      args.push("-m", inputs.mantle, formatDecimal(request.mantle.fraction));
    }
    return args;
  },
};

const scatteringMatrixOpacity: NamingStrategy = {
  convention: "scattering-matrix",
  optoolOutputFile: "dustkapscatmat.inp",
  supportsMantle: false,
  builtinFallback: false,
  fileName: (request) => {
    const base = stripTemperatureSuffix(request.material);
    return `dustkapscatmat_${base}${temperaturePart(request)}_a${formatDecimal(request.grainSize)}.inp`;
  },
  stagingLayout: (outputDir, request) => {
    const base = stripTemperatureSuffix(request.material);
    const temperature = request.temperature !== undefined ? `${request.temperature}K` : "";
    const root = path.join(outputDir, "temp_optool_output");
    return { root, dir: path.join(root, `${base}_${temperature}_a${formatDecimal(request.grainSize)}`) };
  },
  buildArgs: (request, inputs) => [
    inputs.core,
    "-s",
    "-radmc",
    "-a",
    formatDecimal(request.grainSize),
    "-o",
    inputs.stagingDir,
  ],
};

export const NAMING_STRATEGIES: Readonly<Record<TNamingConvention, NamingStrategy>> = Object.freeze({
  plain: plainOpacity,
  "scattering-matrix": scatteringMatrixOpacity,
});

export const outputFileName = (request: TOpacityRequest, convention: TNamingConvention = "plain"): string =>
  NAMING_STRATEGIES[convention].fileName(request);
