import { z } from "zod";

export const NamingConvention = z.enum(["plain", "scattering-matrix"]);

export type TNamingConvention = z.infer<typeof NamingConvention>;

export const MantleSpec = z.object({
  material: z.string().trim().min(1),
  fraction: z.number().gt(0, "mantle fraction must be greater than 0").max(1, "mantle fraction must be at most 1"),
});

export const OpacityRequest = z.object({
  material: z.string().trim().min(1),
  grainSize: z.number().finite().positive("grain size must be positive"),
  temperature: z.number().int().nonnegative().optional(),
  mantle: MantleSpec.optional(),
});

export type TOpacityRequest = z.infer<typeof OpacityRequest>;

export const DustOpacityOptions = z
  .object({
    material: z.string().trim().min(1),
    grainSize: z.number().finite().positive("--grain-size must be positive"),
    temperatures: z.array(z.number().int().nonnegative()).min(1, "--temperatures needs at least one value"),
    temperatureDependent: z.boolean(),
    nkDir: z.string().min(1),
    outputDir: z.string().min(1),
    mantleMaterial: z.string().trim().min(1).optional(),
    mantleFraction: z.number().finite().optional(),
    convention: NamingConvention,
    optoolBin: z.string().min(1),
  })
  .superRefine((value, ctx) => {
    if (value.mantleMaterial !== undefined && value.mantleFraction === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mantleFraction"],
        message: "--mantle-fraction is required when --mantle-material is specified.",
      });
    }
    if (value.mantleFraction !== undefined && value.mantleMaterial === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mantleMaterial"],
        message: "--mantle-material is required when --mantle-fraction is specified.",
      });
    }
    if (value.mantleFraction !== undefined && (value.mantleFraction <= 0 || value.mantleFraction > 1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mantleFraction"],
        message: "--mantle-fraction must be between 0 and 1 (exclusive of 0).",
      });
    }
    if (value.convention === "scattering-matrix" && value.mantleMaterial !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["convention"],
        message: "mantle options are not available with --scattering-matrix.",
      });
    }
  });

export type TDustOpacityOptions = z.infer<typeof DustOpacityOptions>;
