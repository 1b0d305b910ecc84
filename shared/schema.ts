import { isValid, parse, parseISO } from "date-fns";
import { z } from "zod";

export const tracerSchema = z.enum(["FDG", "PSMA"]);
export const sexCategorySchema = z.enum(["male", "female", "pediatric"]);

// Timestamps arrive either as ISO strings or in the form the technologists type them
const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm";

export function parseTimestamp(value: string): Date | null {
  const iso = parseISO(value);
  if (isValid(iso)) return iso;
  const typed = parse(value.trim(), TIMESTAMP_FORMAT, new Date());
  return isValid(typed) ? typed : null;
}

const timestampSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const date = typeof value === "string" ? parseTimestamp(value) : value;
  if (!date || !isValid(date)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an ISO timestamp or ${TIMESTAMP_FORMAT}` });
    return z.NEVER;
  }
  return date;
});

const finite = () => z.number().finite();

const perTracer = (fdg: number, psma: number) =>
  z
    .object({
      FDG: finite().default(fdg),
      PSMA: finite().default(psma),
    })
    .default({ FDG: fdg, PSMA: psma });

// Numeric fields are only checked for being finite; out-of-range values are
// clamped by the planner instead of rejected.
export const protocolRequestSchema = z.object({
  tracerLabel: z.string().default("FDG"),
  patient: z.object({
    weightKg: finite(),
    heightCm: finite(),
    sex: sexCategorySchema.default("male"),
  }),
  acquisition: z.object({
    injectedMbq: finite(),
    injectedAt: timestampSchema,
    scanStartAt: timestampSchema,
    residualMbq: finite().default(0),
    scanRangeMm: finite().default(1050),
  }),
  recon: z
    .object({
      profile: z.string().default("HD_PET"),
      customGain: finite().nullable().optional(),
    })
    .default({}),
  referenceDwellS: z
    .object({
      standard: perTracer(200, 240),
      fast: perTracer(120, 150),
    })
    .default({}),
  /** Activity per kg of the reference scan k is calibrated against (MBq/kg) */
  referenceDosePerKg: perTracer(3.7, 2.5),
  lowDoseMbqPerKg: perTracer(2.5, 1.5),
  /** Defaults to the device's per-tracer value when omitted */
  snrRefSite: finite().optional(),
  snrTarget: finite().optional(),
  useSiteK: z.boolean().default(true),
  applyPediatricSnrTarget: z.boolean().default(false),
  recordK: z.boolean().default(false),
});

export const kMeasurementSchema = z.object({
  tracer: tracerSchema,
  reconProfile: z.string().min(1),
  k: finite().positive(),
});

// Any JSON object is a valid store; keys the planner does not touch are kept as they are
export const kStoreSchema = z.record(z.string(), z.unknown());

/** Measurements under one "{tracer}_{reconProfile}" key */
export const kMeasurementListSchema = z.array(z.number());

export type ProtocolRequest = z.infer<typeof protocolRequestSchema>;
export type ProtocolRequestInput = z.input<typeof protocolRequestSchema>;
export type KMeasurement = z.infer<typeof kMeasurementSchema>;
export type KStore = z.infer<typeof kStoreSchema>;
