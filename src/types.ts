import { z } from "zod";

export const TIERS = ["healthy", "warning", "danger", "critical"] as const;
const DIMENSIONS = ["fiveHour", "weekly"] as const;
const ERROR_KINDS = [
  "not-authenticated",
  "network-error",
  "auth-error",
  "malformed-response",
] as const;

const TierSchema = z.enum(TIERS);
export type Tier = z.infer<typeof TierSchema>;

const DimensionSchema = z.enum(DIMENSIONS);
export type Dimension = z.infer<typeof DimensionSchema>;

const ErrorKindSchema = z.enum(ERROR_KINDS);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

const FreshnessSchema = z.enum(["live", "stale", "unavailable"]);
export type Freshness = z.infer<typeof FreshnessSchema>;

const Timestamp = z.string().datetime({ offset: true });

const SnapshotSchema = z.object({
  fiveHourPercent: z.number().min(0).max(100),
  weeklyPercent: z.number().min(0).max(100),

  // null until the first request of a window has been made.
  fiveHourResetAt: Timestamp.nullable(),
  weeklyResetAt: Timestamp.nullable(),

  capturedAt: Timestamp,
});

export type Snapshot = Readonly<z.infer<typeof SnapshotSchema>>;

export const CurrentStateSchema = z.object({
  snapshot: SnapshotSchema.nullable(),
  freshness: FreshnessSchema,
  lastError: ErrorKindSchema.nullable(),
  lastErrorMessage: z.string().nullable(),
  actionable: z.string().nullable(),
  lastCheckedAt: Timestamp.nullable(),
});

export type CurrentState = Readonly<
  Omit<z.infer<typeof CurrentStateSchema>, "snapshot"> & { snapshot: Snapshot | null }
>;

const CrossingEventSchema = z.object({
  dimension: DimensionSchema,
  fromTier: TierSchema,
  toTier: TierSchema,
  percent: z.number().min(0).max(100),
  at: Timestamp,
});

export type CrossingEvent = z.infer<typeof CrossingEventSchema>;

export const INITIAL_STATE: CurrentState = {
  snapshot: null,
  freshness: "unavailable",
  lastError: null,
  lastErrorMessage: null,
  actionable: null,
  lastCheckedAt: null,
};

export function makeSnapshot(fields: z.input<typeof SnapshotSchema>): Snapshot {
  return Object.freeze(SnapshotSchema.parse(fields));
}
