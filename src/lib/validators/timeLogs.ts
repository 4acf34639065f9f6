import { z } from "zod";
import { ValidationError } from "../errors";
import { roundCoordinate, roundCurrency } from "../calculations";

const id = z.string().trim().min(1);
const isoDateTime = z.string().datetime({ offset: true });
const minutes = z.number().int().min(0);
const optionalText = z.string().trim().max(5000).nullable().optional();

/** numeric(10,2) */
const rate = z.number().finite().min(0).max(99_999_999.99).transform(roundCurrency);

/** numeric(10,6) */
const latitude = z.number().finite().min(-90).max(90).transform(roundCoordinate);
const longitude = z.number().finite().min(-180).max(180).transform(roundCoordinate);

export const materialEntrySchema = z.object({
  name: z.string().trim().min(1),
  quantity: z.number().finite().min(0),
  unit: z.string().trim().min(1).nullable().default(null),
  unitPrice: z.number().finite().min(0).nullable().default(null),
});

const editableFields = {
  orderId: id,
  endTime: isoDateTime.nullable().optional(),
  breakDurationMinutes: minutes.optional(),
  notes: optionalText,
  hourlyRate: rate.optional(),
  locationLat: latitude.nullable().optional(),
  locationLng: longitude.nullable().optional(),
  photoUrls: z.array(z.string().url()).optional(),
  materialsUsed: z.array(materialEntrySchema).optional(),
  travelTimeMinutes: minutes.optional(),
  workType: optionalText,
  weatherConditions: optionalText,
};

/**
 * Creating a log. `totalAmount`, `isApproved` and the timestamps are
 * system-owned, so strict() rejects them along with any unknown key.
 */
export const timeLogCreateSchema = z
  .object({
    ...editableFields,
    userId: id,
    startTime: isoDateTime,
  })
  .strict();

/** Starting a session: the worker and the start instant come from the caller's context. */
export const sessionStartSchema = timeLogCreateSchema.omit({
  userId: true,
  startTime: true,
  endTime: true,
});

export const sessionStopSchema = z
  .object({
    breakDurationMinutes: minutes.optional(),
    notes: optionalText,
  })
  .strict();

/** Owner edits. userId is fixed for the record's lifetime; approval has its own action. */
export const timeLogUpdateSchema = z
  .object({
    ...editableFields,
    orderId: id.optional(),
    startTime: isoDateTime.optional(),
  })
  .strict();

export const timeLogQuerySchema = z
  .object({
    userId: id.optional(),
    orderId: id.optional(),
    isApproved: z.boolean().optional(),
    from: isoDateTime.optional(),
    to: isoDateTime.optional(),
  })
  .strict();

export type TimeLogCreateInput = z.input<typeof timeLogCreateSchema>;
export type SessionStartInput = z.input<typeof sessionStartSchema>;
export type SessionStopInput = z.input<typeof sessionStopSchema>;
export type TimeLogUpdateInput = z.input<typeof timeLogUpdateSchema>;
export type TimeLogQueryInput = z.input<typeof timeLogQuerySchema>;

/**
 * Parse with a schema, converting zod failures into ValidationError.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`Invalid ${label}: ${summary}`, result.error.issues);
  }

  return result.data;
}
