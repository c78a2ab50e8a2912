import { z } from "zod";
import type { ZodError } from "zod";
import type { FieldIssue } from "../errors.js";

export const workoutCreateSchema = z.object({
  title: z.string(),
  sets: z.number().int(),
  reps: z.number().int(),
  day: z.string(),
  notes: z.string().nullable().optional(),
  completed: z.boolean().nullable().optional(),
});

/**
 * Every field optional. Keys absent from the input are absent from the parsed
 * result, so the output lists exactly the fields the client sent. Only the
 * optional fields accept an explicit null.
 */
export const workoutUpdateSchema = workoutCreateSchema.partial();

export const workoutListQuerySchema = z.object({
  day: z.string().optional(),
});

export type WorkoutCreate = z.infer<typeof workoutCreateSchema>;
export type WorkoutUpdate = z.infer<typeof workoutUpdateSchema>;

export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
