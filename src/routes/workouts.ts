/**
 * Workout CRUD endpoints under /api/workouts.
 */

import { Router } from "express";
import type { ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../errors.js";
import { asyncHandler } from "../helpers/http-response.js";
import { parseObjectId, serializeDocument } from "../helpers/serialize.js";
import { WORKOUT_COLLECTION, type DocumentFilter, type DocumentStore, type ObjectId } from "../db/types.js";
import {
  toFieldIssues,
  workoutCreateSchema,
  workoutListQuerySchema,
  workoutUpdateSchema,
} from "../schemas/workout.js";

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("ValidationFailed", `Invalid ${what}`, toFieldIssues(result.error));
  }
  return result.data;
}

function workoutIdParam(value: string | undefined): ObjectId {
  return parseObjectId(value ?? "");
}

export function createWorkoutsRouter(store: DocumentStore): Router {
  const router = Router();

  async function fetchWorkout(id: ObjectId) {
    const doc = await store.findDocument(WORKOUT_COLLECTION, id);
    if (!doc) {
      throw new ApiError("NotFound", "Workout not found");
    }
    return serializeDocument(doc);
  }

  router.get("/", asyncHandler(async (req, res) => {
    const { day } = validate(workoutListQuerySchema, req.query, "query");
    const filter: DocumentFilter = day ? { day } : {};
    const docs = await store.getDocuments(WORKOUT_COLLECTION, filter);
    res.json(docs.map(serializeDocument));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const item = validate(workoutCreateSchema, req.body ?? {}, "workout");
    const id = await store.createDocument(WORKOUT_COLLECTION, item);
    res.status(201).json(await fetchWorkout(id));
  }));

  router.patch("/:id", asyncHandler(async (req, res) => {
    const id = workoutIdParam(req.params.id);
    const changes = validate(workoutUpdateSchema, req.body ?? {}, "workout update");
    if (Object.keys(changes).length === 0) {
      throw new ApiError("InvalidInput", "No fields to update");
    }

    const { matchedCount } = await store.updateDocument(WORKOUT_COLLECTION, id, changes);
    if (matchedCount === 0) {
      throw new ApiError("NotFound", "Workout not found");
    }
    res.json(await fetchWorkout(id));
  }));

  router.delete("/:id", asyncHandler(async (req, res) => {
    const id = workoutIdParam(req.params.id);
    const { deletedCount } = await store.deleteDocument(WORKOUT_COLLECTION, id);
    if (deletedCount === 0) {
      throw new ApiError("NotFound", "Workout not found");
    }
    res.status(204).end();
  }));

  return router;
}
