import { mongo } from "mongoose";
import { ApiError } from "../errors.js";
import type { ObjectId, StoredDocument } from "../db/types.js";

export type SerializedDocument = { id: string } & Record<string, unknown>;

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/**
 * Replaces the storage `_id` with a string `id`. Every other field is passed
 * through as stored.
 */
export function serializeDocument(doc: StoredDocument): SerializedDocument {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id.toHexString() };
}

/**
 * Converts a wire identifier to an ObjectId. Only the 24-hex-character form is
 * accepted.
 */
export function parseObjectId(value: string): ObjectId {
  if (!OBJECT_ID_PATTERN.test(value)) {
    throw new ApiError("InvalidInput", "Invalid workout id");
  }
  return new mongo.ObjectId(value);
}
