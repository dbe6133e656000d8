import { Request } from "express";
import { z, ZodTypeAny } from "zod";
import { ValidationError } from "../errors/sync.errors";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPresent = (value: unknown): boolean =>
  value !== undefined && value !== null && value !== "";

/**
 * Picks `keys` from the query string, falling back to the form or JSON
 * body for keys the query leaves empty.
 */
export const collectParams = (
  req: Pick<Request, "query" | "body">,
  keys: readonly string[],
): Record<string, unknown> => {
  const query: Record<string, unknown> = isRecord(req.query) ? req.query : {};
  const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
  const params: Record<string, unknown> = {};

  for (const key of keys) {
    const value = isPresent(query[key]) ? query[key] : body[key];
    if (value !== undefined) {
      params[key] = value;
    }
  }

  return params;
};

export const parseWith = <T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));

    throw new ValidationError(details[0]?.message ?? "Validation failed", details);
  }

  return result.data;
};
