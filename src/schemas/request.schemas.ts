import { z } from "zod";
import { parseFlag } from "../config/config";
import { SyncConstants } from "../constants/PlateFieldMapping";

/**
 * "7,abc,9" -> [7, 9]. Tokens that are not plain digit strings are
 * dropped, as are zero and repeats.
 */
export const parseSelectedIds = (raw: string): number[] => {
  const ids = raw
    .split(",")
    .map((token) => token.trim())
    .filter((token) => /^\d+$/.test(token))
    .map(Number)
    .filter((id) => Number.isSafeInteger(id) && id > 0);

  return [...new Set(ids)];
};

const asText = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(String).join(",");
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return value;
};

const emptyAsMissing = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export const SEND_PLATES_PARAMS = ["entity_type", "selected_ids", "debug"] as const;

export const sendPlatesSchema = z.object({
  entity_type: z.preprocess(
    emptyAsMissing,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z][A-Za-z0-9_]*$/, "Invalid entity type")
      .default(SyncConstants.DEFAULT_ENTITY_TYPE),
  ),
  selected_ids: z.preprocess(
    asText,
    z
      .string()
      .default("")
      .transform(parseSelectedIds)
      .pipe(z.array(z.number()).min(1, "No valid IDs provided")),
  ),
  debug: z.preprocess(asText, z.string().optional().transform(parseFlag)),
});

export type SendPlatesParams = z.output<typeof sendPlatesSchema>;
