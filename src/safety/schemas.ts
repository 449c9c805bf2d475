import { z } from "zod";
import { validationError } from "../client/errors.js";

/**
 * Request contracts checked before anything reaches the executor. Only
 * `batch` and `event.offline.get` carry parameter schemas; every other
 * method accepts an open parameter map.
 */

export const MethodNameSchema = z
  .string()
  .min(3)
  .regex(/^[a-z0-9_]+(?:\.[a-z0-9_]+)*$/, "invalid method name");

export const GenericParamsSchema = z.record(z.unknown());

export const BatchParamsSchema = z
  .object({
    cmd: z
      .record(z.string({ invalid_type_error: "command must be a string" }))
      .refine((cmd) => Object.keys(cmd).length >= 1, "cmd needs at least 1 command")
      .refine((cmd) => Object.keys(cmd).length <= 50, "cmd allows at most 50 commands"),
    halt: z.union([z.boolean(), z.literal(0), z.literal(1)]).optional(),
  })
  .passthrough();

export const OfflineGetParamsSchema = z
  .object({
    clear: z
      .union([z.literal(0), z.literal(1), z.literal("0"), z.literal("1")])
      .optional(),
  })
  .passthrough();

export type BatchParams = z.infer<typeof BatchParamsSchema>;
export type OfflineGetParams = z.infer<typeof OfflineGetParamsSchema>;

function formatIssues(prefix: string, error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = [prefix, ...issue.path.map(String)].join(".");
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/** Throws a validation `ApiError` naming the first failing field path. */
export function validateMethodAndParams(
  method: string,
  params: unknown,
): void {
  const name = MethodNameSchema.safeParse(method);
  if (!name.success) {
    throw validationError("INVALID_METHOD", formatIssues("method", name.error));
  }

  const generic = GenericParamsSchema.safeParse(params);
  if (!generic.success) {
    throw validationError("INVALID_PARAMS", formatIssues("params", generic.error));
  }

  const specific =
    method === "batch"
      ? BatchParamsSchema.safeParse(params)
      : method === "event.offline.get"
        ? OfflineGetParamsSchema.safeParse(params)
        : null;
  if (specific && !specific.success) {
    throw validationError("INVALID_PARAMS", formatIssues("params", specific.error));
  }
}
