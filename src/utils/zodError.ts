// src/utils/zodError.ts
import type { ZodError, ZodIssue } from "zod";
import type { Violation } from "./errors";

function joinPath(prefix: ReadonlyArray<string | number>, path: ReadonlyArray<string | number>) {
  return [...prefix, ...path].join(".") || "(root)";
}

export function simplifyIssue(
  i: ZodIssue,
  prefix: ReadonlyArray<string | number> = []
): Violation {
  return {
    code: i.code,
    path: joinPath(prefix, i.path),
    message: i.message,
  };
}

/** Flatten a ZodError into one violation per issue, optionally rooted under `prefix`. */
export function formatZodError(
  err: ZodError,
  prefix: ReadonlyArray<string | number> = []
): Violation[] {
  return err.issues.flatMap((i) =>
    i.code === "invalid_union"
      ? i.unionErrors.flatMap((e) => formatZodError(e, prefix))
      : [simplifyIssue(i, prefix)]
  );
}
