import type { ZodIssue } from "zod";
import { MAX_SIDE } from "./life.shared";

export class InvalidDimensionsError extends Error {
  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    super(
      `Universe dimensions must be integers from 1 to ${MAX_SIDE}, got ${width}x${height}`,
    );
    this.name = "InvalidDimensionsError";
  }
}

export class InvalidConfigError extends Error {
  constructor(readonly issues: ZodIssue[]) {
    super(
      `Invalid universe config: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );
    this.name = "InvalidConfigError";
  }
}
