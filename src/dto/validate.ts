import { ClassConstructor, plainToInstance } from "class-transformer";
import { ValidationError, validateSync } from "class-validator";
import Decimal from "decimal.js";

export type Validated<T> =
  | { ok: true; value: T }
  | { ok: false; problems: string[] };

/**
 * `@Transform` callback for numeric JSON fields read as strings. Numbers are
 * written out in plain notation, so `1e-7` becomes "0.0000001".
 */
export const numberToString = ({ value }: { value: unknown }): unknown =>
  typeof value === "number" ? new Decimal(value).toFixed() : value;

const describe = (errors: ValidationError[], prefix = ""): string[] =>
  errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...describe(error.children ?? [], path)];
  });

/** Transforms a plain JSON object into a DTO and runs its validators */
export function validatePlain<T extends object>(
  cls: ClassConstructor<T>,
  raw: unknown,
): Validated<T> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, problems: ["expected a JSON object"] };
  }
  const value = plainToInstance(cls, raw);
  const problems = describe(validateSync(value));
  return problems.length > 0 ? { ok: false, problems } : { ok: true, value };
}
