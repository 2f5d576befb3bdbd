import { evaluate } from "mathjs";
import { errorMessage } from "./errors";

export type CalculationResult =
  | { ok: true; expression: string; result: number }
  | { ok: false; expression: string; error: string };

/** Arithmetic for discount maths, e.g. `504 * (1 - 15/100)`. */
export function calculate(expression: string): CalculationResult {
  const trimmed = expression.trim();
  if (!trimmed) return { ok: false, expression, error: "Empty expression" };

  let value: unknown;
  try {
    value = evaluate(trimmed);
  } catch (err) {
    return { ok: false, expression, error: errorMessage(err) };
  }

  if (typeof value !== "number" || !Number.isFinite(value)) {
    return { ok: false, expression, error: "Expression did not produce a finite number" };
  }

  // Round away float noise such as 428.40000000000003.
  const result = Math.round(value * 1e10) / 1e10;
  return { ok: true, expression, result };
}
