// src/util/constraints.ts

export type RangeBound = {
  column: string;
  min?: number;
  max?: number;
  minInclusive?: boolean;
  maxInclusive?: boolean;
};

export type AllowedValues = {
  column: string;
  values: string[];
};

export type ParsedCheckConstraint = {
  ranges: RangeBound[];
  allowed: AllowedValues[];
  raw: string;
};

/**
 * Parse a check constraint expression to extract useful constraints.
 * Handles common patterns like:
 * - (column >= 1 AND column <= 90)
 * - (column > 0)
 * - (column BETWEEN 1 AND 5)
 * - (status IN ('active', 'inactive'))
 *
 * and the forms PostgreSQL renders them in, with casts and `= ANY (ARRAY[...])`:
 * - (price > (0)::numeric)
 * - ((status)::text = ANY ((ARRAY['active'::character varying])::text[]))
 */
export function parseCheckConstraint(expression: string): ParsedCheckConstraint {
  const ranges: RangeBound[] = [];
  const allowed: AllowedValues[] = [];

  const boundFor = (column: string): RangeBound => {
    let bound = ranges.find((r) => r.column === column);
    if (!bound) {
      bound = { column };
      ranges.push(bound);
    }
    return bound;
  };

  for (const part of splitByAnd(stripParens(stripCasts(expression)))) {
    const trimmed = stripParens(part);

    // column BETWEEN a AND b arrives split in two parts; rejoined below
    const betweenMatch = trimmed.match(
      /^([a-z_][a-z0-9_]*)\s+between\s+'?(-?\d+(?:\.\d+)?)'?\s+and\s+'?(-?\d+(?:\.\d+)?)'?$/i,
    );
    if (betweenMatch) {
      const [, column, lo, hi] = betweenMatch;
      const bound = boundFor(column!);
      bound.min = parseFloat(lo!);
      bound.max = parseFloat(hi!);
      bound.minInclusive = true;
      bound.maxInclusive = true;
      continue;
    }

    // column op value
    const rangeMatch = trimmed.match(
      /^([a-z_][a-z0-9_]*)\s*(>=|<=|>|<|=)\s*'?(-?\d+(?:\.\d+)?)'?$/i,
    );
    if (rangeMatch) {
      const [, column, operator, valueStr] = rangeMatch;
      const value = parseFloat(valueStr!);
      const bound = boundFor(column!);

      switch (operator) {
        case ">=":
          bound.min = value;
          bound.minInclusive = true;
          break;
        case ">":
          bound.min = value;
          bound.minInclusive = false;
          break;
        case "<=":
          bound.max = value;
          bound.maxInclusive = true;
          break;
        case "<":
          bound.max = value;
          bound.maxInclusive = false;
          break;
        case "=":
          bound.min = value;
          bound.max = value;
          bound.minInclusive = true;
          bound.maxInclusive = true;
          break;
      }
      continue;
    }

    // column IN ('a', 'b'), or column = ANY (ARRAY['a', 'b'])
    const inMatch =
      trimmed.match(/^([a-z_][a-z0-9_]*)\s+in\s*\((.*)\)$/i) ??
      trimmed.match(/^([a-z_][a-z0-9_]*)\s*=\s*any\s*\((.*)\)$/i);
    if (inMatch) {
      const [, column, list] = inMatch;
      const values = [...list!.matchAll(/'((?:[^']|'')*)'/g)].map((m) =>
        m[1]!.replace(/''/g, "'"),
      );
      if (values.length > 0) allowed.push({ column: column!, values });
    }
  }

  return { ranges, allowed, raw: expression };
}

const CAST_TYPE =
  "(?:\"[^\"]+\"|character varying|double precision|time(?:stamp)?(?:\\(\\d+\\))? with(?:out)? time zone|[a-z_][a-z0-9_]*)" +
  "(?:\\(\\d+(?:,\\s*\\d+)?\\))?(?:\\[\\])?";

/**
 * Drop `::type` casts, then unwrap the parentheses they leave around
 * single columns and numbers: `(price)::numeric > (0)::numeric` becomes
 * `price > 0`.
 */
function stripCasts(expression: string): string {
  return expression
    .replace(new RegExp(`::${CAST_TYPE}`, "gi"), "")
    .replace(/(^|[^a-z0-9_])\(([a-z_][a-z0-9_]*|-?\d+(?:\.\d+)?)\)/gi, "$1$2");
}

function stripParens(expression: string): string {
  let expr = expression.trim();
  while (expr.startsWith("(") && expr.endsWith(")") && wrapsWhole(expr)) {
    expr = expr.slice(1, -1).trim();
  }
  return expr;
}

function wrapsWhole(expr: string): boolean {
  let depth = 0;
  for (let i = 0; i < expr.length; i++) {
    if (expr[i] === "(") depth++;
    else if (expr[i] === ")") depth--;
    if (depth === 0 && i < expr.length - 1) return false;
  }
  return true;
}

/**
 * Split expression by AND, respecting parentheses and BETWEEN x AND y.
 */
function splitByAnd(expr: string): string[] {
  const parts: string[] = [];
  let current = "";
  let depth = 0;
  let i = 0;

  while (i < expr.length) {
    const char = expr[i]!;

    if (char === "(") {
      depth++;
      current += char;
    } else if (char === ")") {
      depth--;
      current += char;
    } else if (
      depth === 0 &&
      expr.slice(i, i + 5).toUpperCase() === " AND " &&
      !/\sbetween\s+\S+$/i.test(current)
    ) {
      parts.push(current.trim());
      current = "";
      i += 4; // Skip " AND"
    } else {
      current += char;
    }
    i++;
  }

  if (current.trim()) {
    parts.push(current.trim());
  }

  return parts;
}

/**
 * Narrow [defaultMin, defaultMax] by the bounds parsed for `column`.
 * Exclusive bounds move to the next multiple of `step` inside them.
 */
export function applyRangeBounds(
  column: string,
  bounds: RangeBound[],
  defaultMin: number,
  defaultMax: number,
  step = 1,
): { min: number; max: number } {
  const bound = bounds.find((b) => b.column === column);
  if (!bound) {
    return { min: defaultMin, max: defaultMax };
  }

  let min = defaultMin;
  let max = defaultMax;

  if (bound.min !== undefined) {
    min = bound.minInclusive ? bound.min : onStep(Math.floor(stepsIn(bound.min, step)) + 1, step);
  }

  if (bound.max !== undefined) {
    max = bound.maxInclusive ? bound.max : onStep(Math.ceil(stepsIn(bound.max, step)) - 1, step);
  }

  return { min, max };
}

/** `value / step`, snapped to a whole number when float error is all that separates them. */
function stepsIn(value: number, step: number): number {
  const steps = value / step;
  const whole = Math.round(steps);
  return Math.abs(steps - whole) < 1e-9 ? whole : steps;
}

function onStep(steps: number, step: number): number {
  return Number((steps * step).toFixed(12));
}
