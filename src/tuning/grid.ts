import { ConfigurationError } from "../common/errors.js";
import { compareCodeUnits } from "../data/dataset.js";
import type {
  HyperparameterGrid,
  HyperparameterPoint,
  HyperparameterValue,
  TieBreakRule,
} from "../types.js";

/** Canonical identity of a point: its entries sorted by name, as JSON. */
export function pointKey(point: HyperparameterPoint): string {
  const entries = Object.keys(point)
    .sort(compareCodeUnits)
    .map((name) => [name, point[name]]);
  return JSON.stringify(entries);
}

function freezePoint(point: HyperparameterPoint): HyperparameterPoint {
  const out: Record<string, HyperparameterValue> = {};
  for (const name of Object.keys(point).sort(compareCodeUnits)) {
    out[name] = point[name];
  }
  return Object.freeze(out);
}

export function expandGrid(grid: HyperparameterGrid): HyperparameterPoint[] {
  let points: HyperparameterPoint[];
  if (Array.isArray(grid)) {
    points = grid.map(freezePoint);
  } else {
    const names = Object.keys(grid.axes).sort(compareCodeUnits);
    for (const name of names) {
      if (grid.axes[name].length === 0) {
        throw new ConfigurationError(`Grid axis "${name}" has no values.`);
      }
    }
    let partial: Array<Record<string, HyperparameterValue>> = [{}];
    for (const name of names) {
      const next: Array<Record<string, HyperparameterValue>> = [];
      for (const base of partial) {
        for (const value of grid.axes[name]) {
          next.push({ ...base, [name]: value });
        }
      }
      partial = next;
    }
    points = partial.map(freezePoint);
  }

  if (points.length === 0) {
    throw new ConfigurationError("Hyperparameter grid is empty.");
  }
  const seen = new Set<string>();
  for (const point of points) {
    const key = pointKey(point);
    if (seen.has(key)) {
      throw new ConfigurationError(`Hyperparameter grid lists ${key} more than once.`);
    }
    seen.add(key);
  }
  return points;
}

function typeRank(value: HyperparameterValue): number {
  if (typeof value === "boolean") return 0;
  if (typeof value === "number") return 1;
  return 2;
}

function compareValues(a: HyperparameterValue, b: HyperparameterValue): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (typeof a === "number" && typeof b === "number") {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return compareCodeUnits(String(a), String(b));
}

/**
 * Parameter-by-parameter in name order: a missing parameter sorts first, then
 * booleans, numbers (numerically) and strings (by code unit).
 */
export function comparePointsLexicographic(a: HyperparameterPoint, b: HyperparameterPoint): number {
  const names = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort(compareCodeUnits);
  for (const name of names) {
    const hasA = Object.hasOwn(a, name);
    const hasB = Object.hasOwn(b, name);
    if (hasA !== hasB) {
      return hasA ? 1 : -1;
    }
    const diff = compareValues(a[name], b[name]);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export function comparePoints(
  a: HyperparameterPoint,
  b: HyperparameterPoint,
  rule: TieBreakRule,
): number {
  if (rule === "fewestParameters") {
    const sizeDiff = Object.keys(a).length - Object.keys(b).length;
    if (sizeDiff !== 0) {
      return sizeDiff;
    }
  }
  return comparePointsLexicographic(a, b);
}

export function formatPoint(point: HyperparameterPoint): string {
  const names = Object.keys(point).sort(compareCodeUnits);
  if (names.length === 0) {
    return "{}";
  }
  return names.map((name) => `${name}=${String(point[name])}`).join(", ");
}
