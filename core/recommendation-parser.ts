import { ParseError, UnknownIntentError } from "./errors.js";
import { ACTION_TAG, INTENT_SHAPES, MAX_VALUE_LENGTH, isIntentKind, type IntentShape } from "./grammar.js";
import type { ActionIntent } from "./types.js";

export interface ParsedRecommendation {
  intent: ActionIntent;
  candidateLines: number;
  /** Candidate lines other than the one used. Never merged into the intent. */
  ignoredLines: string[];
}

const KIND = /^[A-Za-z][A-Za-z0-9_]*$/;
const PAIR = /^([a-z_]+)=(?:"([^"\\\u0000-\u001f]*)"|([A-Za-z0-9._:+-]+))(?=\s|$)/;
const SLUG = /^[a-z0-9_]{1,64}$/;
const DIGITS = /^\d{1,10}$/;

function readPairs(input: string, line: string): Map<string, string> {
  const values = new Map<string, string>();
  let rest = input;
  while (rest.length) {
    const gap = rest.match(/^\s+/);
    if (!gap) throw new ParseError(`Expected whitespace before: ${rest.slice(0, 32)}`, line);
    rest = rest.slice(gap[0].length);
    if (!rest) break;

    const m = PAIR.exec(rest);
    if (!m) throw new ParseError(`Malformed field near: ${rest.slice(0, 32)}`, line);
    const key = m[1];
    const value = m[2] !== undefined ? m[2] : m[3];
    if (!value || value.length > MAX_VALUE_LENGTH) {
      throw new ParseError(`Field ${key} must be 1-${MAX_VALUE_LENGTH} characters`, line);
    }
    if (values.has(key)) throw new ParseError(`Duplicate field: ${key}`, line);
    values.set(key, value);
    rest = rest.slice(m[0].length);
  }
  return values;
}

function fieldValue(shape: IntentShape, values: Map<string, string>, key: string, line: string): string | number | undefined {
  const raw = values.get(key);
  if (raw === undefined) return undefined;
  const { rule } = shape.fields[key];

  if (rule.type === "int") {
    if (!DIGITS.test(raw)) throw new ParseError(`${key} must be a non-negative integer, got "${raw}"`, line);
    const n = Number(raw);
    if (n < rule.min || n > rule.max) {
      throw new ParseError(`${key} must be between ${rule.min} and ${rule.max}, got ${n}`, line);
    }
    return n;
  }
  if (rule.type === "slug") {
    const slug = raw.toLowerCase();
    if (!SLUG.test(slug)) throw new ParseError(`${key} must be snake_case, got "${raw}"`, line);
    return slug;
  }
  return raw;
}

function intValue(shape: IntentShape, values: Map<string, string>, key: string, line: string): number | undefined {
  const value = fieldValue(shape, values, key, line);
  if (typeof value === "string") throw new ParseError(`${key} must be numeric`, line);
  return value;
}

function textValue(shape: IntentShape, values: Map<string, string>, key: string, line: string): string | undefined {
  const value = fieldValue(shape, values, key, line);
  if (typeof value === "number") throw new ParseError(`${key} must be text`, line);
  return value;
}

/**
 * Parses one `ACTION=` line. Throws ParseError or UnknownIntentError; never
 * fills in a default for a required field.
 */
export function parseIntentLine(input: string): ActionIntent {
  const line = input.trim();
  if (!line.startsWith(ACTION_TAG)) throw new ParseError(`Line must start with ${ACTION_TAG}`, line);
  const body = line.slice(ACTION_TAG.length);
  const tag = body.split(/\s/, 1)[0];

  if (!tag) throw new ParseError(`Missing action kind after ${ACTION_TAG}`, line);
  if (!KIND.test(tag)) throw new ParseError(`Malformed action kind: ${tag}`, line);
  if (!isIntentKind(tag)) throw new UnknownIntentError(tag, line);

  const shape = INTENT_SHAPES[tag];
  const values = readPairs(body.slice(tag.length), line);
  for (const key of values.keys()) {
    if (!Object.prototype.hasOwnProperty.call(shape.fields, key)) {
      throw new ParseError(`Unexpected field "${key}" for ${tag}`, line);
    }
  }
  for (const [key, spec] of Object.entries(shape.fields)) {
    if (spec.required && !values.has(key)) throw new ParseError(`Missing required field "${key}" for ${tag}`, line);
  }

  switch (tag) {
    case "ReportStatus":
      return { kind: "ReportStatus" };
    case "ListTopProcesses":
      return { kind: "ListTopProcesses", count: intValue(shape, values, "count", line) ?? 0 };
    case "SetPowerPlan":
      return { kind: "SetPowerPlan", plan: textValue(shape, values, "plan", line) ?? "" };
    case "NoAction":
      return { kind: "NoAction", reason: textValue(shape, values, "reason", line) ?? "unspecified" };
    case "TerminateProcess": {
      const pid = intValue(shape, values, "pid", line);
      const name = textValue(shape, values, "target", line);
      const reason = textValue(shape, values, "reason", line) ?? "unspecified";
      if (pid !== undefined && name !== undefined) {
        throw new ParseError("TerminateProcess takes either pid or target, not both", line);
      }
      if (pid !== undefined) return { kind: "TerminateProcess", pid, reason };
      if (name !== undefined) return { kind: "TerminateProcess", name, reason };
      throw new ParseError("TerminateProcess requires pid or target", line);
    }
  }
}

/**
 * Converts raw model text into an intent. Text without any `ACTION=` line is
 * treated as conversation and resolves to NoAction. When several candidate
 * lines exist the first well-formed one wins; if none is well-formed the
 * first candidate's error is thrown.
 */
export function parseRecommendation(raw: string): ParsedRecommendation {
  const candidates = String(raw || "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith(ACTION_TAG));

  if (!candidates.length) {
    return { intent: { kind: "NoAction", reason: "no_tag" }, candidateLines: 0, ignoredLines: [] };
  }

  const errors: Array<ParseError | UnknownIntentError> = [];
  for (let i = 0; i < candidates.length; i += 1) {
    let intent: ActionIntent;
    try {
      intent = parseIntentLine(candidates[i]);
    } catch (err) {
      if (err instanceof ParseError || err instanceof UnknownIntentError) {
        errors.push(err);
        continue;
      }
      throw err;
    }
    return {
      intent,
      candidateLines: candidates.length,
      ignoredLines: candidates.filter((_, j) => j !== i)
    };
  }
  throw errors[0];
}
