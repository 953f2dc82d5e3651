/**
 * filters.ts - Metadata and content filters for vector queries
 *
 * What this file does:
 * Parses Chroma-style `where` and `whereDocument` objects into a small
 * expression tree, and evaluates that tree against a stored document.
 *
 * Why parse first?
 * Filters arrive from the request layer as plain objects. Parsing them up
 * front means a typo like `{ year: { $gtt: 2020 } }` is rejected before
 * any embedding work is done, and the evaluator only deals with shapes it
 * knows.
 *
 * Supported syntax:
 *   where:          { key: value }                      equality
 *                   { key: { $eq | $ne: value } }
 *                   { key: { $gt | $gte | $lt | $lte: number } }
 *                   { key: { $in | $nin: [values] } }
 *                   { $and: [where, ...] }, { $or: [where, ...] }
 *   whereDocument:  { $contains | $not_contains: text }
 *                   { $regex | $not_regex: pattern }
 *                   { $and: [...] }, { $or: [...] }
 *
 * Several keys in one object are and-ed together. A document that lacks a
 * filtered key never matches that condition, whatever the operator.
 */

import { z } from "zod";
import { DocumentValidationError } from "../errors";
import type { Metadata, MetadataValue } from "./types";

const finiteNumber = z.number().finite();
const scalarSchema = z.union([z.string(), finiteNumber, z.boolean()]);

/**
 * One operator object per field condition, each normalised to
 * `{ op, value }` so the evaluator can switch on `op`.
 */
const fieldOperatorSchema = z.union([
  z.object({ $eq: scalarSchema }).strict().transform((o) => ({ op: "$eq" as const, value: o.$eq })),
  z.object({ $ne: scalarSchema }).strict().transform((o) => ({ op: "$ne" as const, value: o.$ne })),
  z.object({ $gt: finiteNumber }).strict().transform((o) => ({ op: "$gt" as const, value: o.$gt })),
  z.object({ $gte: finiteNumber }).strict().transform((o) => ({ op: "$gte" as const, value: o.$gte })),
  z.object({ $lt: finiteNumber }).strict().transform((o) => ({ op: "$lt" as const, value: o.$lt })),
  z.object({ $lte: finiteNumber }).strict().transform((o) => ({ op: "$lte" as const, value: o.$lte })),
  z.object({ $in: z.array(scalarSchema) }).strict().transform((o) => ({ op: "$in" as const, value: o.$in })),
  z.object({ $nin: z.array(scalarSchema) }).strict().transform((o) => ({ op: "$nin" as const, value: o.$nin })),
]);

type FieldCondition = z.infer<typeof fieldOperatorSchema>;

export type WhereExpression =
  | { kind: "and" | "or"; clauses: WhereExpression[] }
  | { kind: "field"; key: string; condition: FieldCondition };

export type DocumentExpression =
  | { kind: "and" | "or"; clauses: DocumentExpression[] }
  | { kind: "contains" | "not_contains"; text: string }
  | { kind: "regex" | "not_regex"; pattern: RegExp };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string, filter: unknown): DocumentValidationError {
  return new DocumentValidationError(`Invalid filter: ${message}`, { filter });
}

/**
 * Parses a `where` object.
 *
 * @throws DocumentValidationError for unknown operators or malformed values
 */
export function parseWhere(where: unknown): WhereExpression {
  if (!isPlainObject(where)) {
    throw invalid("where must be an object", where);
  }

  const clauses = Object.entries(where).map(([key, value]): WhereExpression => {
    if (key === "$and" || key === "$or") {
      if (!Array.isArray(value) || value.length === 0) {
        throw invalid(`${key} needs a non-empty array`, where);
      }
      return { kind: key === "$and" ? "and" : "or", clauses: value.map(parseWhere) };
    }
    if (key.startsWith("$")) {
      throw invalid(`unknown operator ${key}`, where);
    }

    const scalar = scalarSchema.safeParse(value);
    if (scalar.success) {
      return { kind: "field", key, condition: { op: "$eq", value: scalar.data } };
    }
    const condition = fieldOperatorSchema.safeParse(value);
    if (!condition.success) {
      throw invalid(`unsupported condition on "${key}"`, where);
    }
    return { kind: "field", key, condition: condition.data };
  });

  return clauses.length === 1 && clauses[0] ? clauses[0] : { kind: "and", clauses };
}

/**
 * Parses a `whereDocument` object.
 *
 * @throws DocumentValidationError for unknown operators, non-string
 *   operands or invalid regular expressions
 */
export function parseWhereDocument(whereDocument: unknown): DocumentExpression {
  if (!isPlainObject(whereDocument)) {
    throw invalid("whereDocument must be an object", whereDocument);
  }

  const clauses = Object.entries(whereDocument).map(([key, value]): DocumentExpression => {
    switch (key) {
      case "$and":
      case "$or":
        if (!Array.isArray(value) || value.length === 0) {
          throw invalid(`${key} needs a non-empty array`, whereDocument);
        }
        return { kind: key === "$and" ? "and" : "or", clauses: value.map(parseWhereDocument) };
      case "$contains":
      case "$not_contains":
        if (typeof value !== "string") {
          throw invalid(`${key} needs a string`, whereDocument);
        }
        return { kind: key === "$contains" ? "contains" : "not_contains", text: value };
      case "$regex":
      case "$not_regex":
        if (typeof value !== "string") {
          throw invalid(`${key} needs a string`, whereDocument);
        }
        try {
          return { kind: key === "$regex" ? "regex" : "not_regex", pattern: new RegExp(value) };
        } catch (error) {
          throw invalid(`${key} is not a valid pattern (${String(error)})`, whereDocument);
        }
      default:
        throw invalid(`unknown operator ${key}`, whereDocument);
    }
  });

  return clauses.length === 1 && clauses[0] ? clauses[0] : { kind: "and", clauses };
}

export function matchesWhere(metadata: Metadata, expression: WhereExpression): boolean {
  switch (expression.kind) {
    case "and":
      return expression.clauses.every((clause) => matchesWhere(metadata, clause));
    case "or":
      return expression.clauses.some((clause) => matchesWhere(metadata, clause));
    case "field":
      if (!Object.prototype.hasOwnProperty.call(metadata, expression.key)) return false;
      return matchesCondition(metadata[expression.key], expression.condition);
  }
}

function matchesCondition(value: MetadataValue, condition: FieldCondition): boolean {
  switch (condition.op) {
    case "$eq":
      return value === condition.value;
    case "$ne":
      return value !== condition.value;
    case "$gt":
      return typeof value === "number" && value > condition.value;
    case "$gte":
      return typeof value === "number" && value >= condition.value;
    case "$lt":
      return typeof value === "number" && value < condition.value;
    case "$lte":
      return typeof value === "number" && value <= condition.value;
    case "$in":
      return condition.value.includes(value);
    case "$nin":
      return !condition.value.includes(value);
  }
}

export function matchesWhereDocument(text: string, expression: DocumentExpression): boolean {
  switch (expression.kind) {
    case "and":
      return expression.clauses.every((clause) => matchesWhereDocument(text, clause));
    case "or":
      return expression.clauses.some((clause) => matchesWhereDocument(text, clause));
    case "contains":
      return text.includes(expression.text);
    case "not_contains":
      return !text.includes(expression.text);
    case "regex":
      return expression.pattern.test(text);
    case "not_regex":
      return !expression.pattern.test(text);
  }
}
