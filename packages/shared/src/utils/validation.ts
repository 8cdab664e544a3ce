/**
 * Zod validation helpers.
 */

import { z, type ZodType, type ZodError } from "zod";
import type { ToolParameterSchema } from "@ferryman/sdk";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: formatZodError(result.error),
  };
}

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

function withDescription(
  json: Record<string, unknown>,
  description: string | undefined,
): Record<string, unknown> {
  return description ? { ...json, description } : json;
}

/** Convert a Zod schema to JSON Schema (simplified). */
export function zodToJsonSchema(schema: ZodType): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, ZodType> = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return withDescription({ type: "object", properties, required }, schema.description);
  }

  if (schema instanceof z.ZodString) {
    return withDescription({ type: "string" }, schema.description);
  }
  if (schema instanceof z.ZodNumber) {
    return withDescription({ type: schema.isInt ? "integer" : "number" }, schema.description);
  }
  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: "boolean" }, schema.description);
  }
  if (schema instanceof z.ZodArray) {
    return withDescription(
      { type: "array", items: zodToJsonSchema(schema.element) },
      schema.description,
    );
  }
  if (schema instanceof z.ZodEnum) {
    return withDescription({ type: "string", enum: schema.options }, schema.description);
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    const inner = zodToJsonSchema(schema.unwrap());
    return schema.description ? { ...inner, description: schema.description } : inner;
  }
  if (schema instanceof z.ZodDefault) {
    const inner = zodToJsonSchema(schema.removeDefault());
    return schema.description ? { ...inner, description: schema.description } : inner;
  }

  // Fallback
  return withDescription({ type: "string" }, schema.description);
}

/**
 * Tool parameter schema for a Zod object. Always carries a `required`
 * array, which some providers insist on.
 */
export function toParameterSchema(schema: z.AnyZodObject): ToolParameterSchema {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];
  const shape: Record<string, ZodType> = schema.shape;
  for (const [key, value] of Object.entries(shape)) {
    properties[key] = zodToJsonSchema(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }
  return { type: "object", properties, required };
}
