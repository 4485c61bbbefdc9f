import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { ConfigSchema, ParameterSpec, ParameterType, SchemaDescription } from "./protocol.js";

function baseType(type: ParameterType, spec: ParameterSpec): z.ZodTypeAny {
  switch (type) {
    case "string": {
      let s = z.string();
      if (spec.max_length !== undefined) s = s.max(spec.max_length);
      return s;
    }
    case "number":
    case "integer": {
      let n = type === "integer" ? z.number().int() : z.number();
      if (spec.minimum !== undefined) n = n.min(spec.minimum);
      if (spec.maximum !== undefined) n = n.max(spec.maximum);
      return n;
    }
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(spec.items ? baseType(spec.items.type, { ...spec.items, description: "" }) : z.unknown());
    case "object":
      return z.record(z.unknown());
  }
}

function fieldType(spec: ParameterSpec): z.ZodTypeAny {
  const types: readonly ParameterType[] = typeof spec.type === "string" ? [spec.type] : spec.type;
  const [first, second, ...rest] = types.map((t) => baseType(t, spec));
  if (!first) return z.unknown();
  const field = second ? z.union([first, second, ...rest]) : first;
  if (spec.default !== undefined) return field.default(spec.default);
  return spec.required ? field : field.optional();
}

/** Build the zod validator for a declarative parameter schema. */
export function toZodSchema(schema: ConfigSchema) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(schema)) {
    shape[name] = fieldType(spec);
  }
  return z.object(shape).passthrough();
}

/**
 * Validate `values` against `schema`, filling defaults. Every failing
 * field is listed in the thrown ValidationError.
 */
export function validateParameters(
  schema: ConfigSchema,
  values: Record<string, unknown>,
  label = "parameters",
): Record<string, unknown> {
  const parsed = toZodSchema(schema).safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function requiredFields(schema: ConfigSchema): string[] {
  return Object.entries(schema)
    .filter(([, spec]) => spec.required === true)
    .map(([name]) => name);
}

export function describeSchema(
  description: string,
  config: ConfigSchema,
  parameters?: ConfigSchema,
): SchemaDescription {
  return parameters
    ? { description, config, parameters, required: requiredFields(parameters) }
    : { description, config, required: requiredFields(config) };
}
