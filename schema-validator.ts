/**
 * @file schema-validator.ts
 * @description Static compatibility checks between the zod schemas of data nodes that a
 * sub-dispatcher binds together, and human-readable schema descriptions.
 */

import {z} from "zod";

/**
 * Result of schema validation
 */
export type ValidationResult = {
  /**
   * Whether values accepted by the source schema are accepted by the target schema
   */
  compatible: boolean;
  warnings: string[];
  errors: string[];
};

/**
 * Structural summary of a schema
 */
export type SchemaInfo = {
  /**
   * Base type: string, number, boolean, date, array, object, union, enum, literal, any, unknown…
   */
  type: string;
  optional: boolean;
  nullable: boolean;
  properties?: Record<string, SchemaInfo>;
  element?: SchemaInfo;
  union?: SchemaInfo[];
  enum?: readonly string[];
  literal?: unknown;
};

/**
 * Extracts the structural summary of a zod schema.
 */
export function extractSchemaInfo(schema: z.ZodTypeAny): SchemaInfo {
  const base = {optional: false, nullable: false};

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
    const inner: z.ZodTypeAny = schema instanceof z.ZodOptional ? schema.unwrap() : schema.removeDefault();
    return {...extractSchemaInfo(inner), optional: true};
  }
  if (schema instanceof z.ZodNullable) {
    return {...extractSchemaInfo(schema.unwrap()), nullable: true};
  }
  if (schema instanceof z.ZodEffects) {
    return extractSchemaInfo(schema.innerType());
  }

  if (schema instanceof z.ZodString) return {type: "string", ...base};
  if (schema instanceof z.ZodNumber) return {type: "number", ...base};
  if (schema instanceof z.ZodBoolean) return {type: "boolean", ...base};
  if (schema instanceof z.ZodDate) return {type: "date", ...base};
  if (schema instanceof z.ZodAny) return {type: "any", ...base};
  if (schema instanceof z.ZodNull) return {type: "null", optional: false, nullable: true};
  if (schema instanceof z.ZodUndefined) return {type: "undefined", optional: true, nullable: false};

  if (schema instanceof z.ZodArray) {
    return {type: "array", ...base, element: extractSchemaInfo(schema.element)};
  }
  if (schema instanceof z.ZodObject) {
    const properties: Record<string, SchemaInfo> = {};
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = extractSchemaInfo(value);
    }
    return {type: "object", ...base, properties};
  }
  if (schema instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    return {type: "union", ...base, union: options.map(extractSchemaInfo)};
  }
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return {type: "enum", ...base, enum: values};
  }
  if (schema instanceof z.ZodLiteral) {
    return {type: "literal", ...base, literal: schema.value};
  }

  return {type: "unknown", ...base};
}

/**
 * Checks if two basic types are compatible
 */
function areBasicTypesCompatible(sourceType: string, targetType: string): boolean {
  if ([sourceType, targetType].some((type) => type === "any" || type === "unknown")) {
    return true;
  }
  if (sourceType === targetType) {
    return true;
  }
  // literal and enum values are strings or numbers at run time
  if (sourceType === "literal" || sourceType === "enum") {
    return ["string", "number", "literal", "enum"].includes(targetType);
  }
  return false;
}

function merge(into: ValidationResult, from: ValidationResult): void {
  into.warnings.push(...from.warnings);
  into.errors.push(...from.errors);
  if (!from.compatible) {
    into.compatible = false;
  }
}

/**
 * Validates that values of `source` are accepted by `target`.
 */
export function validateSchemaCompatibility(source: SchemaInfo, target: SchemaInfo): ValidationResult {
  const result: ValidationResult = {compatible: true, warnings: [], errors: []};

  if (source.type === "undefined") {
    if (!target.optional) {
      result.errors.push("Source is undefined but target is required");
      result.compatible = false;
    }
    return result;
  }
  if (source.nullable && !target.nullable) {
    result.errors.push("Source can be null but target does not accept null");
    result.compatible = false;
  }
  if (source.optional && !target.optional) {
    result.warnings.push("Source is optional but target is required");
  }

  if (source.type === "union") {
    const options = source.union ?? [];
    const failing = options.filter((option) => !validateSchemaCompatibility(option, target).compatible);
    if (failing.length > 0) {
      result.errors.push(
        `Union options ${failing.map((option) => `'${option.type}'`).join(", ")} are not accepted by target type '${target.type}'`
      );
      result.compatible = false;
    }
    return result;
  }
  if (target.type === "union") {
    const options = target.union ?? [];
    if (!options.some((option) => validateSchemaCompatibility(source, option).compatible)) {
      result.errors.push(`No option of the target union accepts source type '${source.type}'`);
      result.compatible = false;
    }
    return result;
  }

  if (!areBasicTypesCompatible(source.type, target.type)) {
    result.errors.push(`Incompatible types: source type '${source.type}' is not accepted by target type '${target.type}'`);
    result.compatible = false;
    return result;
  }

  if (source.type === "object" && target.type === "object") {
    const sourceProps = source.properties ?? {};
    for (const [key, targetProp] of Object.entries(target.properties ?? {})) {
      const sourceProp = sourceProps[key];
      if (!sourceProp) {
        if (!targetProp.optional) {
          result.errors.push(`Required property '${key}' is not provided by source schema`);
          result.compatible = false;
        }
        continue;
      }
      const propResult = validateSchemaCompatibility(sourceProp, targetProp);
      if (!propResult.compatible) {
        result.errors.push(`Property '${key}' has incompatible types: source is ${sourceProp.type}, target is ${targetProp.type}`);
      }
      merge(result, propResult);
    }
  } else if (source.type === "array" && target.type === "array" && source.element && target.element) {
    merge(result, validateSchemaCompatibility(source.element, target.element));
  } else if (source.type === "enum" && target.type === "enum") {
    const targetValues = target.enum ?? [];
    const missing = (source.enum ?? []).filter((value) => !targetValues.includes(value));
    if (missing.length > 0) {
      result.errors.push(`Enum values ${missing.map((value) => `"${value}"`).join(", ")} are not accepted by target`);
      result.compatible = false;
    }
  } else if (source.type === "literal" && target.type === "literal" && source.literal !== target.literal) {
    result.errors.push(`Literal values don't match: source '${String(source.literal)}' vs target '${String(target.literal)}'`);
    result.compatible = false;
  }

  return result;
}

/**
 * Validates that every value the `source` schema accepts is also accepted by `target`.
 */
export function validateZodTypeCompatibility(source: z.ZodTypeAny, target: z.ZodTypeAny): ValidationResult {
  return validateSchemaCompatibility(extractSchemaInfo(source), extractSchemaInfo(target));
}

/**
 * Formats a schema for display, e.g. `{ speed: number, gear?: number }`.
 */
export function describeSchema(schema: z.ZodTypeAny): string {
  return describeInfo(extractSchemaInfo(schema));
}

function describeInfo(info: SchemaInfo): string {
  let text: string;
  switch (info.type) {
    case "array":
      text = `array of ${info.element ? describeInfo(info.element) : "unknown"}`;
      break;
    case "object":
      text = `{ ${Object.entries(info.properties ?? {})
        .map(([key, prop]) => `${key}${prop.optional ? "?" : ""}: ${describeInfo({...prop, optional: false})}`)
        .join(", ")} }`;
      break;
    case "union":
      text = (info.union ?? []).map(describeInfo).join(" | ");
      break;
    case "enum":
      text = (info.enum ?? []).map((value) => `"${value}"`).join(" | ");
      break;
    case "literal":
      text = JSON.stringify(info.literal) ?? String(info.literal);
      break;
    default:
      text = info.type;
  }
  return info.nullable && info.type !== "null" ? `${text} | null` : text;
}
