import { readFileSync } from "fs";

import Ajv2020, { type AnySchema, type ErrorObject } from "ajv/dist/2020";

export type SchemaIssue = {
  instancePath: string;
  message?: string;
};

export type SchemaValidator = ((value: unknown) => boolean) & {
  errors: readonly SchemaIssue[];
};

function toSchemaIssue(error: ErrorObject<string, Record<string, unknown>, unknown>): SchemaIssue {
  return {
    instancePath: error.instancePath,
    message: error.message,
  };
}

export function buildSchemaValidator(schema: AnySchema): SchemaValidator {
  const ajv = new Ajv2020({
    allErrors: true,
    strict: true,
  });
  const validate = ajv.compile(schema);
  const errors: readonly SchemaIssue[] = [];

  const wrapped: SchemaValidator = Object.assign(
    (value: unknown): boolean => {
      const ok = validate(value) as boolean;
      wrapped.errors = (validate.errors ?? []).map(toSchemaIssue);
      return ok;
    },
    { errors }
  );

  return wrapped;
}

export function formatSchemaIssues(issues: readonly SchemaIssue[]): string {
  if (issues.length === 0) return "schema validation failed";
  return issues
    .map((issue) => {
      const message = issue.message ?? "schema validation failed";
      return issue.instancePath ? `${issue.instancePath}: ${message}` : message;
    })
    .join("; ");
}

const validators = new Map<string, SchemaValidator>();

function readSchema(fileName: string): AnySchema {
  const schemaUrl = new URL(`../../schemas/${fileName}`, import.meta.url);
  return JSON.parse(readFileSync(schemaUrl, "utf8")) as AnySchema;
}

/** Validator for a schema under `schemas/`, compiled once per file name. */
export function getSchemaValidator(fileName: string): SchemaValidator {
  const existing = validators.get(fileName);
  if (existing) return existing;
  const created = buildSchemaValidator(readSchema(fileName));
  validators.set(fileName, created);
  return created;
}

export function getMarkerSetValidator(): SchemaValidator {
  return getSchemaValidator("marker-set.schema.json");
}
