import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { SchemaObject } from "ajv";
import { getSchemaDir } from "../paths";
import { describeError } from "../errors";

export type ValidationOutcome = { valid: boolean; errors: string[] };

let ajv: Ajv2020 | null = null;

function loadSchemas(schemaDir: string): Map<string, SchemaObject> {
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  const schemas = new Map<string, SchemaObject>();
  for (const file of schemaFiles) {
    const schemaPath = path.join(schemaDir, file);
    const schema = JSON.parse(fs.readFileSync(schemaPath, "utf-8")) as SchemaObject;
    if (!schema.$id) {
      schema.$id = file;
    }
    schemas.set(file, schema);
  }
  return schemas;
}

function getValidator(): Ajv2020 {
  if (ajv) {
    return ajv;
  }
  const instance = new Ajv2020({ allErrors: true, allowUnionTypes: true });
  for (const schema of loadSchemas(getSchemaDir()).values()) {
    instance.addSchema(schema, schema.$id);
  }
  ajv = instance;
  return instance;
}

export function validateJson(schemaFile: string, data: unknown): ValidationOutcome {
  let validator: Ajv2020;
  try {
    validator = getValidator();
  } catch (error) {
    return { valid: false, errors: [`Schema load failed: ${describeError(error)}`] };
  }
  const validate = validator.getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath} ${error.message}`.trim());
  return { valid: Boolean(valid), errors };
}

/** Type guard backed by a schema from the schemas directory. */
export function conformsTo<T>(schemaFile: string, data: unknown): data is T {
  return validateJson(schemaFile, data).valid;
}
