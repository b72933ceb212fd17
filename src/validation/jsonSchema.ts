import { existsSync, promises as fs } from "fs";
import path from "path";
import Ajv, { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

// Sources live two levels under the repo root; the build output three.
export function schemasDir(): string {
  const candidates = [
    path.resolve(__dirname, "..", "..", "schemas"),
    path.resolve(__dirname, "..", "..", "..", "schemas")
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

export async function loadJsonSchema(schemaPath: string): Promise<SchemaObject> {
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  return JSON.parse(content) as SchemaObject;
}

export async function loadSchemaValidator<T>(schemaPath: string): Promise<ValidateFunction<T>> {
  const schema = await loadJsonSchema(schemaPath);
  return ajv.compile<T>(schema);
}

export function assertValidSchema<T>(
  validator: ValidateFunction<T>,
  data: unknown,
  label: string
): asserts data is T {
  const valid = validator(data);
  if (valid) return;
  const errors = (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
