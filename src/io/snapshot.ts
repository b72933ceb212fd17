import path from "path";
import { ValidateFunction } from "ajv";
import { RelationTree, RelationTreeSnapshot } from "../types/relationTree";
import { readJson, writeJson } from "../utils/fs";
import { assertValidSchema, loadSchemaValidator, schemasDir } from "../validation/jsonSchema";

let validator: ValidateFunction<RelationTreeSnapshot> | null = null;

async function snapshotValidator(): Promise<ValidateFunction<RelationTreeSnapshot>> {
  if (!validator) {
    validator = await loadSchemaValidator<RelationTreeSnapshot>(
      path.join(schemasDir(), "relation_tree.schema.json")
    );
  }
  return validator;
}

export function toSnapshot(tree: RelationTree): RelationTreeSnapshot {
  return Object.fromEntries(tree);
}

export function fromSnapshot(snapshot: RelationTreeSnapshot): RelationTree {
  return new Map(Object.entries(snapshot));
}

export async function writeSnapshot(filePath: string, tree: RelationTree): Promise<void> {
  await writeJson(filePath, toSnapshot(tree));
}

export async function readSnapshot(filePath: string): Promise<RelationTree> {
  const data = await readJson(filePath);
  assertValidSchema(await snapshotValidator(), data, `Snapshot ${filePath}`);
  return fromSnapshot(data);
}
