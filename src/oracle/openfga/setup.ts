import * as fs from "node:fs";
import { OpenFgaClient } from "@openfga/sdk";
import { transformer } from "@openfga/syntax-transformer";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "src/core/errors.ts";
import { parseObjectRef } from "src/core/refs.ts";
import type { RelationshipTuple } from "src/core/types.ts";

export type ModelDefinition = ReturnType<
  typeof transformer.transformDSLToJSONObject
>;

const tupleFileSchema = z.array(
  z.object({
    user: z.string().min(1),
    relation: z.string().min(1),
    object: z.string().min(1),
  }),
);

/** Compile an OpenFGA DSL file into the JSON model the API accepts */
export function loadModel(modelPath: string | URL): ModelDefinition {
  const dsl = fs.readFileSync(modelPath, "utf-8");
  return transformer.transformDSLToJSONObject(dsl);
}

/** Parse a YAML list of `{user, relation, object}` tuples */
export function parseTupleFile(raw: string): RelationshipTuple[] {
  const parsed = tupleFileSchema.safeParse(parseYaml(raw) ?? []);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid tuple file: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`,
    );
  }
  for (const tuple of parsed.data) {
    parseObjectRef(tuple.user);
    parseObjectRef(tuple.object);
  }
  return parsed.data;
}

export interface ProvisionResult {
  storeId: string;
  authorizationModelId: string;
  tuplesWritten: number;
}

/**
 * Create a store, write the model and seed tuples. Intended for local
 * development against a fresh OpenFGA instance.
 */
export async function provisionStore(
  apiUrl: string,
  name: string,
  model: ModelDefinition,
  tuples: RelationshipTuple[] = [],
): Promise<ProvisionResult> {
  const admin = new OpenFgaClient({ apiUrl });
  const store = await admin.createStore({ name });

  const client = new OpenFgaClient({ apiUrl, storeId: store.id });
  const written = await client.writeAuthorizationModel(model);
  const authorizationModelId = written.authorization_model_id;

  if (tuples.length > 0) {
    await client.writeTuples(tuples, { authorizationModelId });
  }

  return {
    storeId: store.id,
    authorizationModelId,
    tuplesWritten: tuples.length,
  };
}
