/**
 * Provision a local OpenFGA store for development:
 *
 *   npm run fga:setup -- [tuples.yaml]
 *
 * Prints the FGA_STORE_ID and FGA_AUTHORIZATION_MODEL_ID to put in .env.
 */
import "dotenv/config";
import * as fs from "node:fs";
import { createLogger } from "src/logger.ts";
import {
  loadModel,
  parseTupleFile,
  provisionStore,
} from "src/oracle/openfga/setup.ts";

const logger = createLogger({ level: "info", name: "fga-setup" });

const apiUrl = process.env.FGA_API_URL || "http://localhost:8080";
const modelPath = new URL("../model/authorization-model.fga", import.meta.url);
const tuplesPath = process.argv[2];

try {
  const model = loadModel(modelPath);
  const tuples = tuplesPath
    ? parseTupleFile(fs.readFileSync(tuplesPath, "utf-8"))
    : [];

  const result = await provisionStore(apiUrl, "org-rebac-api", model, tuples);

  logger.info(result, "Store provisioned");
  process.stdout.write(
    `FGA_STORE_ID=${result.storeId}\nFGA_AUTHORIZATION_MODEL_ID=${result.authorizationModelId}\n`,
  );
} catch (error) {
  logger.error({ err: error, apiUrl }, "Provisioning failed");
  process.exitCode = 1;
}
