import {
  type ClientCheckRequest,
  type ClientListObjectsRequest,
  type ClientReadRequest,
  type ClientWriteRequest,
  CredentialsMethod,
  OpenFgaClient,
  type TupleKey,
  type UserClientConfigurationParams,
} from "@openfga/sdk";
import type { FgaConfig } from "src/config.ts";
import { OracleError } from "src/core/errors.ts";
import type { RelationshipTuple } from "src/core/types.ts";
import type { RelationshipOracle } from "src/oracle/interface.ts";

const READ_PAGE_SIZE = 100;

export interface ReadPageOptions {
  pageSize: number;
  continuationToken?: string;
}

export interface ReadPage {
  tuples: { key: TupleKey }[];
  continuation_token?: string;
}

/** The calls OpenFgaOracle makes; OpenFgaClient satisfies it */
export interface FgaClient {
  check(body: ClientCheckRequest): Promise<{ allowed?: boolean }>;
  write(body: ClientWriteRequest): Promise<unknown>;
  listObjects(body: ClientListObjectsRequest): Promise<{ objects: string[] }>;
  read(body: ClientReadRequest, options: ReadPageOptions): Promise<ReadPage>;
  readAuthorizationModels(): Promise<unknown>;
}

export function clientSettings(
  config: FgaConfig,
): UserClientConfigurationParams {
  const settings: UserClientConfigurationParams = {
    apiUrl: config.apiUrl,
    storeId: config.storeId,
    authorizationModelId: config.authorizationModelId,
    // Failures surface immediately; the facade decides what they mean
    retryParams: { maxRetry: 0 },
  };

  if (config.credentials?.method === "client_credentials") {
    settings.credentials = {
      method: CredentialsMethod.ClientCredentials,
      config: {
        clientId: config.credentials.clientId,
        clientSecret: config.credentials.clientSecret,
        apiAudience: config.credentials.apiAudience,
        apiTokenIssuer: config.credentials.apiTokenIssuer,
      },
    };
  } else if (config.credentials?.method === "api_token") {
    settings.credentials = {
      method: CredentialsMethod.ApiToken,
      config: { token: config.credentials.token },
    };
  }

  return settings;
}

export function createOpenFgaClient(config: FgaConfig): OpenFgaClient {
  return new OpenFgaClient(clientSettings(config));
}

/** RelationshipOracle backed by an OpenFGA (or Auth0 FGA) store */
export class OpenFgaOracle implements RelationshipOracle {
  constructor(private client: FgaClient) {}

  async check(tuple: RelationshipTuple): Promise<boolean> {
    try {
      const response = await this.client.check(tuple);
      return response.allowed === true;
    } catch (error) {
      throw new OracleError("check", error);
    }
  }

  async write(tuples: RelationshipTuple[]): Promise<void> {
    try {
      await this.client.write({ writes: tuples });
    } catch (error) {
      throw new OracleError("write", error);
    }
  }

  async delete(tuples: RelationshipTuple[]): Promise<void> {
    try {
      await this.client.write({ deletes: tuples });
    } catch (error) {
      throw new OracleError("delete", error);
    }
  }

  async listObjects(
    user: string,
    relation: string,
    type: string,
  ): Promise<string[]> {
    try {
      const response = await this.client.listObjects({ user, relation, type });
      return response.objects;
    } catch (error) {
      throw new OracleError("listObjects", error);
    }
  }

  async read(object: string): Promise<RelationshipTuple[]> {
    const tuples: RelationshipTuple[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const response = await this.client.read(
          { object },
          { pageSize: READ_PAGE_SIZE, continuationToken },
        );
        for (const { key } of response.tuples) {
          tuples.push(this.keyToTuple(key));
        }
        continuationToken = response.continuation_token || undefined;
      } while (continuationToken);
    } catch (error) {
      throw new OracleError("read", error);
    }
    return tuples;
  }

  async ping(): Promise<void> {
    try {
      await this.client.readAuthorizationModels();
    } catch (error) {
      throw new OracleError("ping", error);
    }
  }

  private keyToTuple(key: TupleKey): RelationshipTuple {
    return { user: key.user, relation: key.relation, object: key.object };
  }
}
