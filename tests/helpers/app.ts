import { z } from "zod";
import { createAuthorization } from "src/core/authorization.ts";
import type { OrganizationRole } from "src/core/types.ts";
import { createApp } from "src/http/app.ts";
import { createLogger } from "src/logger.ts";
import { MemoryEntityStore } from "src/store/memory/adapter.ts";
import { MockOracle } from "tests/helpers/mock-oracle.ts";

export const silentLogger = createLogger({ level: "silent" });

export interface TestResponse {
  status: number;
  body: unknown;
}

/**
 * Application wired to a MemoryEntityStore and a MockOracle, driven through
 * `app.handle` without opening a socket.
 */
export function createTestContext(options: { timeoutMs?: number } = {}) {
  const oracle = new MockOracle();
  const store = new MemoryEntityStore();
  const authorization = createAuthorization(oracle, {
    timeoutMs: options.timeoutMs ?? 50,
    logger: silentLogger,
  });
  const app = createApp({
    store,
    authorization,
    logger: silentLogger,
    info: { title: "Test API", version: "0.0.1-test" },
  });

  async function request(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<TestResponse> {
    const init: RequestInit = { method };
    if (body !== undefined) {
      init.headers = { "content-type": "application/json" };
      init.body = JSON.stringify(body);
    }
    const response = await app.handle(
      new Request(`http://localhost${path}`, init),
    );
    const text = await response.text();
    return {
      status: response.status,
      body: text.length > 0 ? JSON.parse(text) : null,
    };
  }

  /** Persist an organization and grant `roles` on it without HTTP */
  async function seedOrganization(
    name: string,
    roles: Record<string, OrganizationRole> = {},
  ) {
    const organization = await store.organizations.insert({
      name,
      description: null,
    });
    for (const [user, role] of Object.entries(roles)) {
      oracle.grant(`user:${user}`, role, `organization:${organization.id}`);
    }
    return organization;
  }

  /** Persist a resource and link it to its organization */
  async function seedResource(organizationId: string, name = "db") {
    const resource = await store.resources.insert({
      name,
      description: null,
      resourceType: "database",
      organizationId,
    });
    oracle.grant(
      `organization:${organizationId}`,
      "organization",
      `resource:${resource.id}`,
    );
    return resource;
  }

  return {
    app,
    oracle,
    store,
    authorization,
    request,
    seedOrganization,
    seedResource,
  };
}

const withId = z.object({ id: z.string() });

/** The `id` of a created record in a response body */
export function idOf(body: unknown): string {
  return withId.parse(body).id;
}

export type TestContext = ReturnType<typeof createTestContext>;
