import { cors } from "@elysiajs/cors";
import { Elysia } from "elysia";
import { AppError } from "src/core/errors.ts";
import type { AppDependencies } from "src/http/context.ts";
import { organizationRoutes } from "src/http/routes/organizations.ts";
import { permissionRoutes } from "src/http/routes/permissions.ts";
import { projectManagerRoutes } from "src/http/routes/project-managers.ts";
import { resourceRoutes } from "src/http/routes/resources.ts";
import { roleRoutes } from "src/http/routes/roles.ts";
import { systemRoutes } from "src/http/routes/system.ts";

export type { AppDependencies, AppInfo } from "src/http/context.ts";

/**
 * Build the HTTP application. Every error leaves as `{ detail }`; anything
 * that is not an AppError is logged and reported as a bare 500.
 */
export function createApp(deps: AppDependencies) {
  const log = deps.logger.child({ component: "http" });
  const origin = deps.corsOrigin ?? "*";

  return new Elysia()
    .use(cors({ origin: origin === "*" ? true : origin }))
    .onError({ as: "global" }, ({ code, error, set, request }) => {
      if (error instanceof AppError) {
        if (error.statusCode >= 500) {
          log.error(
            { err: error, method: request.method, url: request.url },
            error.message,
          );
        }
        set.status = error.statusCode;
        return { detail: error.message };
      }
      if (code === "NOT_FOUND") {
        set.status = 404;
        return { detail: "Not Found" };
      }
      if (code === "PARSE") {
        set.status = 400;
        return { detail: "Malformed request body" };
      }

      log.error(
        { err: error, method: request.method, url: request.url },
        "Unhandled request error",
      );
      set.status = 500;
      return { detail: "Internal server error" };
    })
    .use(systemRoutes(deps))
    .use(organizationRoutes(deps))
    .use(resourceRoutes(deps))
    .use(roleRoutes(deps))
    .use(permissionRoutes(deps))
    .use(projectManagerRoutes(deps));
}
