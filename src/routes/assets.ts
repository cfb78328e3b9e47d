import { createRoute, z } from "@hono/zod-openapi";
import type { AssetRegistry } from "../services/asset-registry";
import { NotFoundError } from "../services/errors";
import { createRouter } from "./router";
import {
  AssetCodeParamSchema,
  AssetTypeSchema,
  ErrorSchema,
  jsonContent,
  toAssetResponse,
} from "./schemas";

export function assetRoutes(registry: AssetRegistry) {
  const routes = createRouter();

  routes.openapi(
    createRoute({
      method: "get",
      path: "/",
      summary: "Registered asset types",
      tags: ["Assets"],
      responses: {
        200: jsonContent(
          z.object({ assets: z.array(AssetTypeSchema) }),
          "All asset types, active or not",
        ),
      },
    }),
    async (c) => {
      const assets = await registry.list();
      return c.json({ assets: assets.map(toAssetResponse) }, 200);
    },
  );

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{code}",
      summary: "One asset type",
      tags: ["Assets"],
      request: { params: AssetCodeParamSchema },
      responses: {
        200: jsonContent(AssetTypeSchema, "The asset type"),
        404: jsonContent(ErrorSchema, "Unknown asset type"),
      },
    }),
    async (c) => {
      const { code } = c.req.valid("param");
      const asset = await registry.find(code);
      if (!asset) throw new NotFoundError(`Asset type ${code} not found`);
      return c.json(toAssetResponse(asset), 200);
    },
  );

  return routes;
}
