import { createRoute, z } from "@hono/zod-openapi";
import type { WalletService } from "../services/wallet.service";
import { createRouter } from "./router";
import {
  AccountSchema,
  UserIdParamSchema,
  UserSummarySchema,
  jsonContent,
  toAccountResponse,
} from "./schemas";

export function userRoutes(wallet: WalletService) {
  const routes = createRouter();

  routes.openapi(
    createRoute({
      method: "get",
      path: "/",
      summary: "Users holding at least one account",
      tags: ["Users"],
      responses: {
        200: jsonContent(
          z.object({ users: z.array(UserSummarySchema) }),
          "User ids with their account counts; the treasury is excluded",
        ),
      },
    }),
    async (c) => {
      const users = await wallet.getUsers();
      return c.json({ users }, 200);
    },
  );

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{userId}/accounts",
      summary: "Accounts held by a user, one per asset type",
      tags: ["Users"],
      request: { params: UserIdParamSchema },
      responses: {
        200: jsonContent(
          z.object({ user_id: z.string(), accounts: z.array(AccountSchema) }),
          "Accounts, created lazily on first posting",
        ),
      },
    }),
    async (c) => {
      const { userId } = c.req.valid("param");
      const accounts = await wallet.getAccounts(userId);
      return c.json(
        { user_id: userId, accounts: accounts.map(toAccountResponse) },
        200,
      );
    },
  );

  return routes;
}
