import { createRoute, z } from "@hono/zod-openapi";
import { accountIdFor } from "../services/accounts";
import type { WalletService } from "../services/wallet.service";
import { createRouter } from "./router";
import {
  BalanceSchema,
  ErrorSchema,
  TransactionSchema,
  UserIdParamSchema,
  jsonContent,
  toBalanceResponse,
  toTransactionResponse,
} from "./schemas";

const HistoryQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .optional()
    .openapi({ param: { name: "limit", in: "query" }, example: 50 }),
  offset: z.coerce
    .number()
    .int()
    .optional()
    .openapi({ param: { name: "offset", in: "query" }, example: 0 }),
});

const BalanceQuerySchema = z.object({
  assetCode: z
    .string()
    .min(1)
    .optional()
    .openapi({ param: { name: "assetCode", in: "query" }, example: "GOLD_COINS" }),
});

export function walletRoutes(wallet: WalletService) {
  const routes = createRouter();

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{userId}/balance",
      summary: "Balances of every account a user holds",
      tags: ["Wallets"],
      request: { params: UserIdParamSchema, query: BalanceQuerySchema },
      responses: {
        200: jsonContent(BalanceSchema, "Balances derived from the journal"),
      },
    }),
    async (c) => {
      const { userId } = c.req.valid("param");
      const { assetCode } = c.req.valid("query");
      if (assetCode) {
        const balance = await wallet.getBalance(userId, assetCode);
        const single = {
          asset_type_code: assetCode,
          account_id: accountIdFor(userId, assetCode),
          balance,
        };
        return c.json(toBalanceResponse(userId, [single]), 200);
      }
      const balances = await wallet.getBalances(userId);
      return c.json(toBalanceResponse(userId, balances), 200);
    },
  );

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{userId}/transactions",
      summary: "Transaction history, newest first",
      tags: ["Wallets"],
      request: { params: UserIdParamSchema, query: HistoryQuerySchema },
      responses: {
        200: jsonContent(
          z.object({
            user_id: z.string(),
            transactions: z.array(TransactionSchema),
            limit: z.number().int(),
            offset: z.number().int(),
          }),
          "One page of history",
        ),
        400: jsonContent(ErrorSchema, "Invalid paging parameters"),
      },
    }),
    async (c) => {
      const { userId } = c.req.valid("param");
      const { limit, offset } = c.req.valid("query");
      const page = await wallet.getTransactions(userId, { limit, offset });
      return c.json(
        {
          user_id: userId,
          transactions: page.transactions.map(toTransactionResponse),
          limit: page.limit,
          offset: page.offset,
        },
        200,
      );
    },
  );

  return routes;
}
