import { createRoute, z } from "@hono/zod-openapi";
import type { PostableTransactionType } from "../types";
import type { WalletService } from "../services/wallet.service";
import { createRouter } from "./router";
import {
  ErrorSchema,
  LedgerEntrySchema,
  TransactionIdParamSchema,
  TransactionRequestSchema,
  TransactionSchema,
  TypedTransactionRequestSchema,
  errorResponses,
  jsonContent,
  toEntryResponse,
  toTransactionResponse,
} from "./schemas";

const postingResponses = {
  200: jsonContent(TransactionSchema, "Idempotent replay of an earlier request"),
  201: jsonContent(TransactionSchema, "Transaction posted"),
  402: jsonContent(ErrorSchema, "Insufficient balance"),
  ...errorResponses,
};

const typedPosting = (path: string, summary: string) =>
  createRoute({
    method: "post",
    path,
    summary,
    tags: ["Transactions"],
    request: {
      body: {
        content: {
          "application/json": { schema: TypedTransactionRequestSchema },
        },
        required: true,
      },
    },
    responses: postingResponses,
  });

const TYPED_POSTINGS: Array<{
  path: string;
  type: PostableTransactionType;
  summary: string;
}> = [
  { path: "/topup", type: "TOPUP", summary: "Credit a user from the treasury" },
  { path: "/bonus", type: "BONUS", summary: "Grant a bonus from the treasury" },
  { path: "/spend", type: "SPEND", summary: "Debit a user into the treasury" },
];

export function transactionRoutes(wallet: WalletService) {
  const routes = createRouter();

  routes.openapi(
    createRoute({
      method: "post",
      path: "/",
      summary: "Post a transaction of any supported type",
      tags: ["Transactions"],
      request: {
        body: {
          content: { "application/json": { schema: TransactionRequestSchema } },
          required: true,
        },
      },
      responses: postingResponses,
    }),
    async (c) => {
      const body = c.req.valid("json");
      const result = await wallet.create({
        type: body.type,
        userId: body.userId,
        assetTypeCode: body.assetCode,
        amount: body.amount,
        idempotencyKey: body.idempotencyKey,
        metadata: body.metadata,
      });
      const transaction = toTransactionResponse(result.transaction);
      // Replays answer 200 so clients can tell them apart from new postings.
      if (result.replayed) return c.json(transaction, 200);
      return c.json(transaction, 201);
    },
  );

  for (const posting of TYPED_POSTINGS) {
    routes.openapi(typedPosting(posting.path, posting.summary), async (c) => {
      const body = c.req.valid("json");
      const result = await wallet.create({
        type: posting.type,
        userId: body.userId,
        assetTypeCode: body.assetCode,
        amount: body.amount,
        idempotencyKey: body.idempotencyKey,
        metadata: body.metadata,
      });
      const transaction = toTransactionResponse(result.transaction);
      if (result.replayed) return c.json(transaction, 200);
      return c.json(transaction, 201);
    });
  }

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{id}",
      summary: "Fetch a transaction",
      tags: ["Transactions"],
      request: { params: TransactionIdParamSchema },
      responses: {
        200: jsonContent(TransactionSchema, "The transaction"),
        404: jsonContent(ErrorSchema, "Unknown transaction"),
      },
    }),
    async (c) => {
      const { id } = c.req.valid("param");
      const transaction = await wallet.getTransaction(id);
      return c.json(toTransactionResponse(transaction), 200);
    },
  );

  routes.openapi(
    createRoute({
      method: "get",
      path: "/{id}/entries",
      summary: "List the two ledger entries of a transaction",
      tags: ["Transactions"],
      request: { params: TransactionIdParamSchema },
      responses: {
        200: jsonContent(
          z.object({
            transaction_id: z.string(),
            entries: z.array(LedgerEntrySchema),
          }),
          "DEBIT entry first, then CREDIT",
        ),
        404: jsonContent(ErrorSchema, "Unknown transaction"),
      },
    }),
    async (c) => {
      const { id } = c.req.valid("param");
      const entries = await wallet.getEntries(id);
      return c.json(
        { transaction_id: id, entries: entries.map(toEntryResponse) },
        200,
      );
    },
  );

  return routes;
}
