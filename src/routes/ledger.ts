import { createRoute, z } from "@hono/zod-openapi";
import type { LedgerAuditor } from "../services/reconciliation.service";
import { createRouter } from "./router";
import { ErrorSchema, TransactionIdParamSchema, jsonContent } from "./schemas";

const ReconciliationSchema = z
  .object({
    generated_at: z.string(),
    balanced: z.boolean(),
    assets: z.array(
      z.object({
        asset_type_code: z.string(),
        entry_count: z.number().int(),
        net: z.string(),
        balanced: z.boolean(),
      }),
    ),
  })
  .openapi("Reconciliation");

const VerificationSchema = z
  .object({
    transaction_id: z.string(),
    valid: z.boolean(),
    problems: z.array(z.string()),
  })
  .openapi("PairVerification");

export function ledgerRoutes(auditor: LedgerAuditor) {
  const routes = createRouter();

  routes.openapi(
    createRoute({
      method: "get",
      path: "/reconciliation",
      summary: "Net of every asset type across all accounts",
      tags: ["Ledger"],
      responses: {
        200: jsonContent(
          ReconciliationSchema,
          "Per-asset totals; balanced is false when any asset is off zero",
        ),
      },
    }),
    async (c) => {
      const report = await auditor.reconcile();
      return c.json(
        { ...report, generated_at: report.generated_at.toISOString() },
        200,
      );
    },
  );

  routes.openapi(
    createRoute({
      method: "get",
      path: "/transactions/{id}/verify",
      summary: "Check that a transaction owns one mirrored entry pair",
      tags: ["Ledger"],
      request: { params: TransactionIdParamSchema },
      responses: {
        200: jsonContent(VerificationSchema, "Verification result"),
        404: jsonContent(ErrorSchema, "Unknown transaction"),
      },
    }),
    async (c) => {
      const { id } = c.req.valid("param");
      return c.json(await auditor.verifyTransaction(id), 200);
    },
  );

  return routes;
}
