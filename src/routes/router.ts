import { OpenAPIHono } from "@hono/zod-openapi";
import { ValidationError } from "../services/errors";

// Sub-apps share one validation hook so malformed input surfaces as a
// ValidationError through the app's error handler.
export function createRouter(): OpenAPIHono {
  return new OpenAPIHono({
    defaultHook: (result) => {
      if (result.success) return;
      const issue = result.error.issues[0];
      if (!issue) throw new ValidationError("Invalid request");
      const field = issue.path.join(".");
      throw new ValidationError(
        field ? `${field}: ${issue.message}` : issue.message,
      );
    },
  });
}
