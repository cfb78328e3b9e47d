import pino from "pino";

export const logger = pino({
  name: "credit-ledger",
  level: process.env.LOG_LEVEL || "info",
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});
