import { randomUUID } from "node:crypto";

const compact = () => randomUUID().replace(/-/g, "");

export const newTransactionId = () => `txn_${compact()}`;

export const newEntryId = () => `ent_${compact()}`;
