export * from "./constants.js";
export * from "./errors.js";
export * from "./types.js";
export * from "./runtime.js";

export * from "./admin/admin.js";
export * from "./registry/voters.js";
export * from "./reputation/reputation.js";

export * from "./queries/commit.js";
export * from "./queries/ledger.js";
export * from "./queries/locks.js";
export * from "./queries/maintenance.js";
export * from "./queries/validate.js";

export * from "./resolution/consensus.js";
export * from "./resolution/quorum.js";
export * from "./settlement/settle.js";

export * from "./protocol/callback.js";
export * from "./protocol/codec.js";
export * from "./protocol/execute.js";
export * from "./protocol/schemas.js";

export * from "./market/markets.js";
