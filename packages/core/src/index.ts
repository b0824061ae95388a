export * from "./errors.js";
export * from "./config.js";

export * from "./scenarios/types.js";
export * from "./scenarios/parser.js";
export * from "./scenarios/suite.js";
export * from "./scenarios/comments.js";

export * from "./request/builder.js";
export * from "./request/ndjson.js";
export * from "./request/payload.js";

export * from "./http/types.js";
export * from "./http/fetchTransport.js";
export * from "./http/fake.js";

export * from "./matcher/types.js";
export * from "./matcher/values.js";
export * from "./matcher/matcher.js";

export * from "./runner/retry.js";
export * from "./runner/dispatcher.js";

export * from "./report/report.js";
export * from "./report/runLogger.js";
