export * from "./items.ts";
export * from "./responses.ts";
export * from "./test-sessions.ts";
export * from "./reliability-metrics.ts";
