// 公開 API の集約バレル
export * from "./lib/core/errors";
export * from "./lib/core/registers";
export * from "./lib/core/stack";

export * from "./lib/semantics";
export * from "./lib/run/run-program";
export * from "./lib/report/format";
