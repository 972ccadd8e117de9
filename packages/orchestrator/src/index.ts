export * from "./admission/admission-controller";
export * from "./admission/resolve-stages";
export * from "./dispatch/dispatcher";
export * from "./dispatch/promotion-policy";
export * from "./executor/cancellation";
export * from "./executor/payloads";
export * from "./executor/pipeline-executor";
export * from "./executor/run-bounded";
export * from "./executor/stage-handlers";
export * from "./orchestrator";
export * from "./progress/progress-reporter";
export * from "./report/canonical-json";
export * from "./report/report-assembler";
export * from "./runtime";
export * from "./status-view";
