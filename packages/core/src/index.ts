export * from "./domain/index";
export * from "./config";
export * from "./errors";
export * from "./job-state";
export * from "./logger";
export * from "./provider-error-classifier";
export * from "./segmentation";
export * from "./stage-retry-policy";
export * from "./text";
export * from "./verdict-mapping";
