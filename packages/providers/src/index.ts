export * from "./capability-provider";
export * from "./command-provider";
export * from "./http-provider";
export * from "./provider-factory";
export * from "./provider-registry";
export * from "./seed-url-provider";
