export * from "./capability";
export * from "./evidence";
export * from "./job";
export * from "./report";
export * from "./stage";
export * from "./submission";
export * from "./verdict";
