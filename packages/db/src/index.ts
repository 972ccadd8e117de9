export * from "./artifact-store";
export * from "./client";
export * from "./drizzle-job-store";
export * from "./in-memory-job-store";
export * from "./job-store";
export * from "./migrations/runner";
export * from "./schema";
