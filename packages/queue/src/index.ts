export * from "./bull-dispatch-queue";
export * from "./dispatch-queue";
export * from "./in-process-dispatch-queue";
