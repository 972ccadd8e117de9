import {
  bigserial,
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";
import type {
  JobError,
  JobStatus,
  StageAttemptState,
  StageDefinition,
  StageResult,
  SubmissionOptions,
} from "@factline/core";

// One row per verification job; every write is guarded by `version`
export const verificationJobs = pgTable(
  "verification_jobs",
  {
    id: uuid("id").primaryKey(),
    seq: bigserial("seq", { mode: "number" }).notNull(), // FIFO tiebreak for equal created_at
    tenantId: text("tenant_id").notNull(),
    videoReference: text("video_reference").notNull(),
    options: jsonb("options").$type<SubmissionOptions>().notNull(),
    stages: jsonb("stages").$type<StageDefinition[]>().notNull(), // resolved at submission
    status: text("status").$type<JobStatus>().default("queued").notNull(),
    currentStageIndex: integer("current_stage_index").default(0).notNull(),
    stageResults: jsonb("stage_results").$type<Record<string, StageResult>>().notNull(),
    stageAttempts: jsonb("stage_attempts").$type<Record<string, StageAttemptState>>().notNull(),
    checkpoints: jsonb("checkpoints").$type<Record<string, Record<string, unknown>>>().notNull(),
    progressPercent: integer("progress_percent").default(0).notNull(),
    message: text("message").default("").notNull(),
    error: jsonb("error").$type<JobError>(),
    cancelRequested: boolean("cancel_requested").default(false).notNull(),
    reportReference: text("report_reference"),
    version: integer("version").default(1).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    finishedAt: timestamp("finished_at", { withTimezone: true }),
  },
  (table) => ({
    tenantStatusIdx: index("verification_jobs_tenant_status_idx").on(table.tenantId, table.status),
    statusCreatedIdx: index("verification_jobs_status_created_idx").on(
      table.status,
      table.createdAt,
    ),
  }),
);

export type VerificationJobRecord = typeof verificationJobs.$inferSelect;
export type NewVerificationJobRecord = typeof verificationJobs.$inferInsert;
