import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const scrapeRunsTable = pgTable(
  "scrape_runs",
  {
    id: text("id").primaryKey(),
    date: text("date").notNull(),
    layout: text("layout").notNull(),
    discovered: integer("discovered").notNull(),
    stored: integer("stored").notNull(),
    failed: integer("failed").notNull(),
    status: text("status", { enum: ["completed", "failed"] }).notNull(),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    dateIdx: index("scrape_runs_date_idx").on(table.date),
  }),
);

export const disclosuresTable = pgTable(
  "disclosures",
  {
    storagePath: text("storage_path").primaryKey(),
    runId: text("run_id")
      .notNull()
      .references(() => scrapeRunsTable.id, { onDelete: "cascade" }),
    date: text("date").notNull(),
    code: text("code").notNull(),
    companyName: text("company_name").notNull(),
    title: text("title").notNull(),
    docType: text("doc_type").notNull(),
  },
  (table) => ({
    dateCodeIdx: index("disclosures_date_code_idx").on(table.date, table.code),
  }),
);
