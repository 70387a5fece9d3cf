import { desc, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type {
  ScrapeRunRecord,
  StoredDisclosureRecord,
} from "../../core/entities/pipelineRun";
import type { RunLedgerPort } from "../../core/ports/outboundPorts";
import { disclosuresTable, scrapeRunsTable } from "./schema";

/**
 * Records each scrape run with the documents it stored. Re-scraping a date
 * moves existing storage paths onto the newer run instead of duplicating them.
 */
export class PostgresRunLedger implements RunLedgerPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async recordRun(
    run: ScrapeRunRecord,
    documents: StoredDisclosureRecord[],
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.insert(scrapeRunsTable).values(run);

      if (documents.length === 0) return;
      await tx
        .insert(disclosuresTable)
        .values(documents)
        .onConflictDoUpdate({
          target: disclosuresTable.storagePath,
          set: {
            runId: sql`excluded.run_id`,
            companyName: sql`excluded.company_name`,
            title: sql`excluded.title`,
            docType: sql`excluded.doc_type`,
          },
        });
    });
  }

  async listRecent(limit: number): Promise<ScrapeRunRecord[]> {
    return this.db
      .select()
      .from(scrapeRunsTable)
      .orderBy(desc(scrapeRunsTable.startedAt))
      .limit(limit);
  }
}

/**
 * Ledger used when persistence is disabled.
 */
export class NoopRunLedger implements RunLedgerPort {
  async recordRun(): Promise<void> {}

  async listRecent(): Promise<ScrapeRunRecord[]> {
    return [];
  }
}
