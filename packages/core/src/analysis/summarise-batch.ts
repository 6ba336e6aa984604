/**
 * Summarisation aggregator
 *
 * One unit of work per client. Each client's notes are put in visit-date
 * order and summarised in a single model call.
 */

import type { Batch, ClientSummary, SummaryItem, VisitRecord } from "../models/index.js";
import { UNKNOWN_CLIENT } from "../models/index.js";
import { runTaskGroup } from "./task-group.js";
import type { AggregateOptions } from "./classify-batch.js";

/**
 * Summarizer contract: notes oldest first, never rejects in normal operation
 */
export type SummarizeNotes = (notes: readonly string[]) => Promise<string>;

export interface ClientGroup {
  client: string;
  records: VisitRecord[];
}

export interface SummaryOutcome {
  /** Items in first-seen client order */
  items: SummaryItem[];
  /** Clients with no non-empty note */
  skipped: number;
  /** Clients whose unit of work threw */
  failed: number;
}

type UnitResult = { status: "summarised"; summary: ClientSummary } | { status: "skipped" };

function compareDates(a: VisitRecord, b: VisitRecord): number {
  if (a.visitDate < b.visitDate) return -1;
  if (a.visitDate > b.visitDate) return 1;
  return 0;
}

/**
 * Group records by client, in the order clients first appear
 */
export function groupByClient(records: readonly VisitRecord[]): ClientGroup[] {
  const groups = new Map<string, VisitRecord[]>();
  for (const record of records) {
    const client = record.hasClient ? record.client : UNKNOWN_CLIENT;
    const group = groups.get(client);
    if (group) {
      group.push(record);
    } else {
      groups.set(client, [record]);
    }
  }
  return [...groups].map(([client, grouped]) => ({ client, records: grouped }));
}

/**
 * Trimmed non-empty notes, oldest visit first (stable for equal dates)
 */
export function chronologicalNotes(records: readonly VisitRecord[]): string[] {
  return [...records]
    .sort(compareDates)
    .map((record) => record.note.trim())
    .filter((note) => note.length > 0);
}

/**
 * Latest visit date across all of a client's records, blank notes included.
 * This can be later than the newest note that reaches the prompt.
 */
export function latestVisitDate(records: readonly VisitRecord[]): string {
  return records.reduce(
    (latest, record) => (record.visitDate > latest ? record.visitDate : latest),
    ""
  );
}

/**
 * Build the table item for one client's summary
 */
export function toSummaryItem(
  summary: ClientSummary,
  batchId: string,
  timestamp: Date
): SummaryItem {
  return {
    client: summary.client,
    batch_id: batchId,
    latest_visit_date: summary.latestVisitDate,
    visit_count: summary.visitCount,
    summary: summary.summary,
    timestamp: timestamp.toISOString(),
  };
}

/**
 * Summarise each client of a batch concurrently
 */
export async function aggregateSummaries(
  batch: Batch,
  summarize: SummarizeNotes,
  options: AggregateOptions = {}
): Promise<SummaryOutcome> {
  const now = options.now ?? (() => new Date());
  const groups = groupByClient(batch.records);

  const results = await runTaskGroup(
    groups,
    async (group): Promise<UnitResult> => {
      const notes = chronologicalNotes(group.records);
      if (notes.length === 0) {
        console.warn(`Client '${group.client}' has no non-empty notes, skipping`);
        return { status: "skipped" };
      }

      return {
        status: "summarised",
        summary: {
          client: group.client,
          visitCount: group.records.length,
          latestVisitDate: latestVisitDate(group.records),
          summary: await summarize(notes),
        },
      };
    },
    { concurrency: options.concurrency }
  );

  const items: SummaryItem[] = [];
  let skipped = 0;
  let failed = 0;

  results.forEach((result, position) => {
    if (!result.ok) {
      failed++;
      console.error(`Failed to process client '${groups[position].client}':`, result.error);
      return;
    }
    if (result.value.status === "skipped") {
      skipped++;
      return;
    }
    items.push(toSummaryItem(result.value.summary, batch.batchId, now()));
  });

  return { items, skipped, failed };
}
