/**
 * NEGOTIATION RECORD STORE - append-only history of completed negotiations
 *
 * Every save is one transaction: the negotiation row and its funnel events are
 * either all visible to the next read or not written at all. Aggregates are
 * never stored; getTotalSavings scans the table and recomputes.
 */

import {
  annualizeSavings,
  isKnownPricePeriod,
  summarizeSavings,
  type FunnelAnalysis,
  type NegotiationEventType,
  type NegotiationRecord,
  type NewNegotiationRecord,
  type SavingsSummary,
  type VendorSimulation,
} from "@counteroffer/shared";
import { count, desc, eq } from "drizzle-orm";
import type { Database } from "./client";
import { describeStorageError, StorageUnavailable } from "./errors";
import { negotiationEvents, negotiations, type NegotiationInsert, type NegotiationRow } from "./schema";

export interface NegotiationFilter {
  serviceType?: string;
}

export interface NegotiationRecordStore {
  saveNegotiation(record: NewNegotiationRecord): Promise<number>;
  /** Newest first */
  listNegotiations(filter?: NegotiationFilter): Promise<NegotiationRecord[]>;
  getTotalSavings(): Promise<SavingsSummary>;
  getFunnelAnalysis(): Promise<FunnelAnalysis>;
}

// ─── Row Mapping ────────────────────────────────────────────────────────────

function toRow(record: NewNegotiationRecord): NegotiationInsert {
  const { context, proposal, simulation } = record;
  return {
    serviceType: context.serviceType,
    vendorMessage: context.vendorMessage,
    relationship: context.relationship,
    pricePeriod: context.pricePeriod,
    currentPrice: context.currentPrice,
    targetPrice: context.targetPrice,
    finalPrice: record.finalPrice,
    savings: record.savings,
    strategy: proposal.strategy,
    proposedPrice: proposal.price,
    proposalMessage: proposal.message,
    proposalTerms: proposal.terms,
    proposalDegraded: proposal.degraded,
    vendorOutcome: simulation?.outcome ?? null,
    vendorCounterPrice: simulation?.counterPrice ?? null,
    vendorReply: simulation?.reply ?? null,
    vendorDegraded: simulation?.degraded ?? null,
    success: record.success,
    createdAt: record.createdAt,
  };
}

function toSimulation(row: NegotiationRow): VendorSimulation | null {
  if (row.vendorOutcome === null) return null;
  return {
    outcome: row.vendorOutcome,
    counterPrice: row.vendorCounterPrice,
    reply: row.vendorReply ?? "",
    degraded: row.vendorDegraded ?? false,
  };
}

function toRecord(row: NegotiationRow): NegotiationRecord {
  return {
    id: row.id,
    context: Object.freeze({
      vendorMessage: row.vendorMessage,
      currentPrice: row.currentPrice,
      targetPrice: row.targetPrice,
      pricePeriod: row.pricePeriod,
      serviceType: row.serviceType,
      relationship: row.relationship,
    }),
    proposal: {
      strategy: row.strategy,
      price: row.proposedPrice,
      message: row.proposalMessage,
      terms: row.proposalTerms,
      degraded: row.proposalDegraded,
    },
    simulation: toSimulation(row),
    finalPrice: row.finalPrice,
    savings: row.savings,
    annualSavings: annualizeSavings(row.savings, row.pricePeriod),
    success: row.success,
    createdAt: row.createdAt,
  };
}

function eventsFor(record: NewNegotiationRecord): NegotiationEventType[] {
  const events: NegotiationEventType[] = ["saved"];
  if (record.simulation) events.push("simulated");
  if (record.proposal.degraded || record.simulation?.degraded) events.push("degraded");
  return events;
}

// ─── SQLite Store ───────────────────────────────────────────────────────────

export class SqliteNegotiationStore implements NegotiationRecordStore {
  private readonly warnedPeriods = new Set<string>();

  constructor(private readonly db: Database) {}

  async saveNegotiation(record: NewNegotiationRecord): Promise<number> {
    const startTime = Date.now();
    try {
      const id = this.db.transaction((tx) => {
        const inserted = tx
          .insert(negotiations)
          .values(toRow(record))
          .returning({ id: negotiations.id })
          .get();

        tx.insert(negotiationEvents)
          .values(
            eventsFor(record).map((eventType) => ({
              negotiationId: inserted.id,
              eventType,
              createdAt: record.createdAt,
            })),
          )
          .run();

        return inserted.id;
      });

      console.log(
        `record-store: Saved negotiation ${id} (${record.proposal.strategy}, ${record.context.serviceType}) in ${Date.now() - startTime}ms`,
      );
      return id;
    } catch (error) {
      const message = describeStorageError(error);
      console.error(`record-store: Failed to save negotiation: ${message}`);
      throw new StorageUnavailable(`Could not save negotiation: ${message}`, { cause: error });
    }
  }

  async listNegotiations(filter: NegotiationFilter = {}): Promise<NegotiationRecord[]> {
    const rows = this.read("list negotiations", () =>
      this.db
        .select()
        .from(negotiations)
        .where(filter.serviceType ? eq(negotiations.serviceType, filter.serviceType) : undefined)
        .orderBy(desc(negotiations.createdAt), desc(negotiations.id))
        .all(),
    );
    return rows.map(toRecord);
  }

  async getTotalSavings(): Promise<SavingsSummary> {
    const rows = this.read("compute savings", () =>
      this.db
        .select({
          strategy: negotiations.strategy,
          serviceType: negotiations.serviceType,
          pricePeriod: negotiations.pricePeriod,
          savings: negotiations.savings,
          success: negotiations.success,
        })
        .from(negotiations)
        .all(),
    );

    for (const row of rows) {
      this.warnOnUnknownPeriod(row.pricePeriod);
    }

    return summarizeSavings(rows);
  }

  async getFunnelAnalysis(): Promise<FunnelAnalysis> {
    const rows = this.read("compute funnel", () =>
      this.db
        .select({ eventType: negotiationEvents.eventType, total: count() })
        .from(negotiationEvents)
        .groupBy(negotiationEvents.eventType)
        .all(),
    );

    const funnel: FunnelAnalysis = { saved: 0, simulated: 0, degraded: 0 };
    for (const row of rows) {
      funnel[row.eventType] = row.total;
    }
    return funnel;
  }

  private read<T>(action: string, query: () => T): T {
    try {
      return query();
    } catch (error) {
      const message = describeStorageError(error);
      console.error(`record-store: Failed to ${action}: ${message}`);
      throw new StorageUnavailable(`Could not ${action}: ${message}`, { cause: error });
    }
  }

  private warnOnUnknownPeriod(period: string): void {
    if (isKnownPricePeriod(period) || this.warnedPeriods.has(period)) return;
    this.warnedPeriods.add(period);
    console.warn(
      `record-store: Unknown price period "${period}", treating its savings as already annual`,
    );
  }
}
