import { STRATEGIES } from "@counteroffer/shared";
import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const negotiations = sqliteTable("negotiations", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  serviceType: text("service_type").notNull(),
  vendorMessage: text("vendor_message").notNull(),
  relationship: text("relationship").notNull(),
  pricePeriod: text("price_period", { enum: ["monthly", "annual"] }).notNull(),
  currentPrice: real("current_price").notNull(),
  targetPrice: real("target_price").notNull(),
  finalPrice: real("final_price").notNull(),
  // per price period; annualized on read
  savings: real("savings").notNull(),
  strategy: text("strategy", { enum: STRATEGIES }).notNull(),
  proposedPrice: real("proposed_price").notNull(),
  proposalMessage: text("proposal_message").notNull(),
  proposalTerms: text("proposal_terms", { mode: "json" }).$type<string[]>().notNull(),
  proposalDegraded: integer("proposal_degraded", { mode: "boolean" }).notNull(),
  vendorOutcome: text("vendor_outcome", { enum: ["accepted", "countered", "rejected"] }),
  vendorCounterPrice: real("vendor_counter_price"),
  vendorReply: text("vendor_reply"),
  vendorDegraded: integer("vendor_degraded", { mode: "boolean" }),
  success: integer("success", { mode: "boolean" }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export const negotiationEvents = sqliteTable("negotiation_events", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  negotiationId: integer("negotiation_id")
    .notNull()
    .references(() => negotiations.id),
  eventType: text("event_type", { enum: ["saved", "simulated", "degraded"] }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

export type NegotiationRow = typeof negotiations.$inferSelect;
export type NegotiationInsert = typeof negotiations.$inferInsert;

// Kept in step with the tables above; applied on every open.
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS negotiations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  service_type TEXT NOT NULL,
  vendor_message TEXT NOT NULL,
  relationship TEXT NOT NULL,
  price_period TEXT NOT NULL,
  current_price REAL NOT NULL,
  target_price REAL NOT NULL,
  final_price REAL NOT NULL,
  savings REAL NOT NULL,
  strategy TEXT NOT NULL,
  proposed_price REAL NOT NULL,
  proposal_message TEXT NOT NULL,
  proposal_terms TEXT NOT NULL,
  proposal_degraded INTEGER NOT NULL,
  vendor_outcome TEXT,
  vendor_counter_price REAL,
  vendor_reply TEXT,
  vendor_degraded INTEGER,
  success INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS negotiation_events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  negotiation_id INTEGER NOT NULL REFERENCES negotiations(id),
  event_type TEXT NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS negotiations_service_type_idx ON negotiations(service_type);
`;
