import { buildNegotiationRecord, saveNegotiationRequestSchema } from "@counteroffer/shared";
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { NegotiationRecordStore } from "./record-store";

export const DEMO_NEGOTIATIONS_PATH = resolve(__dirname, "../seed/demo-negotiations.json");

const demoFileSchema = z.array(saveNegotiationRequestSchema);

/**
 * Load completed negotiations from a JSON fixture and append them to the store.
 * Returns the new record ids in file order.
 */
export async function seedDemoNegotiations(
  store: NegotiationRecordStore,
  path = DEMO_NEGOTIATIONS_PATH,
): Promise<number[]> {
  const entries = demoFileSchema.parse(JSON.parse(readFileSync(path, "utf-8")));

  const ids: number[] = [];
  for (const entry of entries) {
    const record = buildNegotiationRecord({
      context: Object.freeze(entry.context),
      proposal: entry.proposal,
      simulation: entry.simulation,
      finalPrice: entry.finalPrice,
      success: entry.success,
    });
    ids.push(await store.saveNegotiation(record));
  }

  console.log(`seed: Inserted ${ids.length} demo negotiations`);
  return ids;
}
