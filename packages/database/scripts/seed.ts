import { createDb } from "../src/client";
import { SqliteNegotiationStore } from "../src/record-store";
import { seedDemoNegotiations } from "../src/seed";

async function main() {
  const filename = process.env.DATABASE_PATH ?? "counteroffer.db";
  console.log(`Seeding ${filename}...`);

  const { db, client } = createDb(filename);
  try {
    await seedDemoNegotiations(new SqliteNegotiationStore(db));
    console.log("Seeding complete.");
  } finally {
    client.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
