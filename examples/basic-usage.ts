/**
 * Basic Usage Example
 *
 * Demonstrates record CRUD, analytics and the audit trail.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { AnalyticsEngine, buildRescueReport, openShelterStore } from "@shelter-records/sdk";
import { mkdir, readFile, rm } from "node:fs/promises";
import { join } from "node:path";

async function main() {
  // Setup: Create temporary data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });

  const dataFile = join(dataDir, "animals.json");
  const auditLog = join(dataDir, "audit.jsonl");

  // Open store; the data file is created on first flush
  console.log("📂 Opening store...");
  const store = await openShelterStore({ dataFile, auditLog, createIfMissing: true, defaultActor: "example" });
  console.log(`   Mode: ${store.mode}`);

  // CREATE: Add a few records
  console.log("\n✏️  Creating records...");
  const intake = [
    { animal_id: "A100", name: "Rex", animal_type: "Dog", breed: "Labrador Retriever Mix", sex_upon_outcome: "Intact Male", age_upon_outcome_in_weeks: 52, datetime: "2024-03-15 10:30:00", outcome_type: "Adoption" },
    { animal_id: "A101", name: "Bella", animal_type: "Dog", breed: "German Shepherd", sex_upon_outcome: "Intact Female", age_upon_outcome_in_weeks: 40, datetime: "2024-04-02 09:00:00", outcome_type: "Transfer" },
    { animal_id: "A102", name: "Duke", animal_type: "Dog", breed: "Bloodhound", sex_upon_outcome: "Intact Male", age_upon_outcome_in_weeks: 60, datetime: "2024-04-20 14:15:00", outcome_type: "Return to Owner" },
    { animal_id: "A103", name: "Whiskers", animal_type: "Cat", breed: "Siamese", sex_upon_outcome: "Spayed Female", age_upon_outcome_in_weeks: 104, datetime: "2024-05-01 11:45:00", outcome_type: "Adoption" },
  ];
  for (const record of intake) {
    store.create(record);
  }
  console.log(`✅ Created ${intake.length} records`);

  // READ: Query with an operator
  console.log("\n📖 Reading young dogs...");
  const youngDogs = store.read({ animal_type: "Dog", age_upon_outcome_in_weeks: { $lte: 52 } });
  for (const dog of youngDogs) {
    console.log(`   ${String(dog.animal_id)} ${String(dog.name)} (${String(dog.breed)})`);
  }

  // UPDATE: Merge fields into one record
  console.log("\n✏️  Updating record...");
  const modified = store.update({ animal_id: "A101" }, { outcome_type: "Adoption" });
  console.log(`✅ Updated ${modified} record(s)`);

  // DELETE: Remove one record
  console.log("\n🗑️  Deleting record...");
  const removed = store.delete({ animal_id: "A103" });
  console.log(`✅ Deleted ${removed} record(s)`);

  // ANALYTICS
  console.log("\n📊 Analytics...");
  const analytics = new AnalyticsEngine(store);
  for (const group of analytics.demographics()) {
    console.log(`   ${group.animalType}: ${group.totalCount} animals, avg age ${group.avgAgeWeeks ?? "n/a"} weeks`);
  }
  const rescue = analytics.rescueTypeAnalytics();
  console.log(`   Rescue candidates: ${JSON.stringify(rescue)}`);

  // REPORT
  const report = buildRescueReport(store.snapshot(), { source: dataFile });
  console.log(`\n📝 Report: ${report.title} (${report.totalRecords} records)`);

  // Persist and show the audit trail
  await store.close();
  console.log("\n🧾 Audit trail:");
  const audit = await readFile(auditLog, "utf-8");
  for (const line of audit.trim().split("\n")) {
    console.log(`   ${line}`);
  }

  console.log("\n✨ Example complete!");
}

main().catch((error: unknown) => {
  console.error("Error:", error);
  process.exit(1);
});
