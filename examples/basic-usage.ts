/**
 * Basic Usage Example
 *
 * Demonstrates collections, containment queries and constraints.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openDatabase, ConstraintViolationError } from "@patchdb/sdk";
import { rm } from "node:fs/promises";

async function main(): Promise<void> {
  // Setup: start from an empty data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  console.log("📂 Opening database...");
  const db = openDatabase({ root: dataDir });
  const tasks = db.collection("tasks");

  // INSERT: the collection is created on first write
  console.log("\n✏️  Inserting documents...");
  const firstId = await tasks.insert({
    title: "Write docs",
    status: "open",
    tags: ["docs", "writing"],
    owner: { name: "Ann", team: "core" },
  });
  await tasks.insert({ _id: "task-2", title: "Ship release", status: "open", tags: ["release"] });
  await tasks.insert({ _id: "task-3", title: "Triage", status: "done", tags: ["docs"] });
  console.log(`✅ Inserted ${firstId}, task-2, task-3`);

  // FIND: a query matches every document that contains it
  console.log("\n🔍 Open tasks:");
  for await (const task of tasks.find({ status: "open" })) {
    console.log(`   ${task._id}: ${String(task.title)}`);
  }

  // Arrays match when every query element appears in the document's array
  console.log(`\n🏷️  Tagged docs: ${await tasks.count({ tags: ["docs"] })}`);

  // Nested objects match by containment too
  const owned = await tasks.findOne({ owner: { team: "core" } });
  console.log(`👤 Core team task: ${owned?._id ?? "none"}`);

  // SAVE: replace by _id
  console.log("\n✏️  Saving task-2...");
  await tasks.save({ _id: "task-2", title: "Ship release", status: "done", tags: ["release"] });
  console.log(`✅ Done tasks: ${await tasks.count({ status: "done" })}`);

  // CONSTRAINTS: reject writes that break a rule
  console.log("\n🛡️  Adding constraints...");
  await tasks.addConstraint({ title: { $required: true, $type: "string" } });
  console.log(`   Active: ${JSON.stringify(await tasks.listConstraints())}`);
  try {
    await tasks.insert({ status: "open" });
  } catch (err) {
    if (err instanceof ConstraintViolationError) {
      console.log(`❌ Rejected: ${err.message}`);
    } else {
      throw err;
    }
  }

  // REMOVE
  console.log("\n🗑️  Removing done tasks...");
  const removed = await tasks.remove({ status: "done" });
  console.log(`✅ Removed ${removed} document(s); ${await tasks.count()} left`);

  await db.close();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
