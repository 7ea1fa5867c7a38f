/**
 * Basic Usage Example
 *
 * Demonstrates fundamental CRUD operations against a file-backed repository.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { createRepository, jsonEntity, integerIds, openFileBlobStore } from "@blobrepo/sdk";
import { mkdir, rm } from "node:fs/promises";

interface Task {
  id?: number;
  title: string;
  status: "open" | "in-progress" | "done";
  priority: number;
}

const tasks = jsonEntity<Task, "id", number>({
  table: "Task",
  primaryKey: "id",
  ids: integerIds,
  schema: {
    type: "object",
    required: ["id", "title", "status", "priority"],
    properties: {
      id: { type: "integer" },
      title: { type: "string", minLength: 1 },
      status: { enum: ["open", "in-progress", "done"] },
      priority: { type: "integer", minimum: 0, maximum: 10 },
    },
    additionalProperties: false,
  },
});

async function main() {
  // Setup: Create temporary data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });

  console.log("📂 Opening store...");
  const repo = createRepository(openFileBlobStore({ root: dataDir }), tasks);

  // CREATE
  console.log("\n✏️  Saving tasks...");
  await repo.saveAll([
    { id: 1, title: "Write docs", status: "open", priority: 8 },
    { id: 2, title: "Fix index repair", status: "open", priority: 5 },
    { id: 3, title: "Release 0.1", status: "open", priority: 3 },
  ]);
  console.log(`✅ Saved ${await repo.count()} tasks`);

  // READ
  console.log("\n📖 Reading task 1...");
  const task = await repo.findById(1);
  if (!task) {
    throw new Error("Expected task 1 to exist");
  }
  console.log(`   Title: ${task.title}`);
  console.log(`   Status: ${task.status}`);

  // UPDATE
  console.log("\n✏️  Updating task 1...");
  await repo.update({ ...task, status: "in-progress" });
  console.log(`✅ Status is now ${(await repo.findById(1))?.status}`);

  // LIST
  console.log("\n📋 All tasks in index order:");
  for (const t of await repo.findAll()) {
    console.log(`   #${t.id} [${t.status}] ${t.title} (priority ${t.priority})`);
  }

  // DELETE
  console.log("\n🗑️  Deleting task 2...");
  await repo.deleteById(2);
  console.log(`✅ Remaining IDs: ${(await repo.findAllIds()).join(", ")}`);
  console.log(`   Task 2 exists: ${await repo.existsById(2)}`);

  // Cleanup
  await rm(dataDir, { recursive: true, force: true });
  console.log("\n✨ Done!");
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exitCode = 1;
});
