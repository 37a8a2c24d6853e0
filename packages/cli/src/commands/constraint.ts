/**
 * Constraint management commands for CLI
 */

import { Command } from "commander";
import { constraintName, validateConstraintSpec, type ConstraintSpec } from "@patchdb/sdk";
import { parseCollectionName } from "../lib/arg.js";
import { readJsonInput, type JsonInputOptions } from "../lib/io.js";
import { printJson, printLines, printStatus } from "../lib/render.js";
import { withDatabase, type GlobalOptions } from "../lib/store.js";
import { withTiming } from "../lib/telemetry.js";

async function readSpec(options: JsonInputOptions): Promise<ConstraintSpec> {
  const spec = await readJsonInput(options, { allowStdin: true });
  validateConstraintSpec(spec);
  return spec;
}

/**
 * Create constraint command group
 */
export function createConstraintCommand(
  program: Command,
  globals: () => GlobalOptions & { root: string }
): Command {
  const constraint = program
    .command("constraint")
    .description("Manage per-field constraints ($required, $notnull, $type)")
    .addHelpText(
      "after",
      `
Examples:
  $ patchdb constraint add users --data '{"email": {"$required": true, "$type": "string"}}'
  $ patchdb constraint ls users
  $ patchdb constraint rm users --data '{"email": {"$type": "string"}}'`
    );

  // constraint add command
  constraint
    .command("add")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Add the constraints in a spec document")
    .option("--file <path>", "Read spec from JSON file")
    .option("--data <json>", "Inline JSON spec")
    .action(async (collection: string, options: JsonInputOptions) => {
      await withTiming("cli.constraint.add", { collection }, async () => {
        const opts = globals();
        const spec = await readSpec(options);
        const added = await withDatabase(opts.root, opts, (db) =>
          db.addConstraint(collection, spec)
        );

        printStatus(
          added ? `Added constraints to ${collection}` : `Constraints on ${collection} unchanged`,
          opts
        );
      });
    });

  // constraint rm command
  constraint
    .command("rm")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Remove the constraints in a spec document")
    .option("--file <path>", "Read spec from JSON file")
    .option("--data <json>", "Inline JSON spec")
    .action(async (collection: string, options: JsonInputOptions) => {
      await withTiming("cli.constraint.rm", { collection }, async () => {
        const opts = globals();
        const spec = await readSpec(options);
        const removed = await withDatabase(opts.root, opts, (db) =>
          db.removeConstraint(collection, spec)
        );

        printStatus(
          removed
            ? `Removed constraints from ${collection}`
            : `No matching constraints on ${collection}`,
          opts
        );
      });
    });

  // constraint ls command
  constraint
    .command("ls")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("List active constraints")
    .option("--json", "Output as JSON array of rules")
    .action(async (collection: string, options: { json?: boolean }) => {
      await withTiming("cli.constraint.ls", { collection }, async () => {
        const opts = globals();
        const constraints = await withDatabase(opts.root, opts, (db) =>
          db.listConstraints(collection)
        );

        if (options.json) {
          printJson(constraints);
        } else {
          printLines(constraints.map(constraintName));
        }
      });
    });

  return constraint;
}
