/**
 * patchdb CLI command set
 */

import { Command, InvalidArgumentError, type OutputConfiguration } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { toJsonObject, toQuery, type Query } from "@patchdb/sdk";
import { resolveRoot } from "./lib/env.js";
import { parseCollectionName } from "./lib/arg.js";
import { confirmAction, readJsonInput, type JsonInputOptions } from "./lib/io.js";
import { printJson, printLines, printStatus, colorize } from "./lib/render.js";
import { CliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { withDatabase, type GlobalOptions } from "./lib/store.js";
import { createConstraintCommand } from "./commands/constraint.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return String(parsed.version);
  }
  return "0.0.0";
}

interface QueryOptions extends JsonInputOptions {
  raw?: boolean;
}

/**
 * Read an optional query from --data/--file, defaulting to the empty query
 */
async function readQuery(options: JsonInputOptions): Promise<Query> {
  const raw = await readJsonInput(options, { allowStdin: false });
  return raw === undefined ? {} : toQuery(raw);
}

/**
 * Build the CLI program
 *
 * Errors propagate out of `parseAsync`; the caller decides how to exit.
 * @param output - Overrides for commander's output hooks, inherited by every subcommand
 */
export function createProgram(output: OutputConfiguration = {}): Command {
  const program = new Command();

  // Configure error output with color; throw instead of exiting
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      ...output,
    })
    .exitOverride();

  // Global options
  program
    .name("patchdb")
    .description("patchdb - JSON document collections with containment queries and constraints")
    .version(readVersion())
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions & { root: string } => {
    const opts = program.opts<GlobalOptions>();
    return { ...opts, root: resolveRoot(opts.root) };
  };

  // Collections command
  program
    .command("collections")
    .description("List collections")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.collections", {}, async () => {
        const opts = globals();
        const names = await withDatabase(opts.root, opts, (db) => db.listCollections());

        if (options.json) {
          printJson(names);
        } else {
          printLines(names);
        }
      });
    });

  // Create command
  program
    .command("create")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Create a collection")
    .action(async (collection: string) => {
      await withTiming("cli.create", { collection }, async () => {
        const opts = globals();
        const created = await withDatabase(opts.root, opts, (db) =>
          db.createCollection(collection)
        );

        printStatus(
          created ? `Created collection ${collection}` : `Collection ${collection} already exists`,
          opts
        );
      });
    });

  // Drop command
  program
    .command("drop")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Drop a collection with its documents and constraints")
    .option("--force", "Drop without confirmation")
    .action(async (collection: string, options: { force?: boolean }) => {
      await withTiming("cli.drop", { collection }, async () => {
        const opts = globals();
        await confirmAction(`Drop collection ${collection}?`, options.force);

        const dropped = await withDatabase(opts.root, opts, (db) => db.dropCollection(collection));
        if (!dropped) {
          throw new CliError(`Collection not found: ${collection}`, { exitCode: 2 });
        }

        printStatus(`Dropped collection ${collection}`, opts);
      });
    });

  // Insert command
  program
    .command("insert")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Insert a document and print its _id")
    .option("--file <path>", "Read document from JSON file")
    .option("--data <json>", "Inline JSON document")
    .action(async (collection: string, options: JsonInputOptions) => {
      await withTiming("cli.insert", { collection }, async () => {
        const opts = globals();
        const doc = toJsonObject(await readJsonInput(options, { allowStdin: true }));

        const id = await withDatabase(opts.root, opts, (db) => db.insert(collection, doc));
        console.log(id);
      });
    });

  // Save command
  program
    .command("save")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Replace the document with the same _id, or insert it; print its _id")
    .option("--file <path>", "Read document from JSON file")
    .option("--data <json>", "Inline JSON document")
    .action(async (collection: string, options: JsonInputOptions) => {
      await withTiming("cli.save", { collection }, async () => {
        const opts = globals();
        const doc = toJsonObject(await readJsonInput(options, { allowStdin: true }));

        const id = await withDatabase(opts.root, opts, (db) => db.save(collection, doc));
        console.log(id);
      });
    });

  // Get command
  program
    .command("get")
    .argument("<collection>", "Collection name", parseCollectionName)
    .argument("<id>", "Document _id")
    .description("Retrieve a document by _id")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, id: string, options: { raw?: boolean }) => {
      await withTiming("cli.get", { collection }, async () => {
        const opts = globals();
        const doc = await withDatabase(opts.root, opts, (db) => db.findOneById(collection, id));

        if (doc === null) {
          throw new CliError(`Document not found: ${collection}/${id}`, { exitCode: 2 });
        }

        printJson(doc, { raw: options.raw });
      });
    });

  // Find command
  program
    .command("find")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Print every document containing the query as a JSON array")
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query (default: {})")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, options: QueryOptions) => {
      await withTiming("cli.find", { collection }, async () => {
        const opts = globals();
        const query = await readQuery(options);

        const results = await withDatabase(opts.root, opts, (db) =>
          db.find(collection, query).toArray()
        );

        // Always output as JSON array
        printJson(results, { raw: options.raw });
      });
    });

  // Find-one command
  program
    .command("find-one")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Print the first document containing the query")
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query (default: {})")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (collection: string, options: QueryOptions) => {
      await withTiming("cli.find-one", { collection }, async () => {
        const opts = globals();
        const query = await readQuery(options);
        const doc = await withDatabase(opts.root, opts, (db) => db.findOne(collection, query));

        if (doc === null) {
          throw new CliError(`No document in ${collection} matches the query`, { exitCode: 2 });
        }

        printJson(doc, { raw: options.raw });
      });
    });

  // Count command
  program
    .command("count")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Count documents containing the query")
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query (default: {})")
    .action(async (collection: string, options: JsonInputOptions) => {
      await withTiming("cli.count", { collection }, async () => {
        const opts = globals();
        const query = await readQuery(options);
        const n = await withDatabase(opts.root, opts, (db) => db.count(collection, query));
        console.log(String(n));
      });
    });

  // Remove-by-query command
  program
    .command("remove")
    .argument("<collection>", "Collection name", parseCollectionName)
    .description("Remove documents containing the query")
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query")
    .option("--one", "Remove only the first match")
    .option("--force", "Remove without confirmation")
    .action(
      async (collection: string, options: JsonInputOptions & { one?: boolean; force?: boolean }) => {
        await withTiming("cli.remove", { collection }, async () => {
          const opts = globals();
          const raw = await readJsonInput(options, { allowStdin: false });
          if (raw === undefined) {
            throw new InvalidArgumentError("A query is required: use --data or --file");
          }
          const query = toQuery(raw);

          await confirmAction(
            `Remove ${options.one ? "the first document" : "all documents"} in ${collection} matching ${JSON.stringify(query)}?`,
            options.force
          );

          const removed = await withDatabase(opts.root, opts, (db) =>
            options.one ? db.removeOne(collection, query) : db.remove(collection, query)
          );

          printStatus(`Removed ${removed} document(s) from ${collection}`, opts);
        });
      }
    );

  // Remove-by-id command
  program
    .command("rm")
    .argument("<collection>", "Collection name", parseCollectionName)
    .argument("<id>", "Document _id")
    .description("Remove a document by _id")
    .option("--force", "Remove without confirmation")
    .action(async (collection: string, id: string, options: { force?: boolean }) => {
      await withTiming("cli.rm", { collection }, async () => {
        const opts = globals();
        await confirmAction(`Remove ${collection}/${id}?`, options.force);

        const removed = await withDatabase(opts.root, opts, (db) =>
          db.removeOneById(collection, id)
        );
        if (removed === 0) {
          throw new CliError(`Document not found: ${collection}/${id}`, { exitCode: 2 });
        }

        printStatus(`Removed ${collection}/${id}`, opts);
      });
    });

  createConstraintCommand(program, globals);

  return program;
}
