#!/usr/bin/env node
/**
 * CLI entrypoint for vocabtoolkit.
 *
 * Usage:
 *   vocabtoolkit run task.json --config vocabtoolkit.json
 *   vocabtoolkit status <taskId>
 */
import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { ConfigurationError, VocabToolkit, flattenResults } from "./index.js";

const USAGE = `
vocabtoolkit: harvest, transform and publish vocabularies

Usage:
  vocabtoolkit run <task.json>     Run a task and print its results
  vocabtoolkit status <taskId>     Show one task
  vocabtoolkit list                List all tasks
  vocabtoolkit recover             Mark tasks left running as failed

Options:
  --config <file>        JSON configuration file
  --storage-path <dir>   Storage directory  (default: ./data)
  --db-path <file>       SQLite database    (default: ./vocabtoolkit.db)
  --help                 Show this help
`.trim();

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string" },
    "storage-path": { type: "string", default: "./data" },
    "db-path": { type: "string", default: "./vocabtoolkit.db" },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const [command, arg] = positionals;
if (!command) {
  console.error(USAGE);
  process.exit(1);
}

function readJson(path: string, what: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `cannot read ${what} ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function requireArg(name: string): string {
  if (!arg) throw new ConfigurationError(`${command} needs a ${name}`);
  return arg;
}

const config = values.config
  ? readJson(values.config, "config file")
  : {
      storage: { provider: "disk", config: { basePath: values["storage-path"] } },
      db: { provider: "sqlite", config: { path: values["db-path"] } },
    };

let toolkit: VocabToolkit | undefined;
try {
  toolkit = await VocabToolkit.fromConfig(config);

  switch (command) {
    case "run": {
      const { taskId, results } = await toolkit.runTask(readJson(requireArg("task file"), "task file"));
      console.log(`Task ${taskId}`);
      for (const [label, outcome] of flattenResults(results)) {
        console.log(`  ${label}: ${outcome}`);
      }
      if (results.status === "error") process.exitCode = 1;
      break;
    }
    case "status": {
      const record = await toolkit.getTask(requireArg("task id"));
      console.log(JSON.stringify(record, null, 2));
      break;
    }
    case "list": {
      for (const record of await toolkit.getAllTasks()) {
        console.log(
          `${record.taskId}  ${record.info.vocabularyId}/${record.info.versionId}  ${record.status}`,
        );
      }
      break;
    }
    case "recover": {
      const recovered = await toolkit.recoverOrphanedTasks();
      console.log(`Recovered ${recovered.length} task(s)`);
      break;
    }
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      process.exitCode = 1;
  }
} catch (err) {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
  process.exitCode = 1;
} finally {
  await toolkit?.close();
}
