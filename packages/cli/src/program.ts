/**
 * Todo Query CLI program: commands, options and the top-level error handler
 */

import { Command, CommanderError } from "commander";
import type { QueryParams, TodoQueries } from "@todoquery/sdk";
import { resolveRoot, isVerbose } from "./lib/env.js";
import { EXIT_CODE, mapSdkErrorToExitCode, formatCliError, type ExitCode } from "./lib/errors.js";
import { writeStderr, writeStdout, type Writer } from "./lib/io.js";
import { colorize, renderJson } from "./lib/render.js";
import { openFileStore, withQueries, type StoreOpener } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";

export const CLI_VERSION = "0.1.0";

export interface ProgramOptions {
  /** Store factory; defaults to the file-backed store */
  openStore?: StoreOpener;
  stdout?: Writer;
  stderr?: Writer;
}

type GlobalOptions = {
  root?: string;
  verbose?: boolean;
};

interface OutputOptions {
  raw?: boolean;
}

const LIST_PARAMS = ["owner", "category", "status", "body", "contains", "sortby", "sortorder"] as const;

type ListOptions = OutputOptions & Partial<Record<(typeof LIST_PARAMS)[number], string>>;

interface GroupOptions extends OutputOptions {
  sortBy?: string;
  sortOrder?: string;
}

function listParams(opts: ListOptions): QueryParams {
  const params: QueryParams = {};
  for (const key of LIST_PARAMS) {
    params[key] = opts[key];
  }
  return params;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const openStore = options.openStore ?? openFileStore;
  const stdout = options.stdout ?? writeStdout;
  const stderr = options.stderr ?? writeStderr;

  const program = new Command();

  // Set before adding commands so subcommands inherit them
  program
    .configureOutput({
      writeOut: stdout,
      writeErr: (str) => stderr(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("todoquery")
    .description("Todo Query - look up, filter and summarize todo records")
    .version(CLI_VERSION)
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics");

  async function run(label: string, raw: boolean | undefined, fn: (queries: TodoQueries) => Promise<unknown>) {
    const globals = program.opts<GlobalOptions>();
    const root = resolveRoot(globals.root);

    await withTiming(
      label,
      async () => {
        const result = await withQueries(root, openStore, fn);
        stdout(renderJson(result, { raw }) + "\n");
      },
      { verbose: isVerbose(globals.verbose), write: stderr }
    );
  }

  program
    .command("get <id>")
    .description("Retrieve a todo by its 24-character hexadecimal id")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (id: string, opts: OutputOptions) => {
      await run("cli.get", opts.raw, (queries) => queries.getTodo(id));
    });

  program
    .command("list")
    .description("List todos, filtered and sorted (default: by category, ascending)")
    .option("--owner <name>", "Owner name (whole value, case-insensitive)")
    .option("--category <name>", "Category name (whole value, case-insensitive)")
    .option("--status <status>", "complete or incomplete")
    .option("--body <text>", "Text the body contains (case-insensitive)")
    .option("--contains <text>", "Alias for --body")
    .option("--sortby <field>", "id, owner, status, body or category")
    .option("--sortorder <order>", "desc for descending; anything else sorts ascending")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (opts: ListOptions) => {
      await run("cli.list", opts.raw, (queries) => queries.listTodos(listParams(opts)));
    });

  program
    .command("by-owner")
    .description("Group todos by owner")
    .option("--sort-by <field>", "owner (default) or count")
    .option("--sort-order <order>", "desc for descending; anything else sorts ascending")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (opts: GroupOptions) => {
      await run("cli.by_owner", opts.raw, (queries) =>
        queries.todosByOwner({ sortBy: opts.sortBy, sortOrder: opts.sortOrder })
      );
    });

  program
    .command("by-category")
    .description("Group todos by category")
    .option("--sort-by <field>", "category (default) or count")
    .option("--sort-order <order>", "desc for descending; anything else sorts ascending")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (opts: GroupOptions) => {
      await run("cli.by_category", opts.raw, (queries) =>
        queries.todosByCategory({ sortBy: opts.sortBy, sortOrder: opts.sortOrder })
      );
    });

  return program;
}

/**
 * Parse and run a command line (arguments after the executable and script)
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], options: ProgramOptions = {}): Promise<ExitCode> {
  const program = createProgram(options);
  const stderr = options.stderr ?? writeStderr;

  try {
    await program.parseAsync(argv, { from: "user" });
    return EXIT_CODE.OK;
  } catch (err) {
    // Commander has already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      const verbose = isVerbose(program.opts<GlobalOptions>().verbose);
      stderr(`Error: ${formatCliError(err, verbose)}\n`);
    }
    return mapSdkErrorToExitCode(err);
  }
}
