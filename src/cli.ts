import { homedir } from "node:os";

import { log } from "@clack/prompts";
import { Command, CommanderError } from "commander";

import { runAdd } from "./commands/add.js";
import { runCreate } from "./commands/create.js";
import { runList } from "./commands/list.js";
import { describeErrorChain, normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { AddCommandOptions, CreateCommandOptions, ListCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  teal: "\u001B[38;5;37m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function renderBrandHeader(): void {
  const rows: Array<{ plain: string; styled: string }> = [
    { plain: "stackwright", styled: paint("stackwright", ANSI.bold, ANSI.teal) },
    { plain: "Next.js scaffolds and features", styled: paint("Next.js scaffolds and features", ANSI.white) },
    ...[
      ["version", `v${CLI_VERSION}`],
      ["directory", compactPath(process.cwd())]
    ].map(([label = "", value = ""]) => {
      const labelBlock = `${label}:`.padEnd(11, " ");
      return { plain: `${labelBlock}${value}`, styled: `${paint(labelBlock, ANSI.mutedGray)}${paint(value, ANSI.white)}` };
    })
  ];

  const width = Math.min(Math.max(...rows.map((row) => row.plain.length)), Math.max(36, (process.stdout.columns ?? 80) - 4));
  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(width + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    console.log(`${vertical} ${row.styled}${" ".repeat(Math.max(0, width - row.plain.length))} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(width + 2)}╯`, ANSI.borderGray));
  console.log("");
}

program
  .name("stackwright")
  .description("Scaffold Next.js projects and add UI kits or Drizzle ORM with one command.")
  .version(CLI_VERSION)
  .exitOverride();

program
  .command("create")
  .description("Create a new Next.js project and remember its package manager.")
  .option("-n, --name <name>", "Project (folder) name")
  .option("-p, --package-manager <pm>", "npm | yarn | pnpm | bun")
  .action(async (rawOptions: CreateCommandOptions) => {
    renderBrandHeader();
    await runCreate(rawOptions);
  });

program
  .command("add")
  .description("Add a feature to the Next.js project in the current directory.")
  .option("-f, --feature <name>", "shadcn | magicui | drizzle")
  .option("--provider <id>", "Database provider for the drizzle feature")
  .action(async (rawOptions: AddCommandOptions) => {
    renderBrandHeader();
    await runAdd(rawOptions);
  });

program
  .command("list")
  .description("List the features that can be added.")
  .option("--format <format>", "text | json", "text")
  .action((rawOptions: ListCommandOptions) => {
    runList(rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // --help and --version also arrive here under exitOverride.
    if (error instanceof CommanderError && error.exitCode === 0) return;

    // commander prints its own usage errors in text mode.
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      console.error(JSON.stringify(toJsonErrorPayload(normalized), null, 2));
    } else if (!(error instanceof CommanderError)) {
      const [message = normalized.message, ...causes] = describeErrorChain(normalized);
      log.error([message, ...causes.map((cause) => `Caused by: ${cause}`)].join("\n"));
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
