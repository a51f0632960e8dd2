#!/usr/bin/env node
import { Command, InvalidArgumentError, type OptionValues } from "commander";
import chalk from "chalk";
import clipboard from "clipboardy";
import path from "node:path";
import fs from "node:fs/promises";
import {
  loadConfig,
  writeDefaultConfig,
  writeDefaultGlobalConfig,
  type ConfigLayer,
  type RepoBriefConfig
} from "./lib/config.js";
import { generateProjectPrompt, PROJECT_PROMPT_FILE, writeDocument } from "./lib/document.js";
import { ConfigurationError, RemoteError } from "./lib/errors.js";
import { renderJson, renderMarkdown } from "./lib/format.js";
import type { LedgerSummary } from "./lib/ledger.js";
import { assembleContext, closeSession, openSession, scanProject, type Session } from "./lib/pipeline.js";
import { categorize, CATEGORY_WEIGHTS } from "./lib/strategies/ruleBased.js";
import { errorMessage, padPlain } from "./lib/utils.js";

const program = new Command();
// Friendlier error UX
program.showHelpAfterError();
program.configureOutput({
  outputError: (str, write) => write(chalk.red(str))
});

function osc52Copy(text: string): boolean {
  // Only emit OSC52 when stdout is a TTY to avoid corrupting piped output
  if (!process.stdout.isTTY) return false;
  const b64 = Buffer.from(text, "utf8").toString("base64");
  process.stdout.write(`\u001b]52;c;${b64}\u0007`);
  return true;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (Number.isNaN(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

// Variadic flags may also carry comma-separated values
function listOption(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.flatMap((x) => String(x).split(",").map((s) => s.trim()).filter(Boolean));
}

function resolveCwd(dirArg: string | undefined, opts: OptionValues): string {
  const flag = typeof opts.cwd === "string" ? opts.cwd : "";
  return path.resolve(process.cwd(), flag || dirArg || ".");
}

/** CLI flags as the highest config layer; absent flags stay undefined and are dropped. */
function overridesFrom(opts: OptionValues): ConfigLayer {
  return {
    selectionMode: opts.mode,
    includePatterns: listOption(opts.include),
    excludePatterns: listOption(opts.exclude),
    useIgnoreFiles: opts.ignoreFiles === false ? false : undefined,
    tokenLimit: opts.tokenLimit,
    bufferFraction: opts.bufferFraction,
    maxVectorFiles: opts.maxVectorFiles,
    minSimilarity: opts.minSimilarity,
    embeddingModel: opts.embeddingModel,
    generativeModel: opts.model,
    encoding: opts.encoding,
    maxBytesPerFile: opts.maxBytesPerFile,
    debugRemoteCalls: opts.debugRemoteCalls === true ? true : undefined,
    logLevel: opts.logLevel,
    logFile: opts.logFile,
    format: opts.format,
    outFile: opts.out
  };
}

function withSelectionOptions(cmd: Command): Command {
  return cmd
    .option("-C, --cwd <dir>", "working directory (defaults to dir)", "")
    .option("--mode <mode>", "file selection: vector | ai | auto | rules")
    .option("--include <globs...>", "include globs (comma or space separated)")
    .option("--exclude <globs...>", "extra ignore patterns (comma or space separated)")
    .option("--no-ignore-files", "do not read .gitignore / .repobriefignore")
    .option("--token-limit <n>", "hard token ceiling", parseNumber)
    .option("--buffer-fraction <f>", "share of the limit kept free", parseNumber)
    .option("--max-vector-files <n>", "top-K files kept by vector search", parseNumber)
    .option("--min-similarity <f>", "minimum similarity for vector search", parseNumber)
    .option("--embedding-model <name>", `embedding model, or "keyword" for local embeddings`)
    .option("--model <name>", "generative model")
    .option("--encoding <name>", "tiktoken encoding for token counts")
    .option("--max-bytes-per-file <n>", "skip files larger than this", parseNumber)
    .option("--debug-remote-calls", "save every prompt and response under the debug directory")
    .option("--log-level <level>", "debug | info | warn | error | silent")
    .option("--log-file <path>", "also append log lines to this file");
}

function printUsage(summary: LedgerSummary) {
  const remote = summary.records.filter((r) => !r.operation.startsWith("load:"));
  const loads = summary.records.filter((r) => r.operation.startsWith("load:"));
  const headers = ["Operation", "Outcome", "In", "Out", "ms"];
  const colW = [32, 10, 10, 10, 8];

  if (remote.length) {
    const headerRaw = headers.map((h, i) => padPlain(h, colW[i])).join("  ");
    console.error("\n" + headers.map((h, i) => chalk.bold(padPlain(h, colW[i]))).join("  "));
    console.error("-".repeat(headerRaw.length));
    for (const r of remote) {
      const outcome = padPlain(r.outcome, colW[1]);
      const colored = r.outcome === "success" ? chalk.green(outcome) : r.outcome === "retry" ? chalk.yellow(outcome) : chalk.red(outcome);
      console.error(
        [
          padPlain(r.operation, colW[0]),
          colored,
          padPlain(String(r.inputTokens), colW[2]),
          padPlain(String(r.outputTokens), colW[3]),
          padPlain(String(r.latencyMs), colW[4])
        ].join("  ")
      );
    }
  }
  const loaded = loads.filter((r) => r.outcome === "success");
  const t = summary.totals;
  console.error(
    chalk.gray(
      `\nfiles loaded=${loaded.length} skipped=${loads.length - loaded.length}  remote calls=${t.remoteCalls} failures=${t.failures}  ` +
        `tokens in=${t.inputTokens} out=${t.outputTokens} (${summary.tokenSource})`
    )
  );
}

async function withSession<T>(config: RepoBriefConfig, fn: (session: Session) => Promise<T>): Promise<T> {
  const session = await openSession(config);
  try {
    return await fn(session);
  } finally {
    printUsage(await closeSession(session));
  }
}

function fail(e: unknown) {
  if (e instanceof ConfigurationError) console.error(chalk.red(`Configuration error: ${e.message}`));
  else if (e instanceof RemoteError) console.error(chalk.red(`Remote call failed: ${e.message}`));
  else console.error(chalk.red(errorMessage(e)));
  process.exitCode = 1;
}

program
  .name("repobrief")
  .description("Select, rank and pack the files that matter into one token-bounded context document.")
  .version("0.1.0");

program
  .command("init")
  .description("Create a .repobriefrc.json with sensible defaults")
  .option("-C, --cwd <dir>", "working directory", ".")
  .option("--global", "write to ~/.repobrief/config.json instead of local .repobriefrc.json", false)
  .action(async (opts: OptionValues) => {
    try {
      const p = opts.global ? await writeDefaultGlobalConfig() : await writeDefaultConfig(resolveCwd(undefined, opts));
      console.log(chalk.green(`Created ${p}`));
    } catch (e) {
      fail(e);
    }
  });

program
  .command("scan [dir]")
  .description("List the files that survive the ignore rules, with their rule-based weight")
  .option("-C, --cwd <dir>", "working directory (defaults to dir)", "")
  .option("--include <globs...>", "include globs (comma or space separated)")
  .option("--exclude <globs...>", "extra ignore patterns (comma or space separated)")
  .option("--no-ignore-files", "do not read .gitignore / .repobriefignore")
  .option("--log-level <level>", "debug | info | warn | error | silent")
  .option("--json", "output JSON instead of a table", false)
  .action(async (dirArg: string | undefined, opts: OptionValues) => {
    try {
      const cwd = resolveCwd(dirArg, opts);
      const config = await loadConfig(cwd, { env: process.env, overrides: { ...overridesFrom(opts), selectionMode: "rules" } });
      await withSession(config, async (session) => {
        const { fileTree, readme } = await scanProject(session);
        const rows = fileTree.map((p) => {
          const category = categorize(p);
          return { path: p, category, weight: CATEGORY_WEIGHTS[category] };
        });

        if (opts.json) {
          console.log(JSON.stringify({ files: rows, readme: readme?.path ?? null }, null, 2));
          return;
        }
        const colW = [56, 10, 8];
        console.log(["Path", "Category", "Weight"].map((h, i) => chalk.bold(padPlain(h, colW[i]))).join("  "));
        console.log("-".repeat(colW.reduce((a, b) => a + b + 2, -2)));
        for (const r of rows) {
          const weight = padPlain(String(r.weight), colW[2]);
          console.log([padPlain(r.path, colW[0]), padPlain(r.category, colW[1]), r.weight ? weight : chalk.gray(weight)].join("  "));
        }
        console.log("\n" + chalk.bold("TOTAL") + `  files=${chalk.cyan(rows.length)}`);
      });
    } catch (e) {
      fail(e);
    }
  });

withSelectionOptions(
  program
    .command("pack [dir]")
    .description("Select files and pack them into one bundle under the token budget")
)
  .option("-f, --format <fmt>", "markdown | json")
  .option("-o, --out <file>", "write the bundle to a file")
  .option("--stdout", "write to stdout (the default without -o or --clip)", false)
  .option("--clip", "copy the bundle to the clipboard", false)
  .action(async (dirArg: string | undefined, opts: OptionValues) => {
    try {
      const cwd = resolveCwd(dirArg, opts);
      const config = await loadConfig(cwd, { env: process.env, overrides: overridesFrom(opts) });
      await withSession(config, async (session) => {
        const { context } = await assembleContext(session);
        const text =
          config.format === "json" ? renderJson(context, session.projectName) : renderMarkdown(context, session.projectName);

        if (config.outFile) {
          const target = path.resolve(cwd, config.outFile);
          await fs.writeFile(target, text, "utf8");
          console.error(chalk.green(`Wrote ${target}`));
        }
        if (opts.stdout || (!config.outFile && !opts.clip)) {
          process.stdout.write(text);
          if (!text.endsWith("\n")) process.stdout.write("\n");
        }
        if (opts.clip) {
          try {
            await clipboard.write(text);
            console.error(chalk.green("Copied to clipboard."));
          } catch (e) {
            // Try OSC52 fallback
            if (osc52Copy(text)) console.error(chalk.green("Copied to clipboard via OSC52."));
            else console.error(chalk.yellow(`Clipboard copy failed: ${errorMessage(e)}`));
          }
        }
        console.error(
          chalk.gray(
            `\nstrategy=${context.strategy}  selected=${context.selected.length}/${context.fileTree.length}  ` +
              `tokens=${context.totalTokens}+${context.reservedTokens} of ${Math.floor(context.budget)}  skipped=${context.skipped.length}`
          )
        );
      });
    } catch (e) {
      fail(e);
    }
  });

withSelectionOptions(
  program
    .command("generate [dir]")
    .description(`Ask the model for a ${PROJECT_PROMPT_FILE} describing the project`)
)
  .option("-o, --out <file>", "output file, relative to the project", PROJECT_PROMPT_FILE)
  .action(async (dirArg: string | undefined, opts: OptionValues) => {
    try {
      const cwd = resolveCwd(dirArg, opts);
      const config = await loadConfig(cwd, { env: process.env, overrides: overridesFrom(opts), requireGenerator: true });
      await withSession(config, async (session) => {
        const { context } = await assembleContext(session);
        const doc = await generateProjectPrompt(session, context);
        const target = await writeDocument(cwd, doc.content, config.outFile ?? PROJECT_PROMPT_FILE);
        const note = doc.source === "model" ? chalk.green(`Wrote ${target}`) : chalk.yellow(`Wrote fallback document ${target}`);
        console.error(note);
      });
    } catch (e) {
      fail(e);
    }
  });

program.parseAsync(process.argv).catch(fail);

