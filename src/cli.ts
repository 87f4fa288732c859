#!/usr/bin/env node

import { Command } from "commander";
import { createReporter, type OutputFormat } from "./core/diagnostics.js";
import { DEFAULT_CONFIG_DIR } from "./config/loader.js";
import { lockProject } from "./commands/lock.js";
import { verifyProject } from "./commands/verify.js";
import { applyProject } from "./commands/apply.js";
import { validateLock } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";

type GlobalOpts = { config: string; env?: string };

const program = new Command();

program
  .name("devboxctl")
  .description("Lock, verify and reconcile the package state of devbox sandboxes")
  .version("0.1.0")
  .option("--config <dir>", "Config directory", DEFAULT_CONFIG_DIR)
  .option("--env <name>", "Overlay <config>/<name>.yaml on base.yaml");

function formatOf(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  process.stderr.write(`Unknown format '${value}' (expected human or jsonl)\n`);
  process.exit(EXIT.INVALID_ARGS);
}

function fail(format: OutputFormat, error: string, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: "FAILED", message: error, exitCode }) + "\n");
  } else {
    console.error(error);
  }
  process.exit(exitCode);
}

function globals(): GlobalOpts {
  return program.opts<GlobalOpts>();
}

program
  .command("lock")
  .description("Capture the sandbox's package, registry and source state into a lock file")
  .argument("<project>", "Project name")
  .option("-o, --output <path>", "Output path (default: <workspace>/devbox.lock.json)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (project: string, opts: { output?: string; format: string }) => {
    const format = formatOf(opts.format);
    const g = globals();
    const res = await lockProject({
      project,
      output: opts.output,
      configDir: g.config,
      envName: g.env,
      logger: createReporter(format),
    });
    if (!res.ok) fail(format, res.error, res.exitCode);
  });

program
  .command("verify")
  .description("Compare the sandbox against its lock file; exits non-zero on any drift")
  .argument("<project>", "Project name")
  .option("--lock <path>", "Lock file (default: <workspace>/devbox.lock.json)")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (project: string, opts: { lock?: string; format: string }) => {
    const format = formatOf(opts.format);
    const g = globals();
    const report = createReporter(format);
    const res = await verifyProject({ project, lock: opts.lock, configDir: g.config, envName: g.env, logger: report });
    if (!res.ok) fail(format, res.error, res.exitCode);
    report({ level: "info", code: "OK", message: `Environment matches ${res.path}`, path: res.path });
  });

program
  .command("apply")
  .description("Restore registries and sources, then install and remove packages to match the lock file")
  .argument("<project>", "Project name")
  .option("--lock <path>", "Lock file (default: <workspace>/devbox.lock.json)")
  .option("--dry-run", "Print planned commands without running them")
  .option("--skip-sources", "Leave registry and apt source configuration untouched")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (project: string, opts: { lock?: string; dryRun?: boolean; skipSources?: boolean; format: string }) => {
      const format = formatOf(opts.format);
      const g = globals();
      const report = createReporter(format);
      const res = await applyProject({
        project,
        lock: opts.lock,
        dryRun: opts.dryRun,
        skipSources: opts.skipSources,
        configDir: g.config,
        envName: g.env,
        logger: report,
      });
      if (!res.ok) fail(format, res.error, res.exitCode);
      const actions = res.result.groups.reduce((n, g) => n + g.actions.length, 0);
      report({
        level: "info",
        code: "OK",
        message: opts.dryRun ? `${actions} action(s) planned` : `Applied ${actions} action(s); run verify to confirm`,
        path: res.path,
      });
    },
  );

program
  .command("validate")
  .description("Check a lock file's version, schema and package strings")
  .argument("<file>", "Lock file path")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (file: string, opts: { format: string }) => {
    const format = formatOf(opts.format);
    const report = createReporter(format);
    const res = await validateLock({ file });
    if (!res.ok) {
      for (const err of res.errors) report(err);
      process.exit(res.exitCode);
    }
    report({ level: "info", code: "OK", message: "OK" });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
