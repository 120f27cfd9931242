#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { deploy } from "./commands/deploy.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./report/reporter.js";

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("must be a positive number of seconds");
  }
  return n;
}

const program = new Command();

program
  .name("stackctl")
  .description("Deploy the document-processing stack with Docker Compose")
  .version("0.1.0")
  // Usage errors exit 2; --help and --version keep commander's 0.
  .exitOverride((err) => process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS));

program
  .command("deploy", { isDefault: true })
  .description("Check the host, rebuild and restart the stack, then wait until it is healthy")
  .option("--project-dir <path>", "Directory holding the compose file and .env", ".")
  .option("--config <path>", "Settings directory (defaults to the bundled config/)")
  .option("--env <name>", "Settings overlay to apply, e.g. production")
  .option("-y, --yes", "Deploy without asking for confirmation")
  .option("--timeout <seconds>", "Maximum time to wait for the stack to become healthy", parseSeconds)
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .action(
    async (opts: { projectDir: string; config?: string; env?: string; yes?: boolean; timeout?: number; format: OutputFormat }) => {
      const res = await deploy({
        projectDir: opts.projectDir,
        configDir: opts.config,
        env: opts.env,
        yes: opts.yes,
        timeoutSeconds: opts.timeout,
        format: opts.format,
      });

      // Run outcomes have already been rendered by the reporter.
      if (!res.ok && !res.outcome) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: "DEPLOY_ERROR", message: res.error }) + "\n");
        } else {
          console.error(res.error);
        }
      }
      process.exitCode = res.exitCode;
    }
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
