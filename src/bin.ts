#!/usr/bin/env node
import { existsSync, readFileSync, rmSync } from "fs";
import { dirname, join, resolve } from "path";
import pc from "picocolors";
import sade from "sade";
import { fileURLToPath } from "url";
import { z } from "zod";

import { errorMessage } from "./errors.js";
import { initSite } from "./init.js";
import { serve } from "./serve.js";
import { Site, buildSite } from "./site.js";
import { BuildReport } from "./typings.js";

function readVersion(): string {
  const manifest = z.object({ version: z.string() });
  // src/ when run from sources, dist/src/ once built
  for (let dir = dirname(fileURLToPath(import.meta.url)); ; dir = dirname(dir)) {
    const file = join(dir, "package.json");
    if (existsSync(file)) return manifest.parse(JSON.parse(readFileSync(file, "utf-8"))).version;
    if (dirname(dir) === dir) return "0.0.0";
  }
}

interface GlobalOptions {
  root: string;
}

interface OutputOptions extends GlobalOptions {
  output: string;
  drafts: boolean;
}

interface RunOptions extends OutputOptions {
  /** `--no-exec` */
  exec?: boolean;
  sandbox?: string;
}

interface BuildFlags extends RunOptions {
  "base-url"?: string;
}

interface PreviewFlags extends RunOptions {
  port: number;
  interface: string;
  open: boolean;
}

function run<A extends unknown[]>(action: (...args: A) => Promise<void> | void) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (e) {
      console.error(pc.red(`error: ${errorMessage(e)}`));
      process.exit(1);
    }
  };
}

function summarize(report: BuildReport): string {
  let text = `${report.pages} pages, ${report.sections} sections`;
  if (report.warnings.length > 0) {
    text += pc.yellow(`, ${report.warnings.length} warning${report.warnings.length === 1 ? "" : "s"}`);
  }
  return text;
}

const prog = sade("kiln");

prog
  .version(readVersion())
  .describe("Static site generator with executable code blocks.")
  .option("-r, --root", "Site root directory", ".");

prog
  .command("build")
  .describe("Build the site")
  .option("-o, --output", "Output directory", "public")
  .option("--drafts", "Include draft pages", false)
  .option("--no-exec", "Show executable code blocks without running them")
  .option("--sandbox", "Directory the include shortcode may read from (default: the site root)")
  .option("--base-url", "Override base_url from config.toml")
  .example("build --base-url https://example.org")
  .action(
    run(async (options: BuildFlags) => {
      const root = resolve(options.root);
      const output = resolve(root, options.output);
      const report = await buildSite(
        { root, output, drafts: options.drafts, noExec: options.exec === false, sandbox: options.sandbox },
        undefined,
        options["base-url"],
      );
      console.log(`site built to ${output} (${summarize(report)})`);
    }),
  );

prog
  .command("preview")
  .describe("Serve the site, rebuilding and reloading on changes")
  .option("-p, --port", "Port number", 1111)
  .option("--interface", "Bind address", "127.0.0.1")
  .option("-O, --open", "Open a browser", false)
  .option("-o, --output", "Output directory", "public")
  .option("--drafts", "Include draft pages", false)
  .option("--no-exec", "Show executable code blocks without running them")
  .option("--sandbox", "Directory the include shortcode may read from (default: the site root)")
  .example("preview --open")
  .action(
    run(async (options: PreviewFlags) => {
      const preview = await serve({
        root: resolve(options.root),
        output: options.output,
        drafts: options.drafts,
        noExec: options.exec === false,
        sandbox: options.sandbox,
        port: Number(options.port),
        interface: String(options.interface),
        open: options.open,
      });
      process.once("SIGINT", () => {
        console.log("\nshutting down...");
        preview.close().then(
          () => process.exit(0),
          (e: unknown) => {
            console.error(pc.red(`error: ${errorMessage(e)}`));
            process.exit(1);
          },
        );
      });
    }),
  );

prog
  .command("clean")
  .describe("Remove the output directory")
  .option("-o, --output", "Output directory", "public")
  .action(
    run((options: OutputOptions) => {
      const output = resolve(options.root, options.output);
      if (existsSync(output)) {
        rmSync(output, { recursive: true, force: true });
        console.log(`removed ${output}`);
      }
    }),
  );

prog
  .command("init [name]")
  .describe("Create a new site")
  .example("init my-site")
  .action(
    run((name: string | undefined, options: GlobalOptions) => {
      const target = resolve(options.root, name ?? ".");
      initSite(target);
      console.log(`initialized new site at ${target}`);
    }),
  );

prog
  .command("check")
  .describe("Check the site for errors without writing output")
  .option("--drafts", "Include draft pages", false)
  .action(
    run((options: OutputOptions) => {
      const root = resolve(options.root);
      const report = Site.load(root, join(root, "public"), options.drafts).check();
      console.log(`site check passed (${summarize(report)})`);
    }),
  );

prog.parse(process.argv);
