import { spawnSync } from "child_process";
import { existsSync, readFileSync, realpathSync, statSync } from "fs";
import { dirname, join, resolve, sep } from "path";

import { errorMessage } from "./errors.js";
import { ExecutableBlock } from "./typings.js";

type Runner = { kind: "shell"; program: "bash" | "sh" } | { kind: "python" } | { kind: "unsupported"; language: string };

function runnerFor(language: string): Runner {
  switch (language) {
    case "bash":
    case "sh":
      return { kind: "shell", program: language };
    case "python":
      return { kind: "python" };
    default:
      return { kind: "unsupported", language };
  }
}

interface Captured {
  stdout: string;
  stderr: string;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/** Nearest `.venv` at or above `root`, else `$VIRTUAL_ENV`. */
export function findVirtualEnv(root: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (let dir = resolve(root); ; dir = dirname(dir)) {
    const candidate = join(dir, ".venv");
    if (isDirectory(candidate)) return candidate;
    if (dirname(dir) === dir) break;
  }
  return env.VIRTUAL_ENV || undefined;
}

/**
 * Process-wide execution state: the interpreter chosen for `{python}` blocks
 * and a guard that keeps block execution strictly sequential.
 *
 * Build one per process and pass it to every build.
 */
export class ExecutionContext {
  private python: string | undefined;
  private running = false;

  constructor(
    readonly siteRoot: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  static create(siteRoot: string): ExecutionContext {
    return new ExecutionContext(siteRoot);
  }

  /** Environment discovery runs once, on first use. */
  pythonInterpreter(): string {
    if (this.python === undefined) {
      const venv = findVirtualEnv(this.siteRoot, this.env);
      const candidate = venv && join(venv, process.platform === "win32" ? "Scripts/python.exe" : "bin/python");
      this.python = candidate && existsSync(candidate) ? candidate : "python3";
      if (venv) {
        console.log(`activated virtual environment at ${venv}`);
      }
    }
    return this.python;
  }

  /** @internal */
  enter(): void {
    if (this.running) {
      throw new Error("code blocks must run one at a time, execution is already in progress");
    }
    this.running = true;
  }

  /** @internal */
  exit(): void {
    this.running = false;
  }
}

function spawnCaptured(command: string, args: string[], input: string | undefined, cwd: string): Captured {
  const result = spawnSync(command, args, { cwd, input, maxBuffer: 64 * 1024 * 1024 });
  if (result.error) throw result.error;
  // Buffer#toString replaces invalid UTF-8 sequences
  const stdout = result.stdout.toString("utf-8");
  let stderr = result.stderr.toString("utf-8");
  if (!stderr && result.status !== 0) {
    stderr = result.status === null ? `killed by ${result.signal}` : `exited with status ${result.status}`;
  }
  return { stdout, stderr };
}

function sourceOf(block: ExecutableBlock, workingDir: string, sandbox: string): string {
  if (block.fileRef === undefined) return block.source;
  const file = join(workingDir, block.fileRef);
  if (!existsSync(file)) throw new Error(`referenced file not found: ${block.fileRef}`);
  const canonical = realpathSync(file);
  const root = realpathSync(sandbox);
  if (!canonical.startsWith(root.endsWith(sep) ? root : root + sep)) {
    throw new Error(`referenced file ${block.fileRef} resolves outside the sandbox ${root}`);
  }
  return readFileSync(canonical, "utf-8");
}

function runBlock(block: ExecutableBlock, workingDir: string, sandbox: string, ctx: ExecutionContext): Captured {
  const runner = runnerFor(block.language);
  switch (runner.kind) {
    case "shell":
      return spawnCaptured(runner.program, ["-c", sourceOf(block, workingDir, sandbox)], undefined, workingDir);
    case "python":
      // the program comes in on stdin so tracebacks point at "<stdin>"
      return spawnCaptured(ctx.pythonInterpreter(), ["-"], sourceOf(block, workingDir, sandbox), workingDir);
    case "unsupported":
      throw new Error(`Unsupported executable language: ${runner.language}`);
  }
}

/**
 * Run every block in order, filling in `output` and `error`.
 *
 * Failures never throw, they land on the block; the returned messages are
 * meant for build warnings. `file="..."` references must stay under
 * `sandbox`, the site root unless given.
 */
export function executeBlocks(
  blocks: ExecutableBlock[],
  workingDir: string,
  ctx: ExecutionContext,
  sandbox = ctx.siteRoot,
): string[] {
  const errors: string[] = [];
  ctx.enter();
  try {
    blocks.forEach((block, i) => {
      try {
        const { stdout, stderr } = runBlock(block, workingDir, sandbox, ctx);
        block.output = stdout;
        if (stderr) {
          block.error = stderr;
          errors.push(`block ${i} (${block.language}): ${stderr.trim()}`);
        }
      } catch (e) {
        block.error = errorMessage(e);
        errors.push(`block ${i} (${block.language}): ${block.error}`);
      }
    });
  } finally {
    ctx.exit();
  }
  return errors;
}
