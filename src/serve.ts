import { batch } from "@hyrious/utils";
import { spawn } from "child_process";
import { watch, type FSWatcher } from "chokidar";
import { existsSync, readFileSync, realpathSync, statSync } from "fs";
import { createServer, type IncomingMessage, type RequestListener, type Server as HttpServer, type ServerResponse } from "http";
import _ from "lodash";
import { join, resolve, sep } from "path";
import pc from "picocolors";
import sirv from "sirv";
import { Server } from "socket.io";

import { CONFIG_FILE } from "./config.js";
import { errorMessage } from "./errors.js";
import { ExecutionContext } from "./execute.js";
import { buildSite } from "./site.js";
import { BuildOptions, BuildReport } from "./typings.js";

export const LIVERELOAD_PATH = "/__livereload";
export const DEBOUNCE_MS = 300;

const WATCHED = ["content", "templates", "sass", "static", CONFIG_FILE];

const LIVERELOAD_SCRIPT = `
<script src="${LIVERELOAD_PATH}/socket.io.js"></script>
<script>
io({ path: "${LIVERELOAD_PATH}" }).on("reload", function () {
  location.reload();
});
</script>
`;

export interface ServeOptions extends BuildOptions {
  /** default: 127.0.0.1 */
  interface?: string;
  /** default: 1111, 0 picks a free port */
  port?: number;
  /** open the site in a browser once it is up */
  open?: boolean;
}

/** Put the reload script before the last `</body>`, or at the end without one. */
export function injectReloadScript(html: string): string {
  const pos = html.lastIndexOf("</body>");
  if (pos === -1) return html + LIVERELOAD_SCRIPT;
  return html.slice(0, pos) + LIVERELOAD_SCRIPT + html.slice(pos);
}

function isWithin(dir: string, file: string): boolean {
  return file === dir || file.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

/**
 * Map a request path to a file under `outputDir`, or `undefined` when there is
 * none or the path would leave the directory.
 */
export function resolveServePath(outputDir: string, requestPath: string): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return;
  }
  const segments = decoded.split("/").filter(Boolean);
  if (segments.some((s) => s === "." || s === ".." || s.includes("\\") || s.includes("\0"))) return;

  const candidate = join(outputDir, ...segments);
  if (existsSync(candidate)) {
    if (!isWithin(realpathSync(outputDir), realpathSync(candidate))) return;
    if (!statSync(candidate).isDirectory()) return candidate;
  }
  const index = join(candidate, "index.html");
  return existsSync(index) && statSync(index).isFile() ? index : undefined;
}

function sendHtml(res: ServerResponse, status: number, html: string, head: boolean): void {
  res.writeHead(status, { "Content-Type": "text/html; charset=utf-8", "Cache-Control": "no-store" });
  res.end(head ? undefined : html);
}

function notFound(outputDir: string, res: ServerResponse, head: boolean): void {
  const page = join(outputDir, "404.html");
  if (existsSync(page)) {
    sendHtml(res, 404, injectReloadScript(readFileSync(page, "utf-8")), head);
    return;
  }
  res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(head ? undefined : "Not Found");
}

/** HTML gets the reload script, everything else goes through sirv. */
export function createRequestHandler(outputDir: string): RequestListener {
  const assets = sirv(outputDir, { dev: true, dotfiles: false });
  return (req: IncomingMessage, res: ServerResponse) => {
    const head = req.method === "HEAD";
    if (req.method !== "GET" && !head) {
      res.writeHead(405, { Allow: "GET, HEAD" });
      res.end();
      return;
    }
    const path = (req.url ?? "/").split(/[?#]/)[0];
    const file = resolveServePath(outputDir, path);
    if (!file) {
      notFound(outputDir, res, head);
      return;
    }
    if (file.endsWith(".html")) {
      sendHtml(res, 200, injectReloadScript(readFileSync(file, "utf-8")), head);
      return;
    }
    assets(req, res, () => notFound(outputDir, res, head));
  };
}

/**
 * Collects file system events and hands them to `onChange` as one batch once
 * nothing has happened for `wait` milliseconds.
 */
export class WatchBridge {
  private readonly pending = new Set<string>();
  private readonly flush: _.DebouncedFunc<() => void>;
  private watcher: FSWatcher | undefined;
  /** settles once the initial scan is done and events are flowing */
  ready: Promise<void> = Promise.resolve();

  constructor(
    private readonly onChange: (paths: string[]) => void,
    wait = DEBOUNCE_MS,
  ) {
    this.flush = _.debounce(() => {
      const paths = [...this.pending];
      this.pending.clear();
      if (paths.length > 0) this.onChange(paths);
    }, wait);
  }

  /** Watch the site's sources under `root`. */
  static watch(root: string, onChange: (paths: string[]) => void, wait = DEBOUNCE_MS): WatchBridge {
    const bridge = new WatchBridge(onChange, wait);
    const paths = WATCHED.map((p) => join(root, p)).filter((p) => existsSync(p));
    const watcher = watch(paths, {
      ignoreInitial: true,
      ignored: ["**/.git/**", "**/node_modules/**", "**/.venv/**"],
      disableGlobbing: true,
      ignorePermissionErrors: true,
    });
    bridge.watcher = watcher;
    bridge.ready = new Promise((resolve) => watcher.once("ready", () => resolve()));
    watcher.on("all", (_event, path) => bridge.notify(path));
    watcher.on("error", (e) => console.error(pc.red(`watch error: ${errorMessage(e)}`)));
    return bridge;
  }

  notify(path: string): void {
    this.pending.add(path);
    this.flush();
  }

  async close(): Promise<void> {
    this.flush.cancel();
    this.pending.clear();
    await this.watcher?.close();
  }
}

/**
 * Full rebuilds, strictly one at a time. Changes that arrive mid-build are
 * collected and handled by a single follow-up run. A failed build is logged
 * and the previous output stays in place.
 */
export class Rebuilder {
  private readonly dirty = new Set<string>();
  private readonly refresh: () => void;
  private current: Promise<void> = Promise.resolve();
  private closed = false;
  /** successful rebuilds so far */
  succeeded = 0;

  constructor(
    private readonly rebuild: () => Promise<BuildReport>,
    private readonly reload: () => void,
  ) {
    this.refresh = batch(async () => {
      const run = this.run();
      this.current = run;
      await run;
    });
  }

  push(paths: string[]): void {
    if (this.closed || paths.length === 0) return;
    for (const path of paths) this.dirty.add(path);
    void this.refresh();
  }

  /** Stop taking changes and wait for the build in progress. */
  async close(): Promise<void> {
    this.closed = true;
    this.dirty.clear();
    await this.current;
  }

  private async run(): Promise<void> {
    const count = this.dirty.size;
    this.dirty.clear();
    if (this.closed || count === 0) return;
    console.log(pc.dim(`change detected (${count} file${count === 1 ? "" : "s"}), rebuilding...`));
    const start = Date.now();
    try {
      await this.rebuild();
    } catch (e) {
      console.error(pc.red(`build error: ${errorMessage(e)}`));
      return;
    }
    this.succeeded++;
    console.log(pc.green(`rebuilt in ${Date.now() - start}ms`));
    this.reload();
  }
}

function listen(server: HttpServer, host: string, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onListening = () => {
      server.off("error", onError);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    };
    const onError = (e: NodeJS.ErrnoException) => {
      server.off("listening", onListening);
      if (e.code === "EADDRINUSE" && port !== 0) {
        console.warn(pc.yellow(`port ${port} is in use, using a random available port...`));
        listen(server, host, 0).then(resolve, reject);
      } else {
        reject(e);
      }
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

function openBrowser(url: string): void {
  const [command, args] =
    process.platform === "darwin"
      ? ["open", [url]]
      : process.platform === "win32"
        ? ["cmd", ["/c", "start", "", url]]
        : ["xdg-open", [url]];
  const child = spawn(command, args, { stdio: "ignore", detached: true });
  child.on("error", (e) => console.warn(pc.yellow(`could not open a browser: ${e.message}`)));
  child.unref();
}

export interface Preview {
  url: string;
  report: BuildReport;
  close(): Promise<void>;
}

export async function serve(options: ServeOptions = {}): Promise<Preview> {
  const root = resolve(options.root ?? ".");
  const outputDir = resolve(root, options.output ?? "public");
  const host = options.interface ?? "127.0.0.1";

  const server = createServer(createRequestHandler(outputDir));
  const port = await listen(server, host, options.port ?? 1111);
  const url = `http://${host.includes(":") ? `[${host}]` : host}:${port}`;

  const exec = ExecutionContext.create(root);
  const rebuild = () => buildSite({ ...options, root, output: outputDir }, exec, url);

  console.log(pc.dim("building site..."));
  let report: BuildReport;
  try {
    report = await rebuild();
  } catch (e) {
    server.close();
    throw e;
  }
  console.log(`built ${report.pages} pages and ${report.sections} sections`);

  const io = new Server(server, { path: LIVERELOAD_PATH, serveClient: true });
  const rebuilder = new Rebuilder(rebuild, () => io.emit("reload"));
  const bridge = WatchBridge.watch(root, (paths) => rebuilder.push(paths));
  await bridge.ready;

  console.log(`serving at ${pc.cyan(url)}`);
  if (options.open) openBrowser(url);

  return {
    url,
    report,
    async close() {
      await bridge.close();
      await rebuilder.close();
      const closed = new Promise<void>((resolve) => io.close(() => resolve()));
      server.closeAllConnections();
      await closed;
    },
  };
}
