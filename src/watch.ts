import { watch } from "chokidar";
import { spawn } from "child_process";
import { statSync } from "fs";
import { createServer } from "http";
import sirv from "sirv";
import { BuildError, messageOf } from "./errors";
import type { WatchHandle, WatchOptions } from "./typings";

export interface ListenAddress {
  host?: string;
  port: number;
}

/** Accepts `:8080`, `8080` or `host:8080`. */
export function parseAddress(address: string): ListenAddress {
  const i = address.lastIndexOf(":");
  const host = i > 0 ? address.slice(0, i) : undefined;
  const portText = i === -1 ? address : address.slice(i + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new BuildError("usage", `invalid port in address "${address}"`);
  }
  return host ? { host, port } : { port };
}

/** Runs `command` without arguments or a shell, inheriting env and stdio. */
export function runCommand(command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!command) return reject(new BuildError("command", "no command"));
    const child = spawn(command, [], { stdio: "inherit", windowsHide: true });
    child.on("error", (err) => reject(new BuildError("command", `${command}: ${err.message}`, undefined, err)));
    child.on("close", (code) => {
      if (code === 0) return resolve();
      reject(new BuildError("command", `${command} failed (code=${code})`));
    });
  });
}

export async function startWatch(options: WatchOptions): Promise<WatchHandle> {
  const { dir, command, root = "static", address = ":8080", run = runCommand, log = console.log } = options;
  const { host, port } = parseAddress(address);

  try {
    if (!statSync(dir).isDirectory()) {
      throw new Error(`not a directory`);
    }
  } catch (err) {
    throw new BuildError("watch", messageOf(err), dir, err);
  }

  // server, on
  const server = createServer(sirv(root, { dev: true }));
  await new Promise<void>((resolve, reject) => {
    server.once("error", (err) => reject(new BuildError("serve", err.message, address, err)));
    server.listen(port, host, () => resolve());
  });
  const info = server.address();
  const bound = info && typeof info === "object" ? info.port : port;
  log(`listening on http://${host ?? "localhost"}:${bound}`);

  // commands run one after another, one per write
  let queue = Promise.resolve();

  const watcher = watch(dir, {
    ignored: ["**/.git/**", "**/node_modules/**"],
    disableGlobbing: true,
    ignorePermissionErrors: true,
    ignoreInitial: true,
    depth: 0,
  });

  try {
    await new Promise<void>((resolve, reject) => {
      watcher.once("ready", resolve);
      watcher.once("error", (err) => reject(new BuildError("watch", messageOf(err), dir, err)));
    });
  } catch (err) {
    server.close();
    await watcher.close();
    throw err;
  }

  let fail: (err: BuildError) => void = () => {};
  let finish: () => void = () => {};
  const done = new Promise<void>((resolve, reject) => {
    fail = reject;
    finish = resolve;
  });
  watcher.on("error", (err) => fail(new BuildError("watch", messageOf(err), dir, err)));
  server.on("error", (err) => fail(new BuildError("serve", err.message, address, err)));

  // a write creates `add` for a new file and `change` for an existing one
  function modified(file: string) {
    log(`modified file: ${file}`);
    queue = queue.then(() =>
      run(command).catch((err: unknown) => {
        log(`Error: ${messageOf(err)}`);
      })
    );
  }
  watcher.on("add", modified);
  watcher.on("change", modified);

  return {
    port: bound,
    done,
    idle: () => queue,
    close: async () => {
      await watcher.close();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      finish();
    },
  };
}
