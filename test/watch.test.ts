import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { createServer } from "http";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { WatchHandle } from "../src/typings";
import { parseAddress, runCommand, startWatch } from "../src/watch";

function dirs() {
  const root = mkdtempSync(join(tmpdir(), "mdpress-watch-"));
  const watched = join(root, "posts");
  const served = join(root, "static");
  mkdirSync(watched);
  mkdirSync(served);
  writeFileSync(join(watched, "a.md"), "title: A\n");
  writeFileSync(join(served, "hello.txt"), "hi");
  return { watched, served };
}

describe("parseAddress", () => {
  it("reads port only addresses", () => {
    expect(parseAddress(":8080")).toEqual({ port: 8080 });
    expect(parseAddress("8080")).toEqual({ port: 8080 });
  });

  it("reads host and port", () => {
    expect(parseAddress("127.0.0.1:9000")).toEqual({ host: "127.0.0.1", port: 9000 });
  });

  it("rejects bad ports", () => {
    expect(() => parseAddress(":http")).toThrow(/invalid port/);
    expect(() => parseAddress(":70000")).toThrow(/invalid port/);
    expect(() => parseAddress("")).toThrow(/invalid port/);
  });
});

describe("runCommand", () => {
  it("rejects an empty command", async () => {
    await expect(runCommand("")).rejects.toMatchObject({ kind: "command", message: "no command" });
  });

  it.skipIf(process.platform === "win32")("resolves when the command exits with 0", async () => {
    await expect(runCommand("true")).resolves.toBeUndefined();
  });

  it.skipIf(process.platform === "win32")("rejects on a non-zero exit code", async () => {
    await expect(runCommand("false")).rejects.toMatchObject({ kind: "command", message: "false failed (code=1)" });
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runCommand("mdpress-no-such-command")).rejects.toMatchObject({
      kind: "command",
      message: expect.stringMatching(/^mdpress-no-such-command: .*ENOENT/),
    });
  });
});

describe("startWatch", () => {
  let handle: WatchHandle | undefined;

  afterEach(async () => {
    await handle?.close();
    handle = undefined;
  });

  it("serves the static directory", async () => {
    const { watched, served } = dirs();
    const run = vi.fn(async (_command: string) => {});
    handle = await startWatch({ dir: watched, command: "rebuild", root: served, address: "127.0.0.1:0", run, log: () => {} });

    const ok = await fetch(`http://127.0.0.1:${handle.port}/hello.txt`);
    expect(ok.status).toBe(200);
    expect(await ok.text()).toBe("hi");

    const missing = await fetch(`http://127.0.0.1:${handle.port}/nope.txt`);
    expect(missing.status).toBe(404);
    expect(run).not.toHaveBeenCalled();
  });

  it("runs the command when a file is written", async () => {
    const { watched, served } = dirs();
    const run = vi.fn(async (_command: string) => {});
    const log = vi.fn();
    handle = await startWatch({ dir: watched, command: "rebuild", root: served, address: "127.0.0.1:0", run, log });

    const file = join(watched, "a.md");
    writeFileSync(file, "title: B\n");

    await vi.waitFor(() => expect(run).toHaveBeenCalledWith("rebuild"), { timeout: 5000 });
    await handle.idle();
    expect(log).toHaveBeenCalledWith(`modified file: ${file}`);
  });

  it("runs the command when a new file is written", async () => {
    const { watched, served } = dirs();
    const run = vi.fn(async (_command: string) => {});
    const log = vi.fn();
    handle = await startWatch({ dir: watched, command: "rebuild", root: served, address: "127.0.0.1:0", run, log });

    const file = join(watched, "b.md");
    writeFileSync(file, "title: New\n");

    await vi.waitFor(() => expect(run).toHaveBeenCalledWith("rebuild"), { timeout: 5000 });
    await handle.idle();
    expect(log).toHaveBeenCalledWith(`modified file: ${file}`);
  });

  it("keeps watching after a failed command", async () => {
    const { watched, served } = dirs();
    const run = vi.fn(async (_command: string): Promise<void> => {
      throw new Error("boom");
    });
    const log = vi.fn();
    handle = await startWatch({ dir: watched, command: "rebuild", root: served, address: "127.0.0.1:0", run, log });

    writeFileSync(join(watched, "a.md"), "title: C\n");
    await vi.waitFor(() => expect(log).toHaveBeenCalledWith("Error: boom"), { timeout: 5000 });

    const calls = run.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 100));
    writeFileSync(join(watched, "a.md"), "title: D\n");
    await vi.waitFor(() => expect(run.mock.calls.length).toBeGreaterThan(calls), { timeout: 5000 });
    await handle.idle();
  });

  it("fails on a missing directory", async () => {
    const { served } = dirs();
    await expect(
      startWatch({ dir: join(served, "nope"), command: "rebuild", root: served, address: "127.0.0.1:0", log: () => {} })
    ).rejects.toMatchObject({ kind: "watch" });
  });

  it("fails to serve on a taken port", async () => {
    const { watched, served } = dirs();
    const taken = createServer();
    await new Promise<void>((resolve) => taken.listen(0, "127.0.0.1", resolve));
    const info = taken.address();
    const port = info && typeof info === "object" ? info.port : 0;
    const address = `127.0.0.1:${port}`;
    try {
      await expect(
        startWatch({ dir: watched, command: "rebuild", root: served, address, log: () => {} })
      ).rejects.toMatchObject({ kind: "serve", path: address });
    } finally {
      await new Promise((resolve) => taken.close(resolve));
    }
  });
});
