import { afterEach, describe, expect, it, vi } from "vitest";
import { DefaultSite } from "../src/build";
import { type CLIOptions, main } from "../src/cli";
import { BuildError } from "../src/errors";
import type { WatchHandle } from "../src/typings";
import { startWatch } from "../src/watch";

vi.mock("../src/watch", () => ({ startWatch: vi.fn() }));

const options: CLIOptions = {
  watch: false,
  port: ":8080",
  root: "static",
  title: DefaultSite.title,
  link: DefaultSite.link,
  description: DefaultSite.description,
  copyright: DefaultSite.copyright,
  "author-name": DefaultSite.author.name,
  "author-email": DefaultSite.author.email,
};

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  process.stdin.removeAllListeners("data");
  process.stdin.pause();
});

describe("main", () => {
  it("fails with a usage line when arguments are missing", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await main("posts", undefined, undefined, options);
    expect(log).toHaveBeenCalledWith("Wrong number of arguments");
    expect(process.exitCode).toBe(1);
  });

  it("requires a directory and a command in watch mode", async () => {
    await expect(main(undefined, undefined, undefined, { ...options, watch: true, wcmd: "rebuild" })).rejects.toMatchObject({
      kind: "usage",
    });
    expect(startWatch).not.toHaveBeenCalled();
  });

  it("shuts down and exits when watching fails after startup", async () => {
    const close = vi.fn(async () => {});
    const handle: WatchHandle = {
      port: 8080,
      done: new Promise<void>((_, reject) => {
        setTimeout(() => reject(new BuildError("watch", "watcher died", "posts")), 10);
      }),
      idle: async () => {},
      close,
    };
    vi.mocked(startWatch).mockResolvedValue(handle);
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(main(undefined, undefined, undefined, { ...options, watch: true, wdir: "posts", wcmd: "rebuild" })).rejects.toThrow(
      "exit 1"
    );
    expect(startWatch).toHaveBeenCalledWith({ dir: "posts", command: "rebuild", root: "static", address: ":8080" });
    expect(error).toHaveBeenCalledWith("Error in 'posts'");
    expect(error).toHaveBeenCalledWith("watcher died");
    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
    expect(close.mock.invocationCallOrder[0]).toBeLessThan(exit.mock.invocationCallOrder[0]);
  });
});
