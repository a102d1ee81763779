import { build } from "./build";
import { BuildError, messageOf } from "./errors";
import type { SiteOptions } from "./typings";
import { startWatch } from "./watch";

export interface CLIOptions {
  watch: boolean;
  wdir?: string | boolean;
  wcmd?: string | boolean;
  port: string;
  root: string;
  title: string;
  link: string;
  description: string;
  copyright: string;
  "author-name": string;
  "author-email": string;
}

export function fatal(err: unknown) {
  if (err instanceof BuildError && err.path) {
    console.error(`Error in '${err.path}'`);
  }
  console.error(messageOf(err));
  process.exitCode = 1;
}

export async function main(
  src: string | undefined,
  templates: string | undefined,
  dest: string | undefined,
  options: CLIOptions
) {
  if (options.watch) {
    const { wdir, wcmd } = options;
    if (typeof wdir !== "string" || typeof wcmd !== "string") {
      throw new BuildError("usage", "watch mode requires --wdir and --wcmd");
    }
    const handle = await startWatch({ dir: wdir, command: wcmd, root: options.root, address: options.port });

    process.stdin.on("data", (e) => {
      if (e.toString().startsWith("q")) {
        handle.close().then(() => process.exit(), fatal);
      }
    });
    // watcher and server failures after startup are fatal: shut both down and leave
    return handle.done.then(
      () => {
        process.stdin.pause();
      },
      (err: unknown) => {
        fatal(err);
        return handle.close().then(
          () => process.exit(1),
          (closeErr: unknown) => {
            fatal(closeErr);
            process.exit(1);
          }
        );
      }
    );
  }

  if (!src || !templates || !dest) {
    console.log("Wrong number of arguments");
    process.exitCode = 1;
    return;
  }

  const site: SiteOptions = {
    title: options.title,
    link: options.link,
    description: options.description,
    copyright: options.copyright,
    author: { name: options["author-name"], email: options["author-email"] },
  };
  build({ src, templates, dest, site });
}
