import sade from "sade";

import { version } from "../package.json";
import { DefaultSite } from "./build";
import { type CLIOptions, fatal, main } from "./cli";

sade("mdpress [src] [templates] [dest]")
  .version(version)
  .describe("Static html, archive and feeds from a directory of markdown posts.")
  .example("posts templates public")
  .example("--watch --wdir posts --wcmd ./rebuild.sh --port :8080")
  .option("-w, --watch", "Enable 'watch' mode. Requires 'wdir' and 'wcmd'")
  .option("--wdir", "Watch a directory for changes, run command when change happens")
  .option("--wcmd", "Command to run when changes are detected in 'wdir'")
  .option("--port", "Address to serve the static files on", ":8080")
  .option("--root", "Directory served in watch mode", "static")
  .option("--title", "Feed title", DefaultSite.title)
  .option("--link", "Base link of the site", DefaultSite.link)
  .option("--description", "Feed description", DefaultSite.description)
  .option("--copyright", "Feed copyright line", DefaultSite.copyright)
  .option("--author-name", "Feed author name", DefaultSite.author.name)
  .option("--author-email", "Feed author email", DefaultSite.author.email)
  .action((src: string | undefined, templates: string | undefined, dest: string | undefined, options: CLIOptions) =>
    main(src, templates, dest, options).catch(fatal)
  )
  .parse(process.argv, {
    default: {
      watch: false,
    },
  });
