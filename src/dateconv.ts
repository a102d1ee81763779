import sade from "sade";

import { version } from "../package.json";
import { isoDateToRFC1123 } from "./dates";
import { messageOf } from "./errors";

sade("mdpress-date <date>")
  .version(version)
  .describe("Print a YYYY-MM-DD date in the format 'date:' lines expect.")
  .example("2006-01-02")
  .action((date: string) => {
    try {
      console.log(isoDateToRFC1123(date));
    } catch (err) {
      console.error(messageOf(err));
      process.exitCode = 1;
    }
  })
  .parse(process.argv);
