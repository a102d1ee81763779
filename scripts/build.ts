import { build } from "esbuild";
import { builtinModules } from "module";
import { dependencies } from "../package.json";

const deps = Object.keys(dependencies).concat(builtinModules);

Promise.all([
  build({
    entryPoints: ["./src/index.ts"],
    bundle: true,
    format: "esm",
    platform: "node",
    outdir: "dist",
    external: deps,
    sourcemap: true,
  }),
  build({
    entryPoints: ["./src/bin.ts", "./src/dateconv.ts"],
    bundle: true,
    format: "esm",
    platform: "node",
    outdir: "dist",
    external: deps,
    banner: { js: "#!/usr/bin/env node" },
    sourcemap: true,
    sourcesContent: false,
  }),
]).catch(() => process.exit(1));
