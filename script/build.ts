import * as esbuild from "esbuild";
import fs from "fs";

async function build() {
  console.log("Building server...");
  fs.rmSync("dist", { recursive: true, force: true });

  await esbuild.build({
    entryPoints: ["server/index.ts"],
    bundle: true,
    platform: "node",
    target: "node20",
    outfile: "dist/index.mjs",
    format: "esm",
    packages: "external",
  });

  fs.mkdirSync("dist/config", { recursive: true });
  fs.copyFileSync("config/claims.config.json", "dist/config/claims.config.json");

  console.log("Build complete!");
}

build().catch((err) => {
  console.error(err);
  process.exit(1);
});
