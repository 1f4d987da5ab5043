import { processIo } from "../src/cli/args.js";
import { runLsfRender } from "../src/cli/lsfRender.js";

runLsfRender(process.argv.slice(2), processIo)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
