import { processIo } from "../src/cli/args.js";
import { runLsfValidate } from "../src/cli/lsfValidate.js";

runLsfValidate(process.argv.slice(2), processIo)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
