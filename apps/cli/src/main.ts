import { hideBin } from "yargs/helpers";
import { runCli } from "./index";

runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("[compare] Fatal:", err);
    process.exitCode = 1;
  });
