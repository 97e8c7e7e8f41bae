#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { run } from "./cli";
import { ConsoleLogger } from "./ConsoleLogger";

run(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    new ConsoleLogger().error("💥 Error during execution:", err);
    process.exit(1);
  });
